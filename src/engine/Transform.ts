import { mat3, mat4, vec3, quat } from "gl-matrix";
import type { InstanceData } from "./Renderer";

/** Position/rotation/scale of one drawn copy of a mesh. */
export class Transform {
  position: vec3 = vec3.create();
  rotation: quat = quat.create();
  scale: vec3 = vec3.fromValues(1, 1, 1);

  /** Builds the model matrix: T × R × S */
  modelMatrix(out: mat4 = mat4.create()): mat4 {
    return mat4.fromRotationTranslationScale(out, this.rotation, this.position, this.scale);
  }

  /** Inverse-transpose of the model's upper 3×3 — keeps normals perpendicular under non-uniform scale. */
  normalMatrix(out: mat3 = mat3.create()): mat3 {
    const normal = mat3.normalFromMat4(out, this.modelMatrix());
    if (!normal) throw new Error("Transform has a singular model matrix (zero scale on some axis)");
    return normal;
  }

  instanceData(): InstanceData {
    return { model: this.modelMatrix(), normal: this.normalMatrix() };
  }
}

/**
 * Square grid of instances centred on the origin at y = 0. Each copy is tilted
 * 45° about the direction to its own position; the one at the origin has no
 * direction to tilt about and stays unrotated.
 */
export function makeInstanceGrid(perRow: number, spacing: number): Transform[] {
  if (!Number.isInteger(perRow) || perRow < 1) {
    throw new Error(`Instance grid needs a positive integer row size, got ${perRow}`);
  }

  const transforms: Transform[] = [];
  const half = perRow / 2;
  for (let z = 0; z < perRow; z++) {
    for (let x = 0; x < perRow; x++) {
      const t = new Transform();
      vec3.set(t.position, spacing * (x - half), 0, spacing * (z - half));
      if (vec3.length(t.position) > 0) {
        const axis = vec3.normalize(vec3.create(), t.position);
        quat.setAxisAngle(t.rotation, axis, Math.PI / 4);
      }
      transforms.push(t);
    }
  }
  return transforms;
}

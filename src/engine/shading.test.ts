import { describe, it, expect } from "vitest";
import { mat3, mat4, quat, vec2, vec3, vec4 } from "gl-matrix";
import type { ReadonlyVec3 } from "gl-matrix";
import {
  blinnPhong,
  lightMarkerFragment,
  lightMarkerVertex,
  surfaceFragment,
  surfaceVertex,
  worldToTangent,
} from "./shading";
import type { MaterialSamplers, TextureSampler } from "./shading";
import type { FrameUniforms, InstanceData, ModelVertex } from "./Renderer";
import { Transform } from "./Transform";
import { resolveShadingParams } from "./params";

const constant = (r: number, g: number, b: number, a: number): TextureSampler => () => vec4.fromValues(r, g, b, a);

/** Normal map texel for tangent-space (0, 0, 1). */
const FLAT_NORMAL = constant(0.5, 0.5, 1, 1);

function frame(lightPosition: ReadonlyVec3, lightColor: ReadonlyVec3, eye: ReadonlyVec3, viewProjection = mat4.create()): FrameUniforms {
  return {
    camera: { viewPosition: vec4.fromValues(eye[0], eye[1], eye[2], 1), viewProjection },
    light: { position: vec3.clone(lightPosition), color: vec3.clone(lightColor) },
  };
}

function axisVertex(position: ReadonlyVec3 = [0, 0, 0]): ModelVertex {
  return {
    position: vec3.clone(position),
    uv: vec2.fromValues(0.25, 0.75),
    normal: vec3.fromValues(0, 0, 1),
    tangent: vec3.fromValues(1, 0, 0),
    bitangent: vec3.fromValues(0, 1, 0),
  };
}

const IDENTITY_INSTANCE: InstanceData = { model: mat4.create(), normal: mat3.create() };

describe("surface shading program", () => {
  it("matches world-space Blinn-Phong when the normal map is flat", () => {
    const transform = new Transform();
    vec3.set(transform.position, 1, 2, -3);
    quat.setAxisAngle(transform.rotation, vec3.normalize(vec3.create(), [1, 1, 0]), 0.6);
    const instance = transform.instanceData();

    const vertex = axisVertex([0.2, 0.5, 0.1]);
    const lightPos = vec3.fromValues(4, 5, 6);
    const lightColor = vec3.fromValues(1, 0.8, 0.6);
    const eye = vec3.fromValues(-2, 3, 8);
    const albedo = [0.9, 0.6, 0.3];
    const material: MaterialSamplers = { diffuse: constant(albedo[0], albedo[1], albedo[2], 0.75), normal: FLAT_NORMAL };

    const f = frame(lightPos, lightColor, eye);
    const color = surfaceFragment(surfaceVertex(vertex, instance, f), material, f.light);

    // Reference: same model, evaluated directly in world space with the geometric normal
    const world4 = vec4.transformMat4(vec4.create(), [0.2, 0.5, 0.1, 1], instance.model);
    const world = vec3.fromValues(world4[0], world4[1], world4[2]);
    const n = vec3.normalize(vec3.create(), vec3.transformMat3(vec3.create(), vertex.normal, instance.normal));
    const l = vec3.normalize(vec3.create(), vec3.subtract(vec3.create(), lightPos, world));
    const v = vec3.normalize(vec3.create(), vec3.subtract(vec3.create(), eye, world));
    const h = vec3.normalize(vec3.create(), vec3.add(vec3.create(), l, v));
    const diffuse = Math.max(vec3.dot(n, l), 0);
    const specular = Math.pow(Math.max(vec3.dot(n, h), 0), 32);
    expect(diffuse).toBeGreaterThan(0);

    for (let i = 0; i < 3; i++) {
      expect(color[i]).toBeCloseTo((0.1 + diffuse + specular) * lightColor[i] * albedo[i], 4);
    }
    expect(color[3]).toBe(0.75);
  });

  it("leaves only the ambient term on a fully backlit surface", () => {
    const f = frame([0, 0, -5], [2, 1, 0.5], [0, 0, -3]);
    const material: MaterialSamplers = { diffuse: constant(1, 1, 1, 0.5), normal: FLAT_NORMAL };

    const color = surfaceFragment(surfaceVertex(axisVertex(), IDENTITY_INSTANCE, f), material, f.light);

    expect(color[0]).toBeCloseTo(0.2, 6);
    expect(color[1]).toBeCloseTo(0.1, 6);
    expect(color[2]).toBeCloseTo(0.05, 6);
    expect(color[3]).toBe(0.5);
  });

  it("uses the ambient factor from the pipeline params", () => {
    const params = resolveShadingParams({ ambientStrength: 0.2 });
    const f = frame([0, 0, -5], [2, 1, 0.5], [0, 0, -3]);
    const material: MaterialSamplers = { diffuse: constant(1, 1, 1, 1), normal: FLAT_NORMAL };

    const color = surfaceFragment(surfaceVertex(axisVertex(), IDENTITY_INSTANCE, f), material, f.light, params);

    expect(color[0]).toBeCloseTo(0.4, 6);
    expect(color[1]).toBeCloseTo(0.2, 6);
    expect(color[2]).toBeCloseTo(0.1, 6);
  });

  it("passes the diffuse texture's alpha through untouched", () => {
    const f = frame([0, 0, 5], [10, 10, 10], [0, 0, 5]);
    for (const alpha of [0, 0.25, 1]) {
      const material: MaterialSamplers = { diffuse: constant(0.5, 0.5, 0.5, alpha), normal: FLAT_NORMAL };
      const color = surfaceFragment(surfaceVertex(axisVertex(), IDENTITY_INSTANCE, f), material, f.light);
      expect(color[3]).toBe(alpha);
    }
  });

  it("reads the perturbed normal from the normal map", () => {
    // Light straight above in tangent space; a normal tilted to +x by 60° sees cos(60°) of it
    const f = frame([0, 0, 5], [1, 1, 1], [-5, 0, 0]);
    const tilted = constant(Math.sin(Math.PI / 3) * 0.5 + 0.5, 0.5, Math.cos(Math.PI / 3) * 0.5 + 0.5, 1);
    const material: MaterialSamplers = { diffuse: constant(1, 1, 1, 1), normal: tilted };

    const color = surfaceFragment(surfaceVertex(axisVertex(), IDENTITY_INSTANCE, f), material, f.light);

    // Eye off to -x: the half vector leans away from the tilted normal, so no specular
    expect(color[0]).toBeCloseTo(0.1 + 0.5, 5);
  });
});

describe("blinnPhong", () => {
  const normal = vec3.fromValues(0, 0, 1);
  const color = vec3.fromValues(1, 0.5, 0.25);

  it("clamps diffuse and specular to zero for negative dot products", () => {
    const terms = blinnPhong(normal, [0, 0.6, -0.8], [0.6, 0, -0.8], color);
    expect(Array.from(terms.diffuse)).toEqual([0, 0, 0]);
    expect(Array.from(terms.specular)).toEqual([0, 0, 0]);
    expect(terms.ambient[0]).toBeCloseTo(0.1, 6);
  });

  it("raises specular monotonically as the half vector approaches the normal", () => {
    const angles = [1.0, 0.6, 0.3, 0.1, 0];
    const values = angles.map((theta) => blinnPhong(normal, normal, [Math.sin(theta), 0, Math.cos(theta)], color).specular[0]);

    for (let i = 1; i < values.length; i++) {
      expect(values[i]).toBeGreaterThan(values[i - 1]);
    }
    expect(values[2]).toBeCloseTo(Math.pow(Math.cos(0.3), 32), 4);
  });

  it("saturates specular at the light colour when the half vector equals the normal", () => {
    const terms = blinnPhong(normal, normal, normal, color);
    expect(Array.from(terms.specular)).toEqual([1, 0.5, 0.25]);
    expect(Array.from(terms.diffuse)).toEqual([1, 0.5, 0.25]);
  });
});

describe("tangent-space transform", () => {
  it("round-trips a point through the basis and its transpose", () => {
    const transform = new Transform();
    quat.setAxisAngle(transform.rotation, vec3.normalize(vec3.create(), [0.3, -1, 0.5]), 1.1);
    const toTangent = worldToTangent(axisVertex(), transform.normalMatrix());
    const toWorld = mat3.transpose(mat3.create(), toTangent);

    const point = vec3.fromValues(3.5, -2, 7.25);
    const tangent = vec3.transformMat3(vec3.create(), point, toTangent);
    const back = vec3.transformMat3(vec3.create(), tangent, toWorld);

    expect(back[0]).toBeCloseTo(3.5, 5);
    expect(back[1]).toBeCloseTo(-2, 5);
    expect(back[2]).toBeCloseTo(7.25, 5);
  });

  it("renormalises the basis when the instance is scaled", () => {
    const transform = new Transform();
    vec3.set(transform.scale, 3, 3, 3);
    const f = frame([1, 2, 3], [1, 1, 1], [0, 0, 0]);

    const out = surfaceVertex(axisVertex(), transform.instanceData(), f);

    // Basis is the world axes again after normalising, so the light keeps its coordinates
    expect(out.tangentLightPosition[0]).toBeCloseTo(1, 6);
    expect(out.tangentLightPosition[1]).toBeCloseTo(2, 6);
    expect(out.tangentLightPosition[2]).toBeCloseTo(3, 6);
  });

  it("projects the world position with the camera's view-projection", () => {
    const transform = new Transform();
    vec3.set(transform.position, 0, 0, -4);
    const viewProjection = mat4.perspectiveZO(mat4.create(), Math.PI / 2, 1, 1, 10);
    const f = frame([0, 0, 0], [1, 1, 1], [0, 0, 0], viewProjection);

    const out = surfaceVertex(axisVertex([1, 0, 0]), transform.instanceData(), f);

    // world (1, 0, -4): fov 90° → x_clip = 1, w = 4
    expect(out.clipPosition[0]).toBeCloseTo(1, 5);
    expect(out.clipPosition[3]).toBeCloseTo(4, 5);
    expect(Array.from(out.uv)).toEqual([0.25, 0.75]);
  });
});

describe("light marker program", () => {
  const cameras = [
    mat4.create(),
    mat4.multiply(
      mat4.create(),
      mat4.perspectiveZO(mat4.create(), Math.PI / 4, 1.5, 0.1, 100),
      mat4.lookAt(mat4.create(), [5, 4, 3], [0, 0, 0], [0, 1, 0]),
    ),
  ];

  it("centres the marker on the light regardless of the camera", () => {
    for (const viewProjection of cameras) {
      const f = frame([2, -1, 0.5], [1, 0.5, 0], [9, 9, 9], viewProjection);
      const out = lightMarkerVertex([0, 0, 0], f);
      expect(Array.from(out.worldPosition)).toEqual([2, -1, 0.5]);
    }
  });

  it("scales the unit mesh down around the light", () => {
    const f = frame([2, -1, 0.5], [1, 1, 1], [0, 0, 0]);
    const out = lightMarkerVertex([1, -1, 1], f);
    expect(Array.from(out.worldPosition)).toEqual([2.25, -1.25, 0.75]);
    // Identity view-projection: clip = (world, 1)
    expect(Array.from(out.clipPosition)).toEqual([2.25, -1.25, 0.75, 1]);
  });

  it("fills with the light colour at full opacity", () => {
    const f = frame([0, 0, 0], [3, 0.5, 0.25], [0, 0, 0]);
    const color = lightMarkerFragment(lightMarkerVertex([0.5, 0.5, 0.5], f));
    expect(Array.from(color)).toEqual([3, 0.5, 0.25, 1]);
  });
});

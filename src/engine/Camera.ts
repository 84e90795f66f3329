import { mat4, vec3, vec4 } from "gl-matrix";
import type { CameraUniform } from "./Renderer";

const SAFE_HALF_PI = Math.PI / 2 - 0.0001;

/** First-person camera: position plus yaw/pitch, right-handed, +Y up. */
export class Camera {
  position: vec3;
  yaw: number;
  fovy: number;
  near: number;
  far: number;

  private _pitch = 0;
  private _aspect: number;

  constructor(
    position: vec3,
    yaw: number,
    pitch: number,
    width: number,
    height: number,
    fovy = Math.PI / 4,
    near = 0.1,
    far = 100.0,
  ) {
    this.position = position;
    this.yaw = yaw;
    this.pitch = pitch;
    this._aspect = width / height;
    this.fovy = fovy;
    this.near = near;
    this.far = far;
  }

  get pitch(): number {
    return this._pitch;
  }

  /** Clamped just short of straight up/down so the look direction never aligns with +Y. */
  set pitch(value: number) {
    this._pitch = Math.max(-SAFE_HALF_PI, Math.min(SAFE_HALF_PI, value));
  }

  get aspect(): number {
    return this._aspect;
  }

  resize(width: number, height: number): void {
    if (width > 0 && height > 0) this._aspect = width / height;
  }

  /** Unit look direction derived from yaw/pitch. */
  forward(out: vec3 = vec3.create()): vec3 {
    vec3.set(out, Math.cos(this.yaw), Math.sin(this.pitch), Math.sin(this.yaw));
    return vec3.normalize(out, out);
  }

  view(out: mat4 = mat4.create()): mat4 {
    const target = vec3.add(vec3.create(), this.position, this.forward());
    return mat4.lookAt(out, this.position, target, [0, 1, 0]);
  }

  /** Perspective with WebGPU's [0, 1] clip depth. */
  projection(out: mat4 = mat4.create()): mat4 {
    return mat4.perspectiveZO(out, this.fovy, this._aspect, this.near, this.far);
  }

  uniform(): CameraUniform {
    const viewProjection = mat4.multiply(mat4.create(), this.projection(), this.view());
    return {
      viewPosition: vec4.fromValues(this.position[0], this.position[1], this.position[2], 1),
      viewProjection,
    };
  }
}

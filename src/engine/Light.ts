import { vec3 } from "gl-matrix";
import type { LightUniform } from "./Renderer";

export class Light {
  position: vec3;
  /** Linear RGB; keep components non-negative. */
  color: vec3;
  /** Optional per-frame animation. Receives the frame delta in seconds. */
  onUpdate: ((dt: number) => void) | null = null;

  constructor(position: vec3 = vec3.fromValues(2, 2, 2), color: vec3 = vec3.fromValues(1, 1, 1)) {
    this.position = position;
    this.color = color;
  }

  update(dt: number): void {
    if (this.onUpdate) this.onUpdate(dt);
  }

  /** Rotates the light about the world +Y axis through the origin. */
  orbit(dt: number, degreesPerSecond: number): void {
    const angle = (degreesPerSecond * dt * Math.PI) / 180;
    vec3.rotateY(this.position, this.position, [0, 0, 0], angle);
  }

  uniform(): LightUniform {
    return { position: vec3.clone(this.position), color: vec3.clone(this.color) };
  }
}

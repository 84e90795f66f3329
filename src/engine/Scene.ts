// Scene — holds the camera, light, and instanced draw batches; builds the
// per-frame uniforms and draw list the renderer needs.

import type { DrawBatch, FrameDraws, FrameUniforms, MeshHandle } from "./Renderer";
import type { Camera } from "./Camera";
import type { Light } from "./Light";

export class Scene {
  batches: DrawBatch[] = [];
  /** Mesh drawn at the light's position; null hides the marker. */
  lightMarker: MeshHandle | null = null;
  camera: Camera;
  light: Light;

  constructor(camera: Camera, light: Light) {
    this.camera = camera;
    this.light = light;
  }

  add(batch: DrawBatch): void {
    this.batches.push(batch);
  }

  /** Advance per-frame animation by dt seconds. */
  update(dt: number): void {
    this.light.update(dt);
  }

  /** Snapshot camera + light into a fresh FrameUniforms and list this frame's draws. */
  buildFrame(): { frame: FrameUniforms; draws: FrameDraws } {
    const draws: FrameDraws = { batches: [...this.batches] };
    if (this.lightMarker) draws.lightMarker = this.lightMarker;
    return {
      frame: { camera: this.camera.uniform(), light: this.light.uniform() },
      draws,
    };
  }
}

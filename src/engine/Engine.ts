// Engine — owns the requestAnimationFrame loop: resize, update, write uniforms, render.

import type { WebGPURenderer } from "./WebGPURenderer";
import type { Scene } from "./Scene";

export class Engine {
  renderer: WebGPURenderer;
  scene: Scene;
  private _rafId = 0;
  private _lastTime: number | null = null;

  constructor(renderer: WebGPURenderer, scene: Scene) {
    this.renderer = renderer;
    this.scene = scene;
  }

  /** One frame. `time` is a DOMHighResTimeStamp in milliseconds. */
  frame(time: number): void {
    const dt = this._lastTime === null ? 0 : (time - this._lastTime) / 1000;
    this._lastTime = time;

    this.renderer.resize();
    this.scene.camera.resize(this.renderer.width, this.renderer.height);
    this.scene.update(dt);

    const { frame, draws } = this.scene.buildFrame();
    this.renderer.writeFrame(frame);
    this.renderer.renderFrame(draws);
  }

  start(): void {
    const loop = (time: DOMHighResTimeStamp) => {
      this.frame(time);
      this._rafId = requestAnimationFrame(loop);
    };
    this._rafId = requestAnimationFrame(loop);
  }

  stop(): void {
    cancelAnimationFrame(this._rafId);
    this._lastTime = null;
  }
}

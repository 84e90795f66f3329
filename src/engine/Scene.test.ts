import { describe, it, expect } from "vitest";
import { vec3 } from "gl-matrix";
import { Camera } from "./Camera";
import { Light } from "./Light";
import { Scene } from "./Scene";
import type { DrawBatch } from "./Renderer";

describe("Light", () => {
  it("orbits about +Y through the origin", () => {
    const light = new Light();
    light.orbit(1.5, 60);

    expect(light.position[0]).toBeCloseTo(2, 5);
    expect(light.position[1]).toBeCloseTo(2, 5);
    expect(light.position[2]).toBeCloseTo(-2, 5);
  });

  it("runs the update hook with the frame delta", () => {
    const light = new Light();
    const seen: number[] = [];
    light.onUpdate = (dt) => seen.push(dt);
    light.update(0.25);
    expect(seen).toEqual([0.25]);
  });

  it("hands out copies in its uniform", () => {
    const light = new Light(vec3.fromValues(1, 2, 3), vec3.fromValues(0.5, 0.5, 0.5));
    const uniform = light.uniform();
    vec3.set(light.position, 9, 9, 9);
    expect(Array.from(uniform.position)).toEqual([1, 2, 3]);
  });
});

describe("Scene", () => {
  const makeScene = () =>
    new Scene(new Camera(vec3.fromValues(0, 0, 5), -Math.PI / 2, 0, 4, 3), new Light());

  const batch: DrawBatch = { mesh: { indexCount: 36 }, material: {}, instances: { count: 4 } };

  it("lists batches in the order they were added", () => {
    const scene = makeScene();
    const second: DrawBatch = { ...batch, instances: { count: 1 } };
    scene.add(batch);
    scene.add(second);

    const { draws } = scene.buildFrame();
    expect(draws.batches).toEqual([batch, second]);
    expect(draws.batches).not.toBe(scene.batches);
    expect("lightMarker" in draws).toBe(false);
  });

  it("includes the light marker when one is set", () => {
    const scene = makeScene();
    scene.lightMarker = batch.mesh;
    expect(scene.buildFrame().draws.lightMarker).toBe(batch.mesh);
  });

  it("snapshots camera and light after animation", () => {
    const scene = makeScene();
    scene.light.onUpdate = (dt) => scene.light.orbit(dt, 60);
    scene.update(1.5);

    const { frame } = scene.buildFrame();
    expect(frame.light.position[2]).toBeCloseTo(-2, 5);
    expect(Array.from(frame.camera.viewPosition)).toEqual([0, 0, 5, 1]);
  });
});

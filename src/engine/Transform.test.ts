import { describe, it, expect } from "vitest";
import { vec3 } from "gl-matrix";
import { Transform, makeInstanceGrid } from "./Transform";

describe("Transform", () => {
  it("builds translation × rotation × scale", () => {
    const t = new Transform();
    vec3.set(t.position, 1, 2, 3);
    vec3.set(t.scale, 2, 2, 2);
    const m = t.modelMatrix();

    expect(m[0]).toBe(2);
    expect(Array.from(m.subarray(12, 16))).toEqual([1, 2, 3, 1]);
  });

  it("inverts non-uniform scale in the normal matrix", () => {
    const t = new Transform();
    vec3.set(t.scale, 2, 1, 1);
    const n = t.normalMatrix();

    expect(n[0]).toBeCloseTo(0.5, 6);
    expect(n[4]).toBeCloseTo(1, 6);
    expect(n[8]).toBeCloseTo(1, 6);
    expect(n[1]).toBeCloseTo(0, 6);
  });

  it("refuses a zero scale", () => {
    const t = new Transform();
    vec3.set(t.scale, 0, 1, 1);
    expect(() => t.normalMatrix()).toThrow("Transform has a singular model matrix");
  });
});

describe("makeInstanceGrid", () => {
  it("lays out rows along x, then z, centred on the origin", () => {
    const grid = makeInstanceGrid(10, 3);

    expect(grid).toHaveLength(100);
    expect(Array.from(grid[0].position)).toEqual([-15, 0, -15]);
    expect(Array.from(grid[1].position)).toEqual([-12, 0, -15]);
    expect(Array.from(grid[10].position)).toEqual([-15, 0, -12]);
    expect(Array.from(grid[99].position)).toEqual([12, 0, 12]);
  });

  it("tilts each copy 45° about the direction to its position", () => {
    const first = makeInstanceGrid(10, 3)[0];
    const s = Math.sin(Math.PI / 8);

    expect(first.rotation[3]).toBeCloseTo(Math.cos(Math.PI / 8), 6);
    expect(first.rotation[0]).toBeCloseTo(-Math.SQRT1_2 * s, 6);
    expect(first.rotation[1]).toBeCloseTo(0, 6);
    expect(first.rotation[2]).toBeCloseTo(-Math.SQRT1_2 * s, 6);
  });

  it("leaves the instance at the origin unrotated", () => {
    const centre = makeInstanceGrid(10, 3)[55];
    expect(Array.from(centre.position)).toEqual([0, 0, 0]);
    expect(Array.from(centre.rotation)).toEqual([0, 0, 0, 1]);
  });

  it("rejects row sizes that are not positive integers", () => {
    expect(() => makeInstanceGrid(0, 3)).toThrow("Instance grid needs a positive integer row size, got 0");
    expect(() => makeInstanceGrid(2.5, 3)).toThrow("got 2.5");
  });
});

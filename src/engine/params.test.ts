import { describe, it, expect } from "vitest";
import { DEFAULT_SHADING_PARAMS, resolveShadingParams } from "./params";

describe("resolveShadingParams", () => {
  it("falls back to the defaults", () => {
    expect(resolveShadingParams()).toEqual({ ambientStrength: 0.1, shininess: 32, markerScale: 0.25 });
    expect(DEFAULT_SHADING_PARAMS).toEqual(resolveShadingParams({}));
  });

  it("overrides only what is given", () => {
    expect(resolveShadingParams({ shininess: 64 })).toEqual({ ambientStrength: 0.1, shininess: 64, markerScale: 0.25 });
  });

  it("freezes the result", () => {
    expect(Object.isFrozen(resolveShadingParams({ markerScale: 0.5 }))).toBe(true);
  });

  it("rejects values the shaders cannot use", () => {
    expect(() => resolveShadingParams({ ambientStrength: Number.NaN })).toThrow(
      'Shading parameter "ambientStrength" must be a finite number, got NaN',
    );
    expect(() => resolveShadingParams({ shininess: Infinity })).toThrow('"shininess" must be a finite number');
    expect(() => resolveShadingParams({ ambientStrength: -0.1 })).toThrow("ambientStrength must be >= 0, got -0.1");
    expect(() => resolveShadingParams({ shininess: 0 })).toThrow("shininess must be > 0, got 0");
    expect(() => resolveShadingParams({ markerScale: -1 })).toThrow("markerScale must be > 0, got -1");
  });

  it("rejects values that overflow a WGSL f32", () => {
    expect(() => resolveShadingParams({ shininess: 1e39 })).toThrow(
      'Shading parameter "shininess" is outside the f32 range, got 1e+39',
    );
    expect(resolveShadingParams({ shininess: 1e38 }).shininess).toBe(1e38);
  });

  it("accepts a zero ambient factor", () => {
    expect(resolveShadingParams({ ambientStrength: 0 }).ambientStrength).toBe(0);
  });
});

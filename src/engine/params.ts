// Shading parameters — fixed per pipeline. They are baked into the WGSL as
// constants when the pipelines are built, and read by the CPU reference.

export interface ShadingParams {
  /** Flat ambient factor applied to the light colour. */
  readonly ambientStrength: number;
  /** Blinn-Phong specular exponent. */
  readonly shininess: number;
  /** Uniform scale applied to the light marker mesh. */
  readonly markerScale: number;
}

export const DEFAULT_SHADING_PARAMS: ShadingParams = Object.freeze({
  ambientStrength: 0.1,
  shininess: 32,
  markerScale: 0.25,
});

/** Fills in defaults and rejects values the shaders cannot use. */
export function resolveShadingParams(overrides: Partial<ShadingParams> = {}): ShadingParams {
  const params: ShadingParams = { ...DEFAULT_SHADING_PARAMS, ...overrides };

  for (const [name, value] of Object.entries(params)) {
    if (!Number.isFinite(value)) {
      throw new Error(`Shading parameter "${name}" must be a finite number, got ${value}`);
    }
    // Inlined as a WGSL f32 literal
    if (!Number.isFinite(Math.fround(value))) {
      throw new Error(`Shading parameter "${name}" is outside the f32 range, got ${value}`);
    }
  }
  if (params.ambientStrength < 0) {
    throw new Error(`ambientStrength must be >= 0, got ${params.ambientStrength}`);
  }
  if (params.shininess <= 0) {
    throw new Error(`shininess must be > 0, got ${params.shininess}`);
  }
  if (params.markerScale <= 0) {
    throw new Error(`markerScale must be > 0, got ${params.markerScale}`);
  }

  return Object.freeze(params);
}

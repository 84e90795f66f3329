// Demo configuration read from the page's query string.

import type { ShadingParams } from "./engine";

/** A numeric query parameter; absent, empty, and non-numeric values all read as unset. */
export function numberParam(params: URLSearchParams, name: string): number | undefined {
  const raw = params.get(name);
  if (raw === null || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    console.warn(`Ignoring ?${name}=${raw}: not a number`);
    return undefined;
  }
  return value;
}

/** ?ambient= and ?shininess= as overrides for resolveShadingParams. */
export function shadingOverrides(params: URLSearchParams): Partial<ShadingParams> {
  const overrides: { -readonly [K in keyof ShadingParams]?: number } = {};
  const ambient = numberParam(params, "ambient");
  const shininess = numberParam(params, "shininess");
  if (ambient !== undefined) overrides.ambientStrength = ambient;
  if (shininess !== undefined) overrides.shininess = shininess;
  return overrides;
}

import type { TextureDesc } from "./Renderer";

export interface Material {
  /** sRGB albedo; alpha passes straight through to the output. */
  diffuse: TextureDesc;
  /** Tangent-space normals encoded as v * 0.5 + 0.5. Omit for a flat surface. */
  normalMap?: TextureDesc;
}

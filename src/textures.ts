// Procedural textures for the demo — a checkerboard albedo and a matching
// normal map with bevelled tile edges.

import type { TextureDesc } from "./engine";

export function checkerboard(size: number, tileSize: number): TextureDesc {
  const data = new Uint8Array(size * size * 4);
  for (let row = 0; row < size; row++) {
    for (let col = 0; col < size; col++) {
      const i = (row * size + col) * 4;
      const v = (Math.floor(row / tileSize) + Math.floor(col / tileSize)) % 2 === 0 ? 220 : 80;
      data[i] = v;
      data[i + 1] = v;
      data[i + 2] = v;
      data[i + 3] = 255;
    }
  }
  return { width: size, height: size, data };
}

/**
 * Tangent-space normals encoded as n * 0.5 + 0.5; tile interiors are flat (0, 0, 1).
 * +Y follows increasing v, i.e. down the image, matching the bitangent from computeTangents.
 */
export function bevelNormalMap(size: number, tileSize: number, bevel: number): TextureDesc {
  const data = new Uint8Array(size * size * 4);
  for (let row = 0; row < size; row++) {
    for (let col = 0; col < size; col++) {
      const i = (row * size + col) * 4;
      const tx = col % tileSize;
      const ty = row % tileSize;
      let nx = 0, ny = 0, nz = 1;
      if (tx < bevel) nx = -0.7;
      else if (tx >= tileSize - bevel) nx = 0.7;
      if (ty < bevel) ny = -0.7;
      else if (ty >= tileSize - bevel) ny = 0.7;
      const len = Math.sqrt(nx * nx + ny * ny + nz * nz);
      nx /= len; ny /= len; nz /= len;
      data[i]     = Math.round((nx * 0.5 + 0.5) * 255);
      data[i + 1] = Math.round((ny * 0.5 + 0.5) * 255);
      data[i + 2] = Math.round((nz * 0.5 + 0.5) * 255);
      data[i + 3] = 255;
    }
  }
  return { width: size, height: size, data };
}

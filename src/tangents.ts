// Tangent calculation — computes per-vertex tangent and bitangent vectors for
// normal mapping.
//
// The surface program needs a TBN (Tangent, Bitangent, Normal) frame at each
// vertex so it can carry the light and eye into the normal map's space.
//
// Each triangle's tangent/bitangent come from its edge vectors and UV deltas:
//   T = (deltaPos1 * deltaUV2.v - deltaPos2 * deltaUV1.v) / det
//   B = (deltaPos2 * deltaUV1.u - deltaPos1 * deltaUV2.u) / det
// Shared vertices sum the contributions of every triangle that touches them.
//
// Input:  interleaved [px,py,pz, u,v, nx,ny,nz, ...] (8 floats/vertex) + triangle indices
// Output: interleaved [px,py,pz, u,v, nx,ny,nz, tx,ty,tz, bx,by,bz, ...] (14 floats/vertex)

import { vec3 } from "gl-matrix";

export function computeTangents(vertices: Float32Array, indices: Uint32Array) {
  const inStride = 8;  // 3 pos + 2 uv + 3 normal
  const outStride = 14; // + 3 tangent + 3 bitangent
  if (vertices.length % inStride !== 0) {
    throw new Error(`Vertex data must be a multiple of ${inStride} floats, got ${vertices.length}`);
  }
  if (indices.length % 3 !== 0) {
    throw new Error(`Index count must be a multiple of 3, got ${indices.length}`);
  }

  const vertexCount = vertices.length / inStride;
  const out = new Float32Array(vertexCount * outStride);

  const tangents = new Float32Array(vertexCount * 3);
  const bitangents = new Float32Array(vertexCount * 3);

  for (let i = 0; i < indices.length; i += 3) {
    const a = indices[i], b = indices[i + 1], c = indices[i + 2];
    if (a >= vertexCount || b >= vertexCount || c >= vertexCount) {
      throw new Error(`Triangle ${i / 3} references a vertex past ${vertexCount - 1}`);
    }
    const i0 = a * inStride, i1 = b * inStride, i2 = c * inStride;

    // Edge vectors
    const e1x = vertices[i1] - vertices[i0], e1y = vertices[i1 + 1] - vertices[i0 + 1], e1z = vertices[i1 + 2] - vertices[i0 + 2];
    const e2x = vertices[i2] - vertices[i0], e2y = vertices[i2 + 1] - vertices[i0 + 1], e2z = vertices[i2 + 2] - vertices[i0 + 2];

    // UV deltas
    const du1 = vertices[i1 + 3] - vertices[i0 + 3], dv1 = vertices[i1 + 4] - vertices[i0 + 4];
    const du2 = vertices[i2 + 3] - vertices[i0 + 3], dv2 = vertices[i2 + 4] - vertices[i0 + 4];

    const det = du1 * dv2 - du2 * dv1;
    // Zero UV area: no usable direction, contribute nothing
    if (Math.abs(det) <= 1e-8) continue;
    const invDet = 1.0 / det;

    const tx = (e1x * dv2 - e2x * dv1) * invDet;
    const ty = (e1y * dv2 - e2y * dv1) * invDet;
    const tz = (e1z * dv2 - e2z * dv1) * invDet;

    const bx = (e2x * du1 - e1x * du2) * invDet;
    const by = (e2y * du1 - e1y * du2) * invDet;
    const bz = (e2z * du1 - e1z * du2) * invDet;

    for (const v of [a, b, c]) {
      const ti = v * 3;
      tangents[ti] += tx;
      tangents[ti + 1] += ty;
      tangents[ti + 2] += tz;
      bitangents[ti] += bx;
      bitangents[ti + 1] += by;
      bitangents[ti + 2] += bz;
    }
  }

  const n = vec3.create();
  const t = vec3.create();
  const uvB = vec3.create();
  const bitangent = vec3.create();

  for (let i = 0; i < vertexCount; i++) {
    const inOff = i * inStride;
    const outOff = i * outStride;

    // Copy pos, uv, normal
    out.set(vertices.subarray(inOff, inOff + inStride), outOff);

    vec3.set(n, vertices[inOff + 5], vertices[inOff + 6], vertices[inOff + 7]);
    vec3.set(t, tangents[i * 3], tangents[i * 3 + 1], tangents[i * 3 + 2]);
    vec3.set(uvB, bitangents[i * 3], bitangents[i * 3 + 1], bitangents[i * 3 + 2]);

    // Gram-Schmidt: T = T - N * dot(N, T)
    vec3.scaleAndAdd(t, t, n, -vec3.dot(n, t));
    if (vec3.length(t) > 1e-8) {
      vec3.normalize(t, t);
      // B = N × T, flipped to follow the UV layout's v direction (mirrored UVs)
      vec3.cross(bitangent, n, t);
      if (vec3.dot(bitangent, uvB) < 0) vec3.negate(bitangent, bitangent);
    } else {
      vec3.set(t, 0, 0, 0);
      vec3.set(bitangent, 0, 0, 0);
    }

    out.set(t, outOff + 8);
    out.set(bitangent, outOff + 11);
  }

  return out;
}

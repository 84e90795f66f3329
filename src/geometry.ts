// Procedural meshes for the demo, in the tangent generator's input format.

export interface IndexedMesh {
  /** Interleaved [px,py,pz, u,v, nx,ny,nz, ...] (8 floats/vertex) */
  vertices: Float32Array;
  indices: Uint32Array;
}

type Axis = [number, number, number];

// [normal, u axis, v axis] per face, with u × v = normal so the face winds CCW from outside
const CUBE_FACES: [Axis, Axis, Axis][] = [
  [[1, 0, 0], [0, 0, -1], [0, 1, 0]],
  [[-1, 0, 0], [0, 0, 1], [0, 1, 0]],
  [[0, 1, 0], [1, 0, 0], [0, 0, -1]],
  [[0, -1, 0], [1, 0, 0], [0, 0, 1]],
  [[0, 0, 1], [1, 0, 0], [0, 1, 0]],
  [[0, 0, -1], [-1, 0, 0], [0, 1, 0]],
];

const CORNERS: [number, number][] = [[0, 0], [1, 0], [1, 1], [0, 1]];

/** Cube centred on the origin; each face maps the full [0,1] UV square (v down). */
export function makeCube(size = 1): IndexedMesh {
  const verts: number[] = [];
  const indices: number[] = [];

  CUBE_FACES.forEach(([n, u, v], face) => {
    for (const [s, t] of CORNERS) {
      const du = (s - 0.5) * size, dv = (t - 0.5) * size;
      // pos
      for (let k = 0; k < 3; k++) verts.push(n[k] * size * 0.5 + u[k] * du + v[k] * dv);
      // uv
      verts.push(s, 1 - t);
      // normal
      verts.push(...n);
    }
    const base = face * 4;
    indices.push(base, base + 1, base + 2, base, base + 2, base + 3);
  });

  return { vertices: new Float32Array(verts), indices: new Uint32Array(indices) };
}

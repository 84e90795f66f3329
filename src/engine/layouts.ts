// Layouts — byte sizes, packing, and vertex-buffer descriptions shared by the
// host pipeline setup and the WGSL programs. If a location, offset, or group
// index changes here, shaders.ts must change with it.

import type { CameraUniform, InstanceData, LightUniform } from "./Renderer";

const F32 = Float32Array.BYTES_PER_ELEMENT;

// ---------------------------------------------------------------------------
// Uniform blocks
// ---------------------------------------------------------------------------

export const CAMERA_UNIFORM_FLOATS = 20; // vec4 + mat4x4
export const CAMERA_UNIFORM_SIZE = CAMERA_UNIFORM_FLOATS * F32; // 80

export const LIGHT_UNIFORM_FLOATS = 8; // vec3 + pad, vec3 + pad
export const LIGHT_UNIFORM_SIZE = LIGHT_UNIFORM_FLOATS * F32; // 32

export function packCameraUniform(camera: CameraUniform) {
  const out = new Float32Array(CAMERA_UNIFORM_FLOATS);
  out.set(camera.viewPosition, 0);
  out.set(camera.viewProjection, 4);
  return out;
}

export function packLightUniform(light: LightUniform) {
  const out = new Float32Array(LIGHT_UNIFORM_FLOATS);
  out.set(light.position, 0);
  out.set(light.color, 4);
  return out;
}

// ---------------------------------------------------------------------------
// Vertex + instance buffers
// ---------------------------------------------------------------------------

/** pos(3) + uv(2) + normal(3) + tangent(3) + bitangent(3) */
export const VERTEX_FLOATS = 14;
export const VERTEX_STRIDE = VERTEX_FLOATS * F32; // 56

/** model mat4 (4 columns) + normal mat3 (3 columns) */
export const INSTANCE_FLOATS = 25;
export const INSTANCE_STRIDE = INSTANCE_FLOATS * F32; // 100

export const SURFACE_VERTEX_LAYOUT: GPUVertexBufferLayout = {
  arrayStride: VERTEX_STRIDE,
  stepMode: "vertex",
  attributes: [
    { shaderLocation: 0, offset: 0, format: "float32x3" },  // position
    { shaderLocation: 1, offset: 12, format: "float32x2" }, // uv
    { shaderLocation: 2, offset: 20, format: "float32x3" }, // normal
    { shaderLocation: 3, offset: 32, format: "float32x3" }, // tangent
    { shaderLocation: 4, offset: 44, format: "float32x3" }, // bitangent
  ],
};

// Stepped once per drawn copy. gl-matrix matrices are column-major, so each
// "row" of the buffer is one matrix column — exactly what mat4x4f(...) takes.
export const INSTANCE_LAYOUT: GPUVertexBufferLayout = {
  arrayStride: INSTANCE_STRIDE,
  stepMode: "instance",
  attributes: [
    { shaderLocation: 5, offset: 0, format: "float32x4" },
    { shaderLocation: 6, offset: 16, format: "float32x4" },
    { shaderLocation: 7, offset: 32, format: "float32x4" },
    { shaderLocation: 8, offset: 48, format: "float32x4" },
    { shaderLocation: 9, offset: 64, format: "float32x3" },
    { shaderLocation: 10, offset: 76, format: "float32x3" },
    { shaderLocation: 11, offset: 88, format: "float32x3" },
  ],
};

// Position only, but with the surface stride so the marker can draw any
// surface mesh's vertex buffer as-is.
export const LIGHT_MARKER_VERTEX_LAYOUT: GPUVertexBufferLayout = {
  arrayStride: VERTEX_STRIDE,
  stepMode: "vertex",
  attributes: [{ shaderLocation: 0, offset: 0, format: "float32x3" }],
};

export function packInstances(instances: readonly InstanceData[]) {
  const out = new Float32Array(instances.length * INSTANCE_FLOATS);
  instances.forEach((instance, i) => {
    const base = i * INSTANCE_FLOATS;
    out.set(instance.model, base);
    out.set(instance.normal, base + 16);
  });
  return out;
}

/** Validates interleaved surface vertex data + triangle indices before upload. */
export function checkMeshData(vertices: Float32Array, indices: Uint32Array): number {
  if (vertices.length === 0 || vertices.length % VERTEX_FLOATS !== 0) {
    throw new Error(`Vertex data must be a non-empty multiple of ${VERTEX_FLOATS} floats, got ${vertices.length}`);
  }
  if (indices.length % 3 !== 0) {
    throw new Error(`Index count must be a multiple of 3, got ${indices.length}`);
  }
  const vertexCount = vertices.length / VERTEX_FLOATS;
  for (const index of indices) {
    if (index >= vertexCount) {
      throw new Error(`Index ${index} out of range for ${vertexCount} vertices`);
    }
  }
  return vertexCount;
}

// ---------------------------------------------------------------------------
// Bind groups
// ---------------------------------------------------------------------------

/** Group numbering for the surface shading program. */
export const SURFACE_GROUPS = { material: 0, camera: 1, light: 2 } as const;

/** Group numbering for the light marker program. */
export const LIGHT_MARKER_GROUPS = { camera: 0, light: 1 } as const;

/** Binding slots inside the material group. */
export const MATERIAL_BINDINGS = {
  diffuseTexture: 0,
  diffuseSampler: 1,
  normalTexture: 2,
  normalSampler: 3,
} as const;

// Renderer — the data that flows between the host and the two shading programs.
//
// Everything here is plain data: per-frame uniforms (camera, light), per-vertex
// and per-instance attributes, and the handles the WebGPU backend hands out.
// The CPU reference in shading.ts and the WGSL in shaders.ts both consume these
// shapes, so the two stay in lock-step.

import type { mat3, mat4, vec2, vec3, vec4 } from "gl-matrix";

/** Camera block — 80 bytes on the GPU. */
export interface CameraUniform {
  /** World-space eye position, w = 1. */
  viewPosition: vec4;
  /** World → clip, WebGPU depth range [0, 1]. */
  viewProjection: mat4;
}

/** Light block — 32 bytes on the GPU (each vec3 padded to 16). */
export interface LightUniform {
  position: vec3;
  /** Linear RGB intensity; expected to be non-negative. */
  color: vec3;
}

/**
 * Per-draw uniform state. Passed explicitly to every draw (and to the CPU
 * reference) instead of living in a global "current frame".
 */
export interface FrameUniforms {
  camera: CameraUniform;
  light: LightUniform;
}

export interface ModelVertex {
  position: vec3;
  uv: vec2;
  normal: vec3;
  tangent: vec3;
  bitangent: vec3;
}

export interface InstanceData {
  /** Object → world. */
  model: mat4;
  /** Inverse-transpose of the model matrix's upper 3×3. */
  normal: mat3;
}

export interface TextureDesc {
  width: number;
  height: number;
  data: Uint8Array;
}

export interface MeshHandle {
  readonly indexCount: number;
}

export interface InstanceHandle {
  readonly count: number;
}

export interface MaterialHandle {
  // Opaque — the backend stores its bind group here.
}

/** One instanced surface draw. */
export interface DrawBatch {
  mesh: MeshHandle;
  material: MaterialHandle;
  instances: InstanceHandle;
}

/** What the backend needs to render one frame. */
export interface FrameDraws {
  batches: DrawBatch[];
  /** Mesh drawn by the light marker program; omitted to skip the marker. */
  lightMarker?: MeshHandle;
}

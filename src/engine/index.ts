export type {
  CameraUniform,
  LightUniform,
  FrameUniforms,
  ModelVertex,
  InstanceData,
  TextureDesc,
  MeshHandle,
  InstanceHandle,
  MaterialHandle,
  DrawBatch,
  FrameDraws,
} from "./Renderer";
export type { Material } from "./Material";
export type { ShadingParams } from "./params";
export { DEFAULT_SHADING_PARAMS, resolveShadingParams } from "./params";
export * from "./layouts";
export { surfaceShaderSource, lightMarkerShaderSource, wgslFloat } from "./shaders";
export type { TextureSampler, MaterialSamplers, SurfaceFragmentInput, LightMarkerFragmentInput, LightingTerms } from "./shading";
export { worldToTangent, surfaceVertex, surfaceFragment, blinnPhong, lightMarkerVertex, lightMarkerFragment } from "./shading";
export type { ShadingPipelines } from "./ShadingPipelines";
export { createShadingPipelines, DEPTH_FORMAT } from "./ShadingPipelines";
export type { CanvasSurface } from "./WebGPURenderer";
export { WebGPURenderer } from "./WebGPURenderer";
export { Transform, makeInstanceGrid } from "./Transform";
export { Camera } from "./Camera";
export { Light } from "./Light";
export { Scene } from "./Scene";
export { Engine } from "./Engine";

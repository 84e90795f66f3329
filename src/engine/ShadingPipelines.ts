// ShadingPipelines — bind group layouts + the two render pipelines, built once
// per device/format/params. Everything here must agree with layouts.ts and
// shaders.ts; WebGPU validates the match when the pipelines are created.

import {
  INSTANCE_LAYOUT,
  LIGHT_MARKER_VERTEX_LAYOUT,
  LIGHT_UNIFORM_SIZE,
  CAMERA_UNIFORM_SIZE,
  MATERIAL_BINDINGS,
  SURFACE_VERTEX_LAYOUT,
} from "./layouts";
import type { ShadingParams } from "./params";
import { lightMarkerShaderSource, surfaceShaderSource } from "./shaders";

export const DEPTH_FORMAT: GPUTextureFormat = "depth32float";

export interface ShadingPipelines {
  materialLayout: GPUBindGroupLayout;
  cameraLayout: GPUBindGroupLayout;
  lightLayout: GPUBindGroupLayout;
  surface: GPURenderPipeline;
  lightMarker: GPURenderPipeline;
}

function uniformLayout(device: GPUDevice, label: string, minBindingSize: number): GPUBindGroupLayout {
  return device.createBindGroupLayout({
    label,
    entries: [
      {
        binding: 0,
        visibility: GPUShaderStage.VERTEX | GPUShaderStage.FRAGMENT,
        buffer: { type: "uniform", minBindingSize },
      },
    ],
  });
}

export function createShadingPipelines(
  device: GPUDevice,
  colorFormat: GPUTextureFormat,
  params: ShadingParams,
): ShadingPipelines {
  const materialLayout = device.createBindGroupLayout({
    label: "material_bind_group_layout",
    entries: [
      { binding: MATERIAL_BINDINGS.diffuseTexture, visibility: GPUShaderStage.FRAGMENT, texture: { sampleType: "float" } },
      { binding: MATERIAL_BINDINGS.diffuseSampler, visibility: GPUShaderStage.FRAGMENT, sampler: { type: "filtering" } },
      { binding: MATERIAL_BINDINGS.normalTexture, visibility: GPUShaderStage.FRAGMENT, texture: { sampleType: "float" } },
      { binding: MATERIAL_BINDINGS.normalSampler, visibility: GPUShaderStage.FRAGMENT, sampler: { type: "filtering" } },
    ],
  });
  const cameraLayout = uniformLayout(device, "camera_bind_group_layout", CAMERA_UNIFORM_SIZE);
  const lightLayout = uniformLayout(device, "light_bind_group_layout", LIGHT_UNIFORM_SIZE);

  const primitive: GPUPrimitiveState = { topology: "triangle-list", frontFace: "ccw", cullMode: "back" };
  const depthStencil: GPUDepthStencilState = { format: DEPTH_FORMAT, depthWriteEnabled: true, depthCompare: "less" };
  // No blend state: fragment output replaces the target, alpha stays straight
  const targets: GPUColorTargetState[] = [{ format: colorFormat }];

  // ---- Surface pipeline (groups: material, camera, light) ----
  const surfaceModule = device.createShaderModule({ label: "Surface Shader", code: surfaceShaderSource(params) });
  const surface = device.createRenderPipeline({
    label: "Surface Pipeline",
    layout: device.createPipelineLayout({
      label: "Surface Pipeline Layout",
      bindGroupLayouts: [materialLayout, cameraLayout, lightLayout],
    }),
    vertex: { module: surfaceModule, entryPoint: "vs_main", buffers: [SURFACE_VERTEX_LAYOUT, INSTANCE_LAYOUT] },
    fragment: { module: surfaceModule, entryPoint: "fs_main", targets },
    primitive,
    depthStencil,
  });

  // ---- Light marker pipeline (groups: camera, light) ----
  const markerModule = device.createShaderModule({ label: "Light Marker Shader", code: lightMarkerShaderSource(params) });
  const lightMarker = device.createRenderPipeline({
    label: "Light Marker Pipeline",
    layout: device.createPipelineLayout({
      label: "Light Marker Pipeline Layout",
      bindGroupLayouts: [cameraLayout, lightLayout],
    }),
    vertex: { module: markerModule, entryPoint: "vs_main", buffers: [LIGHT_MARKER_VERTEX_LAYOUT] },
    fragment: { module: markerModule, entryPoint: "fs_main", targets },
    primitive,
    depthStencil,
  });

  return { materialLayout, cameraLayout, lightLayout, surface, lightMarker };
}

// WebGPURenderer — the host side of the two shading programs.
//
// Owns the device-level resources the programs read: camera + light uniform
// buffers (each in its own bind group so they can be rewritten per frame
// without touching materials), the depth target, and the per-mesh / per-material
// resources handed out as opaque handles.
//
// Frame order:
//   1. Light marker — unlit cube at the light position
//   2. Surfaces     — one instanced, indexed draw per batch

import type {
  FrameDraws,
  FrameUniforms,
  InstanceData,
  InstanceHandle,
  MaterialHandle,
  MeshHandle,
  TextureDesc,
} from "./Renderer";
import type { Material } from "./Material";
import {
  CAMERA_UNIFORM_SIZE,
  LIGHT_MARKER_GROUPS,
  LIGHT_UNIFORM_SIZE,
  MATERIAL_BINDINGS,
  SURFACE_GROUPS,
  checkMeshData,
  packCameraUniform,
  packInstances,
  packLightUniform,
} from "./layouts";
import { resolveShadingParams } from "./params";
import type { ShadingParams } from "./params";
import { DEPTH_FORMAT, createShadingPipelines } from "./ShadingPipelines";
import type { ShadingPipelines } from "./ShadingPipelines";

interface GPUMesh {
  vertexBuffer: GPUBuffer;
  indexBuffer: GPUBuffer;
}

/** The part of a canvas the renderer sizes itself from. */
export interface CanvasSurface {
  width: number;
  height: number;
  readonly clientWidth: number;
  readonly clientHeight: number;
}

const CLEAR_COLOR: GPUColor = { r: 0.1, g: 0.2, b: 0.3, a: 1.0 };
const FLAT_NORMAL = new Uint8Array([128, 128, 255, 255]);

export class WebGPURenderer {
  readonly device: GPUDevice;
  readonly params: ShadingParams;
  readonly pipelines: ShadingPipelines;

  private context: GPUCanvasContext;
  private canvas: CanvasSurface;

  private cameraBuffer: GPUBuffer;
  private lightBuffer: GPUBuffer;
  private cameraBindGroup: GPUBindGroup;
  private lightBindGroup: GPUBindGroup;
  private sampler: GPUSampler;
  private flatNormalView: GPUTextureView;
  private depthTex: GPUTexture | null = null;
  private depthView: GPUTextureView | null = null;

  // Handles are opaque to callers; the GPU side lives here.
  private meshes = new WeakMap<MeshHandle, GPUMesh>();
  private instanceBuffers = new WeakMap<InstanceHandle, GPUBuffer>();
  private materials = new WeakMap<MaterialHandle, GPUBindGroup>();

  private _width = 0;
  private _height = 0;

  constructor(
    device: GPUDevice,
    context: GPUCanvasContext,
    canvas: CanvasSurface,
    colorFormat: GPUTextureFormat,
    params: ShadingParams,
  ) {
    this.device = device;
    this.context = context;
    this.canvas = canvas;
    this.params = params;
    this.pipelines = createShadingPipelines(device, colorFormat, params);

    this.cameraBuffer = device.createBuffer({
      label: "Camera Buffer",
      size: CAMERA_UNIFORM_SIZE,
      usage: GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST,
    });
    this.lightBuffer = device.createBuffer({
      label: "Light Buffer",
      size: LIGHT_UNIFORM_SIZE,
      usage: GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST,
    });
    this.cameraBindGroup = device.createBindGroup({
      label: "camera_bind_group",
      layout: this.pipelines.cameraLayout,
      entries: [{ binding: 0, resource: { buffer: this.cameraBuffer } }],
    });
    this.lightBindGroup = device.createBindGroup({
      label: "light_bind_group",
      layout: this.pipelines.lightLayout,
      entries: [{ binding: 0, resource: { buffer: this.lightBuffer } }],
    });

    this.sampler = device.createSampler({
      magFilter: "linear",
      minFilter: "nearest",
      mipmapFilter: "nearest",
      addressModeU: "repeat",
      addressModeV: "repeat",
    });
    this.flatNormalView = this.uploadTexture({ width: 1, height: 1, data: FLAT_NORMAL }, "rgba8unorm").createView();
  }

  static async create(canvas: HTMLCanvasElement, overrides: Partial<ShadingParams> = {}): Promise<WebGPURenderer> {
    const params = resolveShadingParams(overrides);

    const adapter = await navigator.gpu.requestAdapter();
    if (!adapter) throw new Error("No WebGPU adapter found");
    const device = await adapter.requestDevice();

    const context = canvas.getContext("webgpu");
    if (!context) throw new Error("Failed to get WebGPU context");

    const format = navigator.gpu.getPreferredCanvasFormat();
    context.configure({ device, format, alphaMode: "opaque" });

    return new WebGPURenderer(device, context, canvas, format, params);
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  /** Match the drawing buffer to the canvas's CSS size; rebuilds depth when it changes. */
  resize(devicePixelRatio: number = window.devicePixelRatio || 1): void {
    const w = Math.max(1, Math.floor(this.canvas.clientWidth * devicePixelRatio));
    const h = Math.max(1, Math.floor(this.canvas.clientHeight * devicePixelRatio));
    if (this.canvas.width !== w || this.canvas.height !== h) {
      this.canvas.width = w;
      this.canvas.height = h;
    }
    if (this._width === w && this._height === h && this.depthTex) return;

    this._width = w;
    this._height = h;
    this.depthTex?.destroy();
    this.depthTex = this.device.createTexture({
      label: "depth_texture",
      size: [w, h],
      format: DEPTH_FORMAT,
      usage: GPUTextureUsage.RENDER_ATTACHMENT | GPUTextureUsage.TEXTURE_BINDING,
    });
    this.depthView = this.depthTex.createView();
  }

  /** Upload interleaved 14-float vertices (see computeTangents) and triangle indices. */
  createMesh(vertices: Float32Array, indices: Uint32Array, label = "Mesh"): MeshHandle {
    checkMeshData(vertices, indices);

    const vertexBuffer = this.device.createBuffer({
      label: `${label} Vertex Buffer`,
      size: vertices.byteLength,
      usage: GPUBufferUsage.VERTEX | GPUBufferUsage.COPY_DST,
      mappedAtCreation: true,
    });
    new Float32Array(vertexBuffer.getMappedRange()).set(vertices);
    vertexBuffer.unmap();

    // Index buffers must be a multiple of 4 bytes — uint32 always is
    const indexBuffer = this.device.createBuffer({
      label: `${label} Index Buffer`,
      size: Math.max(indices.byteLength, 4),
      usage: GPUBufferUsage.INDEX | GPUBufferUsage.COPY_DST,
      mappedAtCreation: true,
    });
    new Uint32Array(indexBuffer.getMappedRange()).set(indices);
    indexBuffer.unmap();

    const handle: MeshHandle = { indexCount: indices.length };
    this.meshes.set(handle, { vertexBuffer, indexBuffer });
    return handle;
  }

  createInstances(instances: readonly InstanceData[]): InstanceHandle {
    if (instances.length === 0) throw new Error("Instance list is empty");
    const data = packInstances(instances);

    const buffer = this.device.createBuffer({
      label: "Instance Buffer",
      size: data.byteLength,
      usage: GPUBufferUsage.VERTEX | GPUBufferUsage.COPY_DST,
    });
    this.device.queue.writeBuffer(buffer, 0, data);

    const handle: InstanceHandle = { count: instances.length };
    this.instanceBuffers.set(handle, buffer);
    return handle;
  }

  /** Diffuse is uploaded as sRGB; the normal map stays linear so v*2-1 recovers the vector. */
  createMaterial(material: Material): MaterialHandle {
    const diffuseView = this.uploadTexture(material.diffuse, "rgba8unorm-srgb").createView();
    const normalView = material.normalMap
      ? this.uploadTexture(material.normalMap, "rgba8unorm").createView()
      : this.flatNormalView;

    const bindGroup = this.device.createBindGroup({
      label: "material_bind_group",
      layout: this.pipelines.materialLayout,
      entries: [
        { binding: MATERIAL_BINDINGS.diffuseTexture, resource: diffuseView },
        { binding: MATERIAL_BINDINGS.diffuseSampler, resource: this.sampler },
        { binding: MATERIAL_BINDINGS.normalTexture, resource: normalView },
        { binding: MATERIAL_BINDINGS.normalSampler, resource: this.sampler },
      ],
    });

    const handle: MaterialHandle = {};
    this.materials.set(handle, bindGroup);
    return handle;
  }

  /** Write this frame's camera and light blocks. Materials are untouched. */
  writeFrame(frame: FrameUniforms): void {
    this.device.queue.writeBuffer(this.cameraBuffer, 0, packCameraUniform(frame.camera));
    this.device.queue.writeBuffer(this.lightBuffer, 0, packLightUniform(frame.light));
  }

  renderFrame(draws: FrameDraws): void {
    if (!this.depthView) throw new Error("renderFrame called before resize()");

    const encoder = this.device.createCommandEncoder({ label: "Render Encoder" });
    const pass = encoder.beginRenderPass({
      label: "Shading Pass",
      colorAttachments: [{
        view: this.context.getCurrentTexture().createView(),
        clearValue: CLEAR_COLOR,
        loadOp: "clear",
        storeOp: "store",
      }],
      depthStencilAttachment: {
        view: this.depthView,
        depthClearValue: 1.0,
        depthLoadOp: "clear",
        depthStoreOp: "store",
      },
    });
    this.encodeDraws(pass, draws);
    pass.end();
    this.device.queue.submit([encoder.finish()]);
  }

  /** Record the marker and surface draws into an open render pass. */
  encodeDraws(pass: GPURenderPassEncoder, draws: FrameDraws): void {
    if (draws.lightMarker) {
      const mesh = this.resolveMesh(draws.lightMarker);
      pass.setPipeline(this.pipelines.lightMarker);
      pass.setBindGroup(LIGHT_MARKER_GROUPS.camera, this.cameraBindGroup);
      pass.setBindGroup(LIGHT_MARKER_GROUPS.light, this.lightBindGroup);
      pass.setVertexBuffer(0, mesh.vertexBuffer);
      pass.setIndexBuffer(mesh.indexBuffer, "uint32");
      pass.drawIndexed(draws.lightMarker.indexCount, 1);
    }

    if (draws.batches.length === 0) return;

    pass.setPipeline(this.pipelines.surface);
    pass.setBindGroup(SURFACE_GROUPS.camera, this.cameraBindGroup);
    pass.setBindGroup(SURFACE_GROUPS.light, this.lightBindGroup);
    for (const batch of draws.batches) {
      const mesh = this.resolveMesh(batch.mesh);
      const instanceBuffer = this.instanceBuffers.get(batch.instances);
      if (!instanceBuffer) throw new Error("Instance handle was not created by this renderer");
      const material = this.materials.get(batch.material);
      if (!material) throw new Error("Material handle was not created by this renderer");

      pass.setBindGroup(SURFACE_GROUPS.material, material);
      pass.setVertexBuffer(0, mesh.vertexBuffer);
      pass.setVertexBuffer(1, instanceBuffer);
      pass.setIndexBuffer(mesh.indexBuffer, "uint32");
      pass.drawIndexed(batch.mesh.indexCount, batch.instances.count);
    }
  }

  private resolveMesh(handle: MeshHandle): GPUMesh {
    const mesh = this.meshes.get(handle);
    if (!mesh) throw new Error("Mesh handle was not created by this renderer");
    return mesh;
  }

  private uploadTexture(desc: TextureDesc, format: GPUTextureFormat): GPUTexture {
    if (desc.data.length !== desc.width * desc.height * 4) {
      throw new Error(`Texture data is ${desc.data.length} bytes, expected ${desc.width}x${desc.height}x4`);
    }
    const texture = this.device.createTexture({
      size: [desc.width, desc.height],
      format,
      usage: GPUTextureUsage.TEXTURE_BINDING | GPUTextureUsage.COPY_DST,
    });
    this.device.queue.writeTexture(
      { texture },
      new Uint8Array(desc.data),
      { bytesPerRow: desc.width * 4 },
      [desc.width, desc.height],
    );
    return texture;
  }
}

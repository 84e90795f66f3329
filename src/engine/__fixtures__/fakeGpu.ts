// In-process stand-in for the parts of WebGPU the renderer touches. Every
// object records what it was created with so tests can assert on it.

import { vi } from "vitest";

/** Node has no WebGPU flag enums; install the standard values for the duration of a test. */
export function stubWebGPUGlobals(): void {
  vi.stubGlobal("GPUShaderStage", { VERTEX: 0x1, FRAGMENT: 0x2, COMPUTE: 0x4 });
  vi.stubGlobal("GPUBufferUsage", {
    MAP_READ: 0x1, MAP_WRITE: 0x2, COPY_SRC: 0x4, COPY_DST: 0x8, INDEX: 0x10,
    VERTEX: 0x20, UNIFORM: 0x40, STORAGE: 0x80, INDIRECT: 0x100, QUERY_RESOLVE: 0x200,
  });
  vi.stubGlobal("GPUTextureUsage", {
    COPY_SRC: 0x1, COPY_DST: 0x2, TEXTURE_BINDING: 0x4, STORAGE_BINDING: 0x8, RENDER_ATTACHMENT: 0x10,
  });
}

/** Render pass that logs each command as one readable line. */
export function createFakePass() {
  const calls: string[] = [];
  const pass = {
    setPipeline: vi.fn((pipeline: GPURenderPipeline) => { calls.push(`pipeline ${pipeline.label}`); }),
    setBindGroup: vi.fn((index: number, group: GPUBindGroup | null) => { calls.push(`group ${index} ${group?.label}`); }),
    setVertexBuffer: vi.fn((slot: number, buffer: GPUBuffer | null) => { calls.push(`vertex ${slot} ${buffer?.label}`); }),
    setIndexBuffer: vi.fn((buffer: GPUBuffer, format: GPUIndexFormat) => { calls.push(`index ${buffer.label} ${format}`); }),
    drawIndexed: vi.fn((indexCount: number, instanceCount?: number) => { calls.push(`drawIndexed ${indexCount} ${instanceCount}`); }),
    end: vi.fn(() => { calls.push("end"); }),
  };
  return { calls, pass, encoder: pass as unknown as GPURenderPassEncoder };
}

export function createFakeDevice() {
  const renderPass = createFakePass();
  const commandBuffer = { label: "command buffer" };
  const commandEncoder = {
    beginRenderPass: vi.fn((_desc: GPURenderPassDescriptor) => renderPass.encoder),
    finish: vi.fn(() => commandBuffer),
  };

  const buffers: { label: string; size: number; usage: number; contents: ArrayBuffer }[] = [];
  const textures: { desc: GPUTextureDescriptor; view: { label: string; format: GPUTextureFormat }; destroy: () => void }[] = [];

  const fake = {
    createBindGroupLayout: vi.fn((desc: GPUBindGroupLayoutDescriptor) => ({ label: desc.label ?? "", desc })),
    createPipelineLayout: vi.fn((desc: GPUPipelineLayoutDescriptor) => ({ label: desc.label ?? "", desc })),
    createShaderModule: vi.fn((desc: GPUShaderModuleDescriptor) => ({ label: desc.label ?? "", code: desc.code })),
    createRenderPipeline: vi.fn((desc: GPURenderPipelineDescriptor) => ({ label: desc.label ?? "", desc })),
    createBindGroup: vi.fn((desc: GPUBindGroupDescriptor) => ({ label: desc.label ?? "", entries: Array.from(desc.entries) })),
    createSampler: vi.fn((desc?: GPUSamplerDescriptor) => ({ label: "sampler", desc })),
    createBuffer: vi.fn((desc: GPUBufferDescriptor) => {
      const contents = new ArrayBuffer(desc.size);
      const buffer = {
        label: desc.label ?? "",
        size: desc.size,
        usage: desc.usage,
        contents,
        getMappedRange: () => contents,
        unmap: vi.fn(),
        destroy: vi.fn(),
      };
      buffers.push(buffer);
      return buffer;
    }),
    createTexture: vi.fn((desc: GPUTextureDescriptor) => {
      const view = { label: `${desc.label ?? desc.format} view`, format: desc.format };
      const texture = { desc, view, createView: vi.fn(() => view), destroy: vi.fn() };
      textures.push(texture);
      return texture;
    }),
    createCommandEncoder: vi.fn((_desc?: GPUCommandEncoderDescriptor) => commandEncoder),
    queue: {
      writeBuffer: vi.fn((_buffer: GPUBuffer, _offset: number, _data: Float32Array) => {}),
      writeTexture: vi.fn((_dest: unknown, _data: Uint8Array, _layout: unknown, _size: unknown) => {}),
      submit: vi.fn((_commands: unknown[]) => {}),
    },
  };

  return {
    fake,
    buffers,
    textures,
    renderPass,
    commandBuffer,
    commandEncoder,
    device: fake as unknown as GPUDevice,
  };
}

export function createFakeContext() {
  const view = { label: "swapchain view" };
  return {
    view,
    context: { getCurrentTexture: () => ({ createView: () => view }) } as unknown as GPUCanvasContext,
  };
}

// WGSL programs. Constants from ShadingParams are inlined at pipeline-build
// time, so a pipeline's lighting response is fixed for its lifetime.
//
// Group numbers and vertex locations must match layouts.ts.

import { LIGHT_MARKER_GROUPS, MATERIAL_BINDINGS, SURFACE_GROUPS } from "./layouts";
import type { ShadingParams } from "./params";

/** Formats a number as a WGSL f32 literal (always with a decimal point or exponent). */
export function wgslFloat(value: number): string {
  const text = String(value);
  return /[.eE]/.test(text) ? text : `${text}.0`;
}

const CAMERA_STRUCT = /* wgsl */ `
struct Camera {
  view_pos: vec4f,
  view_proj: mat4x4f,
}
`;

const LIGHT_STRUCT = /* wgsl */ `
struct Light {
  position: vec3f,
  color: vec3f,
}
`;

export function surfaceShaderSource(params: ShadingParams): string {
  return /* wgsl */ `
const AMBIENT_STRENGTH: f32 = ${wgslFloat(params.ambientStrength)};
const SHININESS: f32 = ${wgslFloat(params.shininess)};
${CAMERA_STRUCT}
${LIGHT_STRUCT}
@group(${SURFACE_GROUPS.material}) @binding(${MATERIAL_BINDINGS.diffuseTexture}) var t_diffuse: texture_2d<f32>;
@group(${SURFACE_GROUPS.material}) @binding(${MATERIAL_BINDINGS.diffuseSampler}) var s_diffuse: sampler;
@group(${SURFACE_GROUPS.material}) @binding(${MATERIAL_BINDINGS.normalTexture}) var t_normal: texture_2d<f32>;
@group(${SURFACE_GROUPS.material}) @binding(${MATERIAL_BINDINGS.normalSampler}) var s_normal: sampler;
@group(${SURFACE_GROUPS.camera}) @binding(0) var<uniform> camera: Camera;
@group(${SURFACE_GROUPS.light}) @binding(0) var<uniform> light: Light;

struct VertexInput {
  @location(0) position: vec3f,
  @location(1) uv: vec2f,
  @location(2) normal: vec3f,
  @location(3) tangent: vec3f,
  @location(4) bitangent: vec3f,
}

struct InstanceInput {
  @location(5) model_0: vec4f,
  @location(6) model_1: vec4f,
  @location(7) model_2: vec4f,
  @location(8) model_3: vec4f,
  @location(9) normal_0: vec3f,
  @location(10) normal_1: vec3f,
  @location(11) normal_2: vec3f,
}

struct VertexOutput {
  @builtin(position) clip_position: vec4f,
  @location(0) uv: vec2f,
  @location(1) tangent_position: vec3f,
  @location(2) tangent_light_position: vec3f,
  @location(3) tangent_view_position: vec3f,
}

@vertex
fn vs_main(vertex: VertexInput, instance: InstanceInput) -> VertexOutput {
  let model = mat4x4f(instance.model_0, instance.model_1, instance.model_2, instance.model_3);
  let normal_matrix = mat3x3f(instance.normal_0, instance.normal_1, instance.normal_2);

  // Scale in the normal matrix denormalizes the basis — renormalize each axis
  let world_normal = normalize(normal_matrix * vertex.normal);
  let world_tangent = normalize(normal_matrix * vertex.tangent);
  let world_bitangent = normalize(normal_matrix * vertex.bitangent);

  // Orthonormal basis: transpose is the inverse (world → tangent)
  let tangent_matrix = transpose(mat3x3f(world_tangent, world_bitangent, world_normal));

  let world_position = model * vec4f(vertex.position, 1.0);

  var out: VertexOutput;
  out.clip_position = camera.view_proj * world_position;
  out.uv = vertex.uv;
  out.tangent_position = tangent_matrix * world_position.xyz;
  out.tangent_view_position = tangent_matrix * camera.view_pos.xyz;
  out.tangent_light_position = tangent_matrix * light.position;
  return out;
}

@fragment
fn fs_main(in: VertexOutput) -> @location(0) vec4f {
  let object_color = textureSample(t_diffuse, s_diffuse, in.uv);
  let object_normal = textureSample(t_normal, s_normal, in.uv);

  // [0,1] texel → [-1,1] tangent-space normal
  let tangent_normal = object_normal.xyz * 2.0 - 1.0;
  let light_dir = normalize(in.tangent_light_position - in.tangent_position);
  let view_dir = normalize(in.tangent_view_position - in.tangent_position);
  let half_dir = normalize(view_dir + light_dir);

  let ambient_color = light.color * AMBIENT_STRENGTH;

  let diffuse_strength = max(dot(tangent_normal, light_dir), 0.0);
  let diffuse_color = light.color * diffuse_strength;

  let specular_strength = pow(max(dot(tangent_normal, half_dir), 0.0), SHININESS);
  let specular_color = light.color * specular_strength;

  let result = (ambient_color + diffuse_color + specular_color) * object_color.rgb;
  return vec4f(result, object_color.a);
}
`;
}

export function lightMarkerShaderSource(params: ShadingParams): string {
  return /* wgsl */ `
const MARKER_SCALE: f32 = ${wgslFloat(params.markerScale)};
${CAMERA_STRUCT}
${LIGHT_STRUCT}
@group(${LIGHT_MARKER_GROUPS.camera}) @binding(0) var<uniform> camera: Camera;
@group(${LIGHT_MARKER_GROUPS.light}) @binding(0) var<uniform> light: Light;

struct VertexInput {
  @location(0) position: vec3f,
}

struct VertexOutput {
  @builtin(position) clip_position: vec4f,
  @location(0) color: vec3f,
}

@vertex
fn vs_main(model: VertexInput) -> VertexOutput {
  let world_position = model.position * MARKER_SCALE + light.position;
  var out: VertexOutput;
  out.clip_position = camera.view_proj * vec4f(world_position, 1.0);
  out.color = light.color;
  return out;
}

@fragment
fn fs_main(in: VertexOutput) -> @location(0) vec4f {
  return vec4f(in.color, 1.0);
}
`;
}

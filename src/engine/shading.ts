// CPU reference for both shading programs. Mirrors shaders.ts line for line
// with gl-matrix so the lighting math can be checked without a GPU.

import { mat3, vec3, vec4 } from "gl-matrix";
import type { ReadonlyMat3, ReadonlyVec2, ReadonlyVec3 } from "gl-matrix";
import type { FrameUniforms, InstanceData, LightUniform, ModelVertex } from "./Renderer";
import { DEFAULT_SHADING_PARAMS } from "./params";
import type { ShadingParams } from "./params";

/** Stands in for textureSample(): returns RGBA in [0, 1]. */
export type TextureSampler = (uv: ReadonlyVec2) => vec4;

export interface MaterialSamplers {
  diffuse: TextureSampler;
  normal: TextureSampler;
}

/** Interpolated values handed from the surface vertex stage to its fragment stage. */
export interface SurfaceFragmentInput {
  clipPosition: vec4;
  uv: ReadonlyVec2;
  tangentPosition: vec3;
  tangentLightPosition: vec3;
  tangentViewPosition: vec3;
}

export interface LightMarkerFragmentInput {
  clipPosition: vec4;
  worldPosition: vec3;
  color: vec3;
}

export interface LightingTerms {
  ambient: vec3;
  diffuse: vec3;
  specular: vec3;
}

/**
 * World → tangent transform for one vertex. The normal matrix carries the
 * basis into world space; the result is the transpose of [T B N], which is its
 * inverse only while the basis stays orthonormal.
 */
export function worldToTangent(vertex: ModelVertex, normalMatrix: ReadonlyMat3): mat3 {
  const n = vec3.normalize(vec3.create(), vec3.transformMat3(vec3.create(), vertex.normal, normalMatrix));
  const t = vec3.normalize(vec3.create(), vec3.transformMat3(vec3.create(), vertex.tangent, normalMatrix));
  const b = vec3.normalize(vec3.create(), vec3.transformMat3(vec3.create(), vertex.bitangent, normalMatrix));

  const tangentToWorld = mat3.fromValues(
    t[0], t[1], t[2],
    b[0], b[1], b[2],
    n[0], n[1], n[2],
  );
  return mat3.transpose(tangentToWorld, tangentToWorld);
}

export function surfaceVertex(vertex: ModelVertex, instance: InstanceData, frame: FrameUniforms): SurfaceFragmentInput {
  const tangentMatrix = worldToTangent(vertex, instance.normal);

  const worldPosition = vec4.transformMat4(
    vec4.create(),
    vec4.fromValues(vertex.position[0], vertex.position[1], vertex.position[2], 1),
    instance.model,
  );
  const clipPosition = vec4.transformMat4(vec4.create(), worldPosition, frame.camera.viewProjection);

  const world = vec3.fromValues(worldPosition[0], worldPosition[1], worldPosition[2]);
  const view = frame.camera.viewPosition;
  const eye = vec3.fromValues(view[0], view[1], view[2]);

  return {
    clipPosition,
    uv: vertex.uv,
    tangentPosition: vec3.transformMat3(vec3.create(), world, tangentMatrix),
    tangentViewPosition: vec3.transformMat3(vec3.create(), eye, tangentMatrix),
    tangentLightPosition: vec3.transformMat3(vec3.create(), frame.light.position, tangentMatrix),
  };
}

/** Ambient + Lambert diffuse + Blinn-Phong specular, each scaled by the light colour. */
export function blinnPhong(
  normal: ReadonlyVec3,
  lightDir: ReadonlyVec3,
  halfDir: ReadonlyVec3,
  lightColor: ReadonlyVec3,
  params: ShadingParams = DEFAULT_SHADING_PARAMS,
): LightingTerms {
  const diffuseStrength = Math.max(vec3.dot(normal, lightDir), 0);
  const specularStrength = Math.pow(Math.max(vec3.dot(normal, halfDir), 0), params.shininess);

  return {
    ambient: vec3.scale(vec3.create(), lightColor, params.ambientStrength),
    diffuse: vec3.scale(vec3.create(), lightColor, diffuseStrength),
    specular: vec3.scale(vec3.create(), lightColor, specularStrength),
  };
}

export function surfaceFragment(
  input: SurfaceFragmentInput,
  material: MaterialSamplers,
  light: LightUniform,
  params: ShadingParams = DEFAULT_SHADING_PARAMS,
): vec4 {
  const object = material.diffuse(input.uv);
  const sampled = material.normal(input.uv);
  const normal = vec3.fromValues(sampled[0] * 2 - 1, sampled[1] * 2 - 1, sampled[2] * 2 - 1);

  const lightDir = vec3.normalize(vec3.create(), vec3.subtract(vec3.create(), input.tangentLightPosition, input.tangentPosition));
  const viewDir = vec3.normalize(vec3.create(), vec3.subtract(vec3.create(), input.tangentViewPosition, input.tangentPosition));
  const halfDir = vec3.normalize(vec3.create(), vec3.add(vec3.create(), viewDir, lightDir));

  const { ambient, diffuse, specular } = blinnPhong(normal, lightDir, halfDir, light.color, params);
  const lit = vec3.add(vec3.create(), vec3.add(vec3.create(), ambient, diffuse), specular);

  return vec4.fromValues(lit[0] * object[0], lit[1] * object[1], lit[2] * object[2], object[3]);
}

export function lightMarkerVertex(
  position: ReadonlyVec3,
  frame: FrameUniforms,
  params: ShadingParams = DEFAULT_SHADING_PARAMS,
): LightMarkerFragmentInput {
  const worldPosition = vec3.scaleAndAdd(vec3.create(), frame.light.position, position, params.markerScale);
  const clipPosition = vec4.transformMat4(
    vec4.create(),
    vec4.fromValues(worldPosition[0], worldPosition[1], worldPosition[2], 1),
    frame.camera.viewProjection,
  );
  return { clipPosition, worldPosition, color: vec3.clone(frame.light.color) };
}

export function lightMarkerFragment(input: LightMarkerFragmentInput): vec4 {
  return vec4.fromValues(input.color[0], input.color[1], input.color[2], 1);
}

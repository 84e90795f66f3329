// main.ts — entry point. Builds the demo scene and starts the render loop.
//
// A grid of normal-mapped cubes, lit by a single light orbiting the Y axis.
// The light itself is drawn as a small flat-coloured cube by the marker
// program.
//
// Query parameters (all optional):
//   ?ambient=0.1     ambient factor
//   ?shininess=32    specular exponent
//   ?instances=10    cubes per grid row

import { vec3 } from "gl-matrix";
import { WebGPURenderer, Camera, Light, Scene, Engine, makeInstanceGrid } from "./engine";
import { makeCube } from "./geometry";
import { computeTangents } from "./tangents";
import { checkerboard, bevelNormalMap } from "./textures";
import { numberParam, shadingOverrides } from "./queryParams";

const SPACE_BETWEEN = 3.0;
const LIGHT_DEGREES_PER_SECOND = 60;
const TEX_SIZE = 64;

function getCanvas(): HTMLCanvasElement {
  const el = document.getElementById("canvas");
  if (!(el instanceof HTMLCanvasElement)) throw new Error("Missing <canvas id=\"canvas\">");
  return el;
}

// ---------------------------------------------------------------------------
// Configuration from the query string
// ---------------------------------------------------------------------------

const params = new URLSearchParams(window.location.search);

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main() {
  if (!navigator.gpu) throw new Error("WebGPU is not supported in this browser");

  const renderer = await WebGPURenderer.create(getCanvas(), shadingOverrides(params));
  console.log("Using WebGPU backend", renderer.params);
  renderer.resize();

  // Mesh: one cube shared by every instance and by the light marker
  const cube = makeCube(1.0);
  const cubeMesh = renderer.createMesh(computeTangents(cube.vertices, cube.indices), cube.indices, "Cube");
  console.log(`Built cube: ${cube.indices.length / 3} triangles`);

  const material = renderer.createMaterial({
    diffuse: checkerboard(TEX_SIZE, 8),
    normalMap: bevelNormalMap(TEX_SIZE, 8, 2),
  });

  const perRow = numberParam(params, "instances") ?? 10;
  const transforms = makeInstanceGrid(perRow, SPACE_BETWEEN);
  const instances = renderer.createInstances(transforms.map((t) => t.instanceData()));
  console.log(`Instances: ${instances.count}`);

  const camera = new Camera(
    vec3.fromValues(0, 5, 10),
    -Math.PI / 2,                // yaw −90°: looking down −Z
    (-20 * Math.PI) / 180,       // pitch −20°
    renderer.width,
    renderer.height,
  );

  const light = new Light(vec3.fromValues(2, 2, 2), vec3.fromValues(1, 1, 1));
  light.onUpdate = (dt) => light.orbit(dt, LIGHT_DEGREES_PER_SECOND);

  const scene = new Scene(camera, light);
  scene.add({ mesh: cubeMesh, material, instances });
  scene.lightMarker = cubeMesh;

  new Engine(renderer, scene).start();
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  const heading = document.createElement("h1");
  heading.style.cssText = "color:red;padding:2rem";
  heading.textContent = message;
  document.body.replaceChildren(heading);
  console.error(err);
});

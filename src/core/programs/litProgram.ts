// src/core/programs/litProgram.ts
import { vec3 } from "wgpu-matrix";
import type { Vec2, Vec3 } from "wgpu-matrix";
import type {
  CameraUniform,
  FragmentOutput,
  LightList,
  LitInstanceData,
  MaterialBindings,
  VertexInput,
} from "@/core/types/gpu";
import { DEFAULT_SHADING_CONFIG, type ShadingConfig } from "@/core/config";
import {
  transformLitVertex,
  type LitVertexOutput,
} from "@/core/shading/geometryTransformer";
import { accumulateIllumination } from "@/core/shading/illumination";
import { evaluateMaterial } from "@/core/shading/materialEvaluator";

/** Interpolated inputs of the lit fragment stage. */
export interface LitFragmentInput {
  texCoords: Vec2;
  worldPosition: Vec3;
  worldNormal: Vec3;
}

/** Vertex entry point of the lit mesh program. */
export function litVertex(
  vertex: VertexInput,
  camera: CameraUniform,
  instance: LitInstanceData,
): LitVertexOutput {
  return transformLitVertex(vertex, camera, instance.modelRows, instance.normalRows);
}

/**
 * Fragment entry point of the lit mesh program: accumulates the light block
 * at the fragment, then resolves the material against it.
 */
export function litFragment(
  input: LitFragmentInput,
  camera: CameraUniform,
  lights: LightList,
  material: MaterialBindings,
  config: Readonly<ShadingConfig> = DEFAULT_SHADING_CONFIG,
): FragmentOutput {
  const { viewPosition } = camera;
  const illumination = accumulateIllumination(
    {
      viewPosition: vec3.fromValues(viewPosition[0], viewPosition[1], viewPosition[2]),
      worldPosition: input.worldPosition,
      worldNormal: input.worldNormal,
    },
    lights,
    config,
  );
  return evaluateMaterial(material, input.texCoords, illumination);
}

// src/core/programs/uiProgram.ts
import { vec4 } from "wgpu-matrix";
import type { Vec2 } from "wgpu-matrix";
import type {
  CameraUniform,
  FragmentOutput,
  TextureSampler,
  VertexInput,
} from "@/core/types/gpu";
import type { RoundedRectShape, ShapeMode, UIInstanceData } from "@/core/types/ui";
import { DEFAULT_SHADING_CONFIG, type ShadingConfig } from "@/core/config";
import {
  transformVertex,
  type VertexOutput,
} from "@/core/shading/geometryTransformer";
import {
  NO_BORDERS,
  NO_RADII,
  shadeRoundedRect,
} from "@/core/shading/roundedRect";

/** Vertex entry point of the UI program. */
export function uiVertex(
  vertex: VertexInput,
  camera: CameraUniform,
  instance: UIInstanceData,
): VertexOutput {
  return transformVertex(vertex, camera, instance.modelRows);
}

/**
 * The shape a UI instance describes once its flags are applied: radii only
 * count with `round` set, borders only with `border` set.
 */
export function uiInstanceShape(instance: UIInstanceData): RoundedRectShape {
  return {
    dimensions: instance.dimensions,
    radii: instance.flags.round ? instance.radii : NO_RADII,
    borders: instance.flags.border ? instance.borders : NO_BORDERS,
  };
}

/**
 * Fragment entry point of the UI program.
 *
 * @remarks
 * The fill is the instance color, multiplied by the texel when `drawTexture`
 * is set and a texture is bound. Instances with neither `round` nor `border`
 * are plain quads and skip the edge evaluation.
 *
 * @param texCoords - Interpolated quad uv, origin top-left.
 * @param instance - The instance being drawn.
 * @param mode - How the edge signal is consumed.
 * @param texture - Optional bound texture.
 * @param config - Shading tunables.
 */
export function uiFragment(
  texCoords: Vec2,
  instance: UIInstanceData,
  mode: ShapeMode,
  texture?: TextureSampler,
  config: Readonly<ShadingConfig> = DEFAULT_SHADING_CONFIG,
): FragmentOutput {
  const fill =
    instance.flags.drawTexture && texture
      ? vec4.multiply(texture.sample(texCoords), instance.color)
      : vec4.clone(instance.color);

  if (!instance.flags.round && !instance.flags.border) {
    return { kind: "color", color: fill };
  }

  return shadeRoundedRect(
    texCoords,
    uiInstanceShape(instance),
    mode,
    fill,
    instance.borderColor,
    config,
  );
}

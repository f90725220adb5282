// src/core/shading/materialEvaluator.ts
import { vec4 } from "wgpu-matrix";
import type { Vec2, Vec3, Vec4 } from "wgpu-matrix";
import {
  AlphaMode,
  type FragmentOutput,
  type MaterialBindings,
  type TextureSampler,
} from "@/core/types/gpu";

/**
 * Maps the float stored in `metadata.z` to an {@link AlphaMode}. Unknown
 * values resolve to `Opaque` so a bad value never introduces transparency.
 */
export function resolveAlphaMode(value: number): AlphaMode {
  switch (value) {
    case AlphaMode.Mask:
      return AlphaMode.Mask;
    case AlphaMode.Blend:
      return AlphaMode.Blend;
    default:
      return AlphaMode.Opaque;
  }
}

/** Samples a bound texture, or returns opaque white when none is bound. */
export function sampleOrWhite(
  texture: TextureSampler | undefined,
  uv: Vec2,
): Vec4 {
  return texture ? texture.sample(uv) : vec4.fromValues(1, 1, 1, 1);
}

/**
 * Final color of a lit surface fragment.
 *
 * @remarks
 * `base = diffuseTexel * diffuseColor` is lit by `illumination`, then the
 * emissive texel tinted by `emissiveColor` is added unlit. Alpha follows
 * `metadata.alphaMode`:
 *
 * | Mode     | Output alpha                                        |
 * |:---------|:----------------------------------------------------|
 * | `Opaque` | 1                                                   |
 * | `Mask`   | discard when `base.a < alphaCutoff`, otherwise 1    |
 * | `Blend`  | `base.a`                                            |
 *
 * The roughness, normal and occlusion slots are not sampled.
 *
 * @param material - Material bind group.
 * @param texCoords - Interpolated uv.
 * @param illumination - Output of `accumulateIllumination`.
 */
export function evaluateMaterial(
  material: MaterialBindings,
  texCoords: Vec2,
  illumination: Vec3,
): FragmentOutput {
  const base = vec4.multiply(
    sampleOrWhite(material.diffuseTexture, texCoords),
    material.diffuseColor,
  );
  const emissive = vec4.multiply(
    sampleOrWhite(material.emissiveTexture, texCoords),
    material.emissiveColor,
  );

  const { alphaCutoff } = material.metadata;
  const mode = resolveAlphaMode(material.metadata.alphaMode);

  let alpha: number;
  switch (mode) {
    case AlphaMode.Mask:
      if (base[3] < alphaCutoff) return { kind: "discard" };
      alpha = 1;
      break;
    case AlphaMode.Blend:
      alpha = base[3];
      break;
    case AlphaMode.Opaque:
      alpha = 1;
      break;
  }

  return {
    kind: "color",
    color: vec4.fromValues(
      base[0] * illumination[0] + emissive[0],
      base[1] * illumination[1] + emissive[1],
      base[2] * illumination[2] + emissive[2],
      alpha,
    ),
  };
}

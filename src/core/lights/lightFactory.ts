// src/core/lights/lightFactory.ts
import { vec3 } from "wgpu-matrix";
import type { Vec3 } from "wgpu-matrix";
import type { Light } from "@/core/types/gpu";

type Vec3Like = Vec3 | readonly [number, number, number];

export interface PointLightOptions {
  position: Vec3Like;
  color?: Vec3Like;
  /** Defaults to `Infinity` (no distance falloff). */
  range?: number;
}

export interface SpotLightOptions extends PointLightOptions {
  direction: Vec3Like;
  /** Half-angle of the cone, in degrees. */
  angleDegrees: number;
  /** Softening exponent of the cone edge; defaults to 1. */
  exponent?: number;
}

function toVec3(v: Vec3Like): Vec3 {
  return vec3.fromValues(v[0], v[1], v[2]);
}

/** Creates an omni-directional light. */
export function createPointLight(options: PointLightOptions): Light {
  return {
    position: toVec3(options.position),
    range: options.range ?? Infinity,
    color: toVec3(options.color ?? [1, 1, 1]),
    exponent: 0,
    direction: vec3.fromValues(0, -1, 0),
  };
}

/**
 * Creates a spotlight.
 *
 * @remarks
 * The half-angle is stored as its cosine; the direction is normalized.
 *
 * @throws Error if the angle is outside `(0, 180]` or the direction is zero.
 */
export function createSpotLight(options: SpotLightOptions): Light {
  const { angleDegrees } = options;
  if (!(angleDegrees > 0 && angleDegrees <= 180)) {
    throw new Error(
      `[Lights] Spotlight half-angle must be in (0, 180] degrees, got ${angleDegrees}`,
    );
  }
  const direction = toVec3(options.direction);
  if (!(vec3.length(direction) > 0)) {
    throw new Error("[Lights] Spotlight direction must be a non-zero vector");
  }

  return {
    ...createPointLight(options),
    exponent: options.exponent ?? 1,
    direction: vec3.normalize(direction),
    cutoff: Math.cos((angleDegrees * Math.PI) / 180),
  };
}

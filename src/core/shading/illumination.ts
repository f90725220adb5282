// src/core/shading/illumination.ts
import { vec3 } from "wgpu-matrix";
import type { Vec3 } from "wgpu-matrix";
import type { Light, LightList } from "@/core/types/gpu";
import { DEFAULT_SHADING_CONFIG, type ShadingConfig } from "@/core/config";
import { saturate } from "./builtins";

/** The surface point being lit, in world space. */
export interface SurfaceSample {
  viewPosition: Vec3;
  worldPosition: Vec3;
  /** Need not be unit length; it is re-normalized before use. */
  worldNormal: Vec3;
}

/**
 * Linear falloff reaching zero at `range`. Lights with a non-positive or NaN
 * range never contribute; an infinite range never attenuates.
 */
export function distanceAttenuation(distance: number, range: number): number {
  if (!(range > 0)) return 0;
  return saturate(1 - distance / range);
}

/**
 * Number of lights a shading loop over `lightList` visits: `count` floored
 * and bounded by the list length. The packed light header stores the same
 * value.
 */
export function activeLightCount(lightList: LightList): number {
  return Math.min(Math.max(Math.floor(lightList.count), 0), lightList.lights.length);
}

/** True when the light restricts its emission to a cone. */
export function hasCutoff(
  light: Light,
  config: Readonly<ShadingConfig> = DEFAULT_SHADING_CONFIG,
): light is Light & { cutoff: number } {
  return light.cutoff !== undefined && light.cutoff <= config.omniCutoffThreshold;
}

/**
 * Soft-edged spotlight cone factor.
 *
 * @param light - The light being evaluated.
 * @param toLight - Unit vector from the surface towards the light.
 * @returns 1 for omni lights; 0 at or outside the cone edge
 *   (`dot(-toLight, direction) <= cutoff`); otherwise the normalized angular
 *   distance from the edge raised to `light.exponent`.
 */
export function spotAttenuation(
  light: Light,
  toLight: Vec3,
  config: Readonly<ShadingConfig> = DEFAULT_SHADING_CONFIG,
): number {
  if (!hasCutoff(light, config)) return 1;

  const direction = vec3.normalize(light.direction);
  const spotCos = -vec3.dot(toLight, direction);
  // the edge itself is dark: with exponent 0, pow(0, 0) would light it
  if (!(spotCos > light.cutoff)) return 0;

  const edge = saturate((spotCos - light.cutoff) / (1 - light.cutoff));
  return Math.pow(edge, Math.max(light.exponent, 0));
}

/**
 * Radiance one light delivers to a surface sample: the Lambert term, and the
 * Blinn-Phong highlight when `config.specular.enabled` is set.
 *
 * @returns RGB contribution; zero for lights sitting exactly on the surface
 *   point, out of range, or outside their cone.
 */
export function lightContribution(
  light: Light,
  surface: SurfaceSample,
  config: Readonly<ShadingConfig> = DEFAULT_SHADING_CONFIG,
): Vec3 {
  const out = vec3.create(0, 0, 0);

  const toLight = vec3.subtract(light.position, surface.worldPosition);
  const distance = vec3.length(toLight);
  if (!(distance > 0)) return out;
  vec3.scale(toLight, 1 / distance, toLight);

  const attenuation =
    distanceAttenuation(distance, light.range) *
    spotAttenuation(light, toLight, config);
  if (attenuation === 0) return out;

  const normal = vec3.normalize(surface.worldNormal);
  const lambert = Math.max(vec3.dot(normal, toLight), 0);
  vec3.scale(light.color, lambert * attenuation, out);

  const { specular } = config;
  if (specular.enabled && lambert > 0) {
    const toView = vec3.subtract(surface.viewPosition, surface.worldPosition);
    if (vec3.length(toView) > 0) {
      vec3.normalize(toView, toView);
      const halfway = vec3.normalize(vec3.add(toLight, toView));
      const highlight =
        Math.pow(Math.max(vec3.dot(normal, halfway), 0), specular.shininess) *
        specular.strength;
      vec3.addScaled(out, light.color, highlight * attenuation, out);
    }
  }

  return out;
}

/**
 * Total incoming radiance at a surface sample.
 *
 * @remarks
 * Sums {@link lightContribution} over the first `count` lights, then adds the
 * ambient term. The result is unclamped so callers can tone map HDR values.
 *
 * @param surface - Eye position, world position and normal of the fragment.
 * @param lightList - The light block; entries at or beyond `count` are not read.
 * @param config - Shading tunables.
 */
export function accumulateIllumination(
  surface: SurfaceSample,
  lightList: LightList,
  config: Readonly<ShadingConfig> = DEFAULT_SHADING_CONFIG,
): Vec3 {
  const total = vec3.create(0, 0, 0);
  const count = activeLightCount(lightList);

  for (let i = 0; i < count; i++) {
    vec3.add(total, lightContribution(lightList.lights[i], surface, config), total);
  }

  return vec3.add(total, lightList.ambient, total);
}

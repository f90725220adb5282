// src/shared/io/lightRigIO.ts
import { vec3 } from "wgpu-matrix";
import type { Light, LightList } from "@/core/types/gpu";

/**
 * A light rig as stored on disk.
 *
 * ```json
 * {
 *   "version": 1,
 *   "ambient": [0.1, 0.1, 0.1],
 *   "lights": [
 *     { "position": [0, 4, 0], "color": [1, 1, 1], "range": 10 },
 *     { "position": [0, 4, 0], "color": [1, 0.9, 0.8], "range": 12,
 *       "direction": [0, -1, 0], "cutoffDegrees": 30, "exponent": 2 }
 *   ]
 * }
 * ```
 */
export interface LightRigDocumentV1 {
  version: 1;
  ambient: [number, number, number];
  lights: LightRigEntry[];
}

export interface LightRigEntry {
  position: [number, number, number];
  color: [number, number, number];
  /** Omitted for lights without distance falloff. */
  range?: number;
  exponent?: number;
  direction?: [number, number, number];
  /** Spotlight half-angle; omitted for omni lights. */
  cutoffDegrees?: number;
}

export interface LightRigLimits {
  MAX_LIGHTS: number;
  POS_LIMIT: number;
  RANGE_LIMIT: number;
  INTENSITY_LIMIT: number;
  EXPONENT_LIMIT: number;
}

const DEFAULT_LIMITS: LightRigLimits = {
  MAX_LIGHTS: 1024,
  POS_LIMIT: 1e7,
  RANGE_LIMIT: 1e7,
  INTENSITY_LIMIT: 1e5,
  EXPONENT_LIMIT: 1024,
};

function isFiniteNumber(n: unknown): n is number {
  return typeof n === "number" && Number.isFinite(n);
}
function inRange(n: number, min: number, max: number): boolean {
  return n >= min && n <= max;
}
function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
function isVec3Within(a: unknown, limit: number): a is [number, number, number] {
  return (
    Array.isArray(a) &&
    a.length === 3 &&
    a.every((n) => isFiniteNumber(n) && inRange(n, -limit, limit))
  );
}

function toLight(entry: LightRigEntry): Light {
  const light: Light = {
    position: vec3.fromValues(...entry.position),
    range: entry.range ?? Infinity,
    color: vec3.fromValues(...entry.color),
    exponent: entry.exponent ?? 1,
    direction: vec3.normalize(vec3.fromValues(...(entry.direction ?? [0, -1, 0]))),
  };
  if (entry.cutoffDegrees !== undefined) {
    light.cutoff = Math.cos((entry.cutoffDegrees * Math.PI) / 180);
  }
  return light;
}

/**
 * Validates an untrusted light rig document.
 *
 * @param input - Parsed JSON.
 * @param limits - Overrides for the numeric limits.
 * @returns The rig as a light block, or every problem found, each prefixed
 *   with the JSON path it concerns.
 */
export function validateLightRig(
  input: unknown,
  limits: Partial<LightRigLimits> = {},
): { ok: true; rig: LightList } | { ok: false; errors: string[] } {
  const lim: LightRigLimits = { ...DEFAULT_LIMITS, ...limits };
  const errors: string[] = [];
  const err = (path: string, msg: string) => errors.push(`${path}: ${msg}`);

  if (!isRecord(input)) {
    return { ok: false, errors: ["$: document must be an object"] };
  }
  if (input.version !== 1) {
    return { ok: false, errors: ["$.version: must be 1"] };
  }
  const ambient = input.ambient;
  if (!isVec3Within(ambient, lim.INTENSITY_LIMIT)) {
    err("$.ambient", "must be [r,g,b] finite numbers");
  }
  const rawLights = input.lights;
  if (!Array.isArray(rawLights)) {
    err("$.lights", "must be an array");
    return { ok: false, errors };
  }
  if (rawLights.length > lim.MAX_LIGHTS) {
    err("$.lights", `exceeds MAX_LIGHTS=${lim.MAX_LIGHTS}`);
    return { ok: false, errors };
  }

  const entries: LightRigEntry[] = [];
  rawLights.forEach((raw: unknown, i) => {
    const path = `$.lights[${i}]`;
    if (!isRecord(raw)) {
      err(path, "must be an object");
      return;
    }
    const errorCount = errors.length;
    const { position, color, range, exponent, direction, cutoffDegrees } = raw;

    if (!isVec3Within(position, lim.POS_LIMIT)) {
      err(`${path}.position`, "must be [x,y,z] finite numbers");
    }
    if (!isVec3Within(color, lim.INTENSITY_LIMIT)) {
      err(`${path}.color`, "must be [r,g,b] finite numbers");
    }
    if (
      range !== undefined &&
      !(isFiniteNumber(range) && inRange(range, 0, lim.RANGE_LIMIT) && range > 0)
    ) {
      err(`${path}.range`, `must be in (0, ${lim.RANGE_LIMIT}]`);
    }
    if (
      exponent !== undefined &&
      !(isFiniteNumber(exponent) && inRange(exponent, 0, lim.EXPONENT_LIMIT))
    ) {
      err(`${path}.exponent`, `must be in [0, ${lim.EXPONENT_LIMIT}]`);
    }
    if (direction !== undefined) {
      if (!isVec3Within(direction, lim.POS_LIMIT)) {
        err(`${path}.direction`, "must be [x,y,z] finite numbers");
      } else if (vec3.length(vec3.fromValues(...direction)) === 0) {
        err(`${path}.direction`, "must be non-zero");
      }
    }
    if (cutoffDegrees !== undefined) {
      if (!(isFiniteNumber(cutoffDegrees) && cutoffDegrees > 0 && cutoffDegrees <= 180)) {
        err(`${path}.cutoffDegrees`, "must be in (0, 180]");
      }
      if (direction === undefined) {
        err(`${path}.direction`, "is required with cutoffDegrees");
      }
    }

    if (
      errors.length === errorCount &&
      isVec3Within(position, lim.POS_LIMIT) &&
      isVec3Within(color, lim.INTENSITY_LIMIT)
    ) {
      entries.push({
        position,
        color,
        range: isFiniteNumber(range) ? range : undefined,
        exponent: isFiniteNumber(exponent) ? exponent : undefined,
        direction: isVec3Within(direction, lim.POS_LIMIT) ? direction : undefined,
        cutoffDegrees: isFiniteNumber(cutoffDegrees) ? cutoffDegrees : undefined,
      });
    }
  });

  if (errors.length > 0 || !isVec3Within(ambient, lim.INTENSITY_LIMIT)) {
    return { ok: false, errors };
  }

  const lights = entries.map(toLight);
  return {
    ok: true,
    rig: {
      lights,
      count: lights.length,
      ambient: vec3.fromValues(...ambient),
    },
  };
}

/**
 * Validates and converts a light rig document.
 *
 * @throws Error listing every validation failure.
 */
export function loadLightRig(input: unknown, limits?: Partial<LightRigLimits>): LightList {
  const result = validateLightRig(input, limits);
  if (!result.ok) {
    console.warn(`[LightRigIO] Rejected light rig with ${result.errors.length} error(s)`);
    throw new Error(`Invalid light rig:\n${result.errors.join("\n")}`);
  }
  console.log(`[LightRigIO] Loaded ${result.rig.count} light(s)`);
  return result.rig;
}

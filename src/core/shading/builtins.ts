// src/core/shading/builtins.ts
// Scalar counterparts of the WGSL built-ins the shading programs rely on.

export function clamp(x: number, low: number, high: number): number {
  return Math.min(Math.max(x, low), high);
}

export function saturate(x: number): number {
  return clamp(x, 0, 1);
}

/** Linear interpolation: `a` at t = 0, `b` at t = 1. */
export function mix(a: number, b: number, t: number): number {
  return a * (1 - t) + b * t;
}

/**
 * Hermite interpolation between two edges, as WGSL's `smoothstep`.
 * Requires `edge0 < edge1`.
 */
export function smoothstep(edge0: number, edge1: number, x: number): number {
  const t = saturate((x - edge0) / (edge1 - edge0));
  return t * t * (3 - 2 * t);
}

/** Returns `x` when finite, otherwise `fallback`. */
export function finiteOr(x: number, fallback: number): number {
  return Number.isFinite(x) ? x : fallback;
}

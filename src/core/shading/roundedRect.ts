// src/core/shading/roundedRect.ts
import { vec4 } from "wgpu-matrix";
import type { Vec2, Vec4 } from "wgpu-matrix";
import type { FragmentOutput } from "@/core/types/gpu";
import {
  ShapeMode,
  type BorderWidths,
  type CornerRadii,
  type RoundedRectShape,
} from "@/core/types/ui";
import { DEFAULT_SHADING_CONFIG, type ShadingConfig } from "@/core/config";
import { clamp, finiteOr, mix, saturate, smoothstep } from "./builtins";

/** Unpacks radii from their wire order `(topRight, topLeft, bottomLeft, bottomRight)`. */
export function cornerRadiiFromVec4(v: ArrayLike<number>): CornerRadii {
  return { topRight: v[0], topLeft: v[1], bottomLeft: v[2], bottomRight: v[3] };
}

export function cornerRadiiToVec4(r: CornerRadii): Vec4 {
  return vec4.fromValues(r.topRight, r.topLeft, r.bottomLeft, r.bottomRight);
}

/** Unpacks border widths from their wire order `(top, bottom, right, left)`. */
export function borderWidthsFromVec4(v: ArrayLike<number>): BorderWidths {
  return { top: v[0], bottom: v[1], right: v[2], left: v[3] };
}

export function borderWidthsToVec4(b: BorderWidths): Vec4 {
  return vec4.fromValues(b.top, b.bottom, b.right, b.left);
}

export const NO_RADII: Readonly<CornerRadii> = Object.freeze({
  topRight: 0,
  topLeft: 0,
  bottomLeft: 0,
  bottomRight: 0,
});

export const NO_BORDERS: Readonly<BorderWidths> = Object.freeze({
  top: 0,
  bottom: 0,
  right: 0,
  left: 0,
});

/** A shape whose inputs have been made safe to evaluate. */
export interface SanitizedShape {
  width: number;
  height: number;
  /** False when a dimension is zero, negative or not finite. */
  hasArea: boolean;
  radii: CornerRadii;
  borders: BorderWidths;
}

/**
 * Replaces non-finite and negative radii/borders with 0 and clamps every
 * radius to half the shorter dimension, so oversized radii produce a
 * stadium instead of overlapping arcs.
 */
export function sanitizeShape(shape: RoundedRectShape): SanitizedShape {
  const width = finiteOr(shape.dimensions[0], 0);
  const height = finiteOr(shape.dimensions[1], 0);
  const hasArea = width > 0 && height > 0;
  const maxRadius = hasArea ? 0.5 * Math.min(width, height) : 0;

  const radius = (r: number) => clamp(finiteOr(r, 0), 0, maxRadius);
  const border = (b: number) => Math.max(finiteOr(b, 0), 0);

  return {
    width,
    height,
    hasArea,
    radii: {
      topRight: radius(shape.radii.topRight),
      topLeft: radius(shape.radii.topLeft),
      bottomLeft: radius(shape.radii.bottomLeft),
      bottomRight: radius(shape.radii.bottomRight),
    },
    borders: {
      top: border(shape.borders.top),
      bottom: border(shape.borders.bottom),
      right: border(shape.borders.right),
      left: border(shape.borders.left),
    },
  };
}

export type EdgeRegion = "corner" | "edge" | "empty";

/** Edge signal of a rounded rect at one surface coordinate. */
export interface EdgeSample {
  /** Positive inside, <= 0 at or outside the boundary, at most 1. */
  signal: number;
  /** Signal value at which the border band gives way to the fill. */
  borderRatio: number;
  region: EdgeRegion;
}

interface Corner {
  radius: number;
  cx: number;
  cy: number;
  /** Border of the vertical edge (left or right) meeting at this corner. */
  sideBorder: number;
  /** Border of the horizontal edge (top or bottom) meeting at this corner. */
  capBorder: number;
}

function findCorner(x: number, y: number, s: SanitizedShape): Corner | null {
  const { width, height, radii, borders } = s;

  // sharp corners are left to the edge margins
  if (radii.topLeft > 0 && x < radii.topLeft && y < radii.topLeft) {
    const r = radii.topLeft;
    return { radius: r, cx: r, cy: r, sideBorder: borders.left, capBorder: borders.top };
  }
  if (radii.topRight > 0 && x > width - radii.topRight && y < radii.topRight) {
    const r = radii.topRight;
    return { radius: r, cx: width - r, cy: r, sideBorder: borders.right, capBorder: borders.top };
  }
  if (radii.bottomLeft > 0 && x < radii.bottomLeft && y > height - radii.bottomLeft) {
    const r = radii.bottomLeft;
    return { radius: r, cx: r, cy: height - r, sideBorder: borders.left, capBorder: borders.bottom };
  }
  if (
    radii.bottomRight > 0 &&
    x > width - radii.bottomRight &&
    y > height - radii.bottomRight
  ) {
    const r = radii.bottomRight;
    return {
      radius: r,
      cx: width - r,
      cy: height - r,
      sideBorder: borders.right,
      capBorder: borders.bottom,
    };
  }
  return null;
}

function sampleCorner(x: number, y: number, corner: Corner, maxBorderRatio: number): EdgeSample {
  const dx = Math.abs(x - corner.cx);
  const dy = Math.abs(y - corner.cy);

  // blend the two adjacent border widths by angle so the band meets each
  // straight edge with that edge's own width
  const t = dx + dy > 0 ? dy / (dx + dy) : 0.5;
  const border = mix(corner.sideBorder, corner.capBorder, t);

  // same scale as the flat edge on the other side of the seam
  const scale = Math.max(corner.radius, border);
  return {
    signal: (corner.radius - Math.hypot(dx, dy)) / scale,
    borderRatio: Math.min(border / scale, maxBorderRatio),
    region: "corner",
  };
}

/**
 * Radius of the arcs along an edge at `pos`: the start corner's radius where
 * its arc ends, the end corner's where that arc begins, linear in between.
 */
function edgeRadius(pos: number, length: number, startRadius: number, endRadius: number): number {
  const span = length - startRadius - endRadius;
  const t = span > 0 ? saturate((pos - startRadius) / span) : 0.5;
  return mix(startRadius, endRadius, t);
}

function sampleEdges(x: number, y: number, s: SanitizedShape, maxBorderRatio: number): EdgeSample {
  const { width, height, radii, borders } = s;
  const edges = [
    { margin: y, border: borders.top, radius: edgeRadius(x, width, radii.topLeft, radii.topRight) },
    { margin: x, border: borders.left, radius: edgeRadius(y, height, radii.topLeft, radii.bottomLeft) },
    {
      margin: height - y,
      border: borders.bottom,
      radius: edgeRadius(x, width, radii.bottomLeft, radii.bottomRight),
    },
    {
      margin: width - x,
      border: borders.right,
      radius: edgeRadius(y, height, radii.topRight, radii.bottomRight),
    },
  ];

  let signal = Infinity;
  let borderRatio = 0;
  for (const edge of edges) {
    // the larger of the arc radius and the border width; a hard edge when
    // both are zero
    const scale = Math.max(edge.radius, edge.border);
    const edgeSignal = scale > 0 ? saturate(edge.margin / scale) : edge.margin > 0 ? 1 : 0;
    if (edgeSignal < signal) {
      signal = edgeSignal;
      borderRatio = edge.border > 0 ? Math.min(edge.border / scale, maxBorderRatio) : 0;
    }
  }

  return { signal, borderRatio, region: "edge" };
}

/**
 * Evaluates the rounded-rect edge signal at a normalized surface coordinate.
 *
 * @remarks
 * `p` is scaled by the shape's dimensions into shape space. Inside a corner's
 * radius box the signal is `(radius - |q - center|) / scale`; everywhere else
 * it is the smallest of the four per-edge margins, each divided by its scale
 * and clamped to `[0, 1]`. The scale is the larger of the local arc radius
 * and the local border width, so with borders no wider than the radii the
 * corner signal is `1 - |q - center| / radius` and both sides of each
 * corner seam agree. Shapes without area yield `0`.
 *
 * @param p - Surface coordinate in `[0, 1]²`, origin top-left.
 * @param shape - Dimensions, radii and border widths.
 * @param config - Provides the border ratio cap.
 */
export function sampleRoundedRect(
  p: Vec2 | readonly [number, number],
  shape: RoundedRectShape | SanitizedShape,
  config: Readonly<ShadingConfig> = DEFAULT_SHADING_CONFIG,
): EdgeSample {
  const s = "hasArea" in shape ? shape : sanitizeShape(shape);
  if (!s.hasArea) return { signal: 0, borderRatio: 0, region: "empty" };

  const x = p[0] * s.width;
  const y = p[1] * s.height;

  const corner = findCorner(x, y, s);
  return corner
    ? sampleCorner(x, y, corner, config.maxBorderRatio)
    : sampleEdges(x, y, s, config.maxBorderRatio);
}

/** Shorthand for `sampleRoundedRect(p, shape).signal`. */
export function edgeSignal(
  p: Vec2 | readonly [number, number],
  shape: RoundedRectShape | SanitizedShape,
): number {
  return sampleRoundedRect(p, shape).signal;
}

/**
 * Border-blend coloring of an edge sample: an anti-aliased fade at the outer
 * edge, the border color through the band, then a second transition into the
 * fill color that completes at `borderRatio`.
 *
 * @remarks
 * Bands narrower than twice `edgeSmoothing` shrink both transitions to fit,
 * so the fill is reached exactly at `borderRatio`.
 */
export function blendBorder(
  sample: EdgeSample,
  fillColor: Vec4,
  borderColor: Vec4,
  config: Readonly<ShadingConfig> = DEFAULT_SHADING_CONFIG,
): Vec4 {
  const { signal, borderRatio } = sample;
  if (signal <= 0) return vec4.create(0, 0, 0, 0);

  const aa = borderRatio > 0 ? Math.min(config.edgeSmoothing, borderRatio / 2) : config.edgeSmoothing;
  const outer = smoothstep(0, aa, signal);
  const inner =
    borderRatio > 0
      ? smoothstep(Math.max(borderRatio - config.edgeSmoothing, aa), borderRatio, signal)
      : 1;

  const color = vec4.lerp(borderColor, fillColor, inner);
  return vec4.scale(color, outer, color);
}

/**
 * Shades one fragment of a rounded rect in the requested consumption mode.
 *
 * @param p - Surface coordinate in `[0, 1]²`.
 * @param shape - Dimensions, radii and border widths.
 * @param mode - Selected by the calling program.
 * @param fillColor - Interior color.
 * @param borderColor - Border band color; only read in `BorderBlend` mode.
 * @param config - Shading tunables.
 */
export function shadeRoundedRect(
  p: Vec2 | readonly [number, number],
  shape: RoundedRectShape | SanitizedShape,
  mode: ShapeMode,
  fillColor: Vec4,
  borderColor: Vec4,
  config: Readonly<ShadingConfig> = DEFAULT_SHADING_CONFIG,
): FragmentOutput {
  const sample = sampleRoundedRect(p, shape, config);

  switch (mode) {
    case ShapeMode.Discard:
      return sample.signal > 0
        ? { kind: "color", color: vec4.clone(fillColor) }
        : { kind: "discard" };
    case ShapeMode.BorderBlend:
      return {
        kind: "color",
        color: blendBorder(sample, fillColor, borderColor, config),
      };
    case ShapeMode.RawDistance: {
      const d = Math.max(sample.signal, 0);
      return { kind: "color", color: vec4.create(d, d, d, d) };
    }
  }
}

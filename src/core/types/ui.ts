// src/core/types/ui.ts
import type { Vec2, Vec4 } from "wgpu-matrix";
import type { ModelMatrixRows } from "./gpu";

/**
 * Per-corner radii, in the same unit as the shape's surface coordinate.
 *
 * @remarks
 * On the wire the four radii travel as one vec4 in the fixed order
 * `(topRight, topLeft, bottomLeft, bottomRight)`. Surface coordinates have
 * their origin at the top-left corner with `y` growing downwards.
 */
export interface CornerRadii {
  topRight: number;
  topLeft: number;
  bottomLeft: number;
  bottomRight: number;
}

/**
 * Per-edge border widths. Wire order is `(top, bottom, right, left)`.
 */
export interface BorderWidths {
  top: number;
  bottom: number;
  right: number;
  left: number;
}

/** Analytic rounded rectangle in shape space. */
export interface RoundedRectShape {
  /** Shape-space extent; `[1, 1]` when radii are already in uv units. */
  dimensions: Vec2 | readonly [number, number];
  radii: CornerRadii;
  borders: BorderWidths;
}

/** How a fragment program consumes the rounded-rect edge signal. */
export enum ShapeMode {
  /** Hard edge: fill inside, discard at or outside the boundary. */
  Discard,
  /** Anti-aliased outer edge, border band, then fill. */
  BorderBlend,
  /** Grayscale edge signal for external compositing (shadows, glows). */
  RawDistance,
}

export interface UIInstanceFlags {
  round: boolean;
  border: boolean;
  drawTexture: boolean;
}

/** One UI drawable as read back from the instance buffer. */
export interface UIInstanceData {
  modelRows: ModelMatrixRows;
  color: Vec4;
  borderColor: Vec4;
  radii: CornerRadii;
  borders: BorderWidths;
  dimensions: Vec2;
  flags: UIInstanceFlags;
}

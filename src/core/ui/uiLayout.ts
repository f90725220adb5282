// src/core/ui/uiLayout.ts
import { mat4, vec2, vec3, vec4 } from "wgpu-matrix";
import type { Mat4, Vec2, Vec4 } from "wgpu-matrix";
import type { Mesh } from "@/core/types/gpu";
import type { BorderWidths, CornerRadii, UIInstanceData } from "@/core/types/ui";
import { decomposeModelMatrix } from "@/core/shading/geometryTransformer";
import { NO_BORDERS, NO_RADII } from "@/core/shading/roundedRect";

export enum UIUnits {
  Pixels,
  /** Percentage of the display width. */
  PercentWidth,
  /** Percentage of the display height. */
  PercentHeight,
}

export interface UILength {
  value: number;
  units: UIUnits;
}

export interface UISize {
  width: UILength;
  height: UILength;
}

/** Size of the render target, in pixels. */
export interface UIDisplay {
  width: number;
  height: number;
}

/** Placement of one UI element on screen. */
export interface UIRect {
  /** Top-left corner in pixels, `y` growing downwards. */
  position: Vec2 | readonly [number, number];
  size: UISize;
  /** Rotation about the rect's center in radians, clockwise on screen. */
  rotation?: number;
  /** Clip-space depth of the element, in `[0, 1]`. */
  layer?: number;
}

export interface UIStyle {
  color: Vec4;
  borderColor?: Vec4;
  /** Corner radii in pixels. */
  cornerRadii?: CornerRadii;
  /** Border widths in pixels. */
  borderWidths?: BorderWidths;
  /** Multiply the fill by the bound texture. */
  texture?: boolean;
}

/**
 * Unit quad spanning `[-1, 1]²` in the UI model space. Its uv origin is the
 * top-left corner, so the vertex at `y = -1` carries `v = 1`.
 */
export const UI_QUAD: Mesh = {
  vertices: [
    { position: vec3.fromValues(-1, -1, 0), texCoords: vec2.fromValues(0, 1), normal: vec3.fromValues(0, 0, 1) },
    { position: vec3.fromValues(1, -1, 0), texCoords: vec2.fromValues(1, 1), normal: vec3.fromValues(0, 0, 1) },
    { position: vec3.fromValues(1, 1, 0), texCoords: vec2.fromValues(1, 0), normal: vec3.fromValues(0, 0, 1) },
    { position: vec3.fromValues(-1, 1, 0), texCoords: vec2.fromValues(0, 0), normal: vec3.fromValues(0, 0, 1) },
  ],
  indices: [0, 1, 2, 0, 2, 3],
};

export function resolveLength(length: UILength, display: UIDisplay): number {
  switch (length.units) {
    case UIUnits.Pixels:
      return length.value;
    case UIUnits.PercentWidth:
      return (length.value / 100) * display.width;
    case UIUnits.PercentHeight:
      return (length.value / 100) * display.height;
  }
}

/** Resolves a size to pixels. */
export function resolveSize(size: UISize, display: UIDisplay): Vec2 {
  return vec2.fromValues(
    resolveLength(size.width, display),
    resolveLength(size.height, display),
  );
}

/**
 * Model matrix mapping {@link UI_QUAD} onto a pixel rect, in normalized
 * device coordinates.
 */
export function uiModelMatrix(
  center: Vec2,
  size: Vec2,
  rotation: number,
  layer: number,
  display: UIDisplay,
): Mat4 {
  // pixels (y down) -> NDC (y up)
  const m = mat4.translation([-1, 1, 0]);
  mat4.scale(m, [2 / display.width, -2 / display.height, 1], m);
  mat4.translate(m, [center[0], center[1], layer], m);
  mat4.rotateZ(m, rotation, m);
  // quad y = -1 is the bottom edge, which is +y in pixels
  return mat4.scale(m, [size[0] / 2, -size[1] / 2, 1], m);
}

/**
 * Lays out one UI element as a packed-ready instance.
 *
 * @remarks
 * Radii and border widths are divided by the larger side of the rect and
 * `dimensions` is the size over that same side, so the rounded-rect
 * evaluation runs in a unit-free space where the rect spans at most `1`.
 * The `round` and `border` flags are set when any radius or width is
 * positive.
 *
 * @throws Error if the display has no area.
 */
export function buildUIInstance(
  rect: UIRect,
  style: UIStyle,
  display: UIDisplay,
): UIInstanceData {
  if (!(display.width > 0 && display.height > 0)) {
    throw new Error(
      `[UILayout] Display must have a positive size, got ${display.width}x${display.height}`,
    );
  }

  const size = resolveSize(rect.size, display);
  const extent = Math.max(size[0], size[1]);
  if (!(size[0] > 0 && size[1] > 0)) {
    console.warn(
      `[UILayout] UI rect resolves to ${size[0]}x${size[1]} px and will not be visible`,
    );
  }
  const scale = extent > 0 ? 1 / extent : 0;

  const center = vec2.fromValues(
    rect.position[0] + size[0] / 2,
    rect.position[1] + size[1] / 2,
  );
  const model = uiModelMatrix(
    center,
    size,
    rect.rotation ?? 0,
    rect.layer ?? 0,
    display,
  );

  const r = style.cornerRadii ?? NO_RADII;
  const b = style.borderWidths ?? NO_BORDERS;
  const radii: CornerRadii = {
    topRight: r.topRight * scale,
    topLeft: r.topLeft * scale,
    bottomLeft: r.bottomLeft * scale,
    bottomRight: r.bottomRight * scale,
  };
  const borders: BorderWidths = {
    top: b.top * scale,
    bottom: b.bottom * scale,
    right: b.right * scale,
    left: b.left * scale,
  };

  return {
    modelRows: decomposeModelMatrix(model),
    color: vec4.clone(style.color),
    borderColor: style.borderColor ? vec4.clone(style.borderColor) : vec4.create(0, 0, 0, 0),
    radii,
    borders,
    dimensions: vec2.fromValues(size[0] * scale, size[1] * scale),
    flags: {
      round: Math.max(radii.topRight, radii.topLeft, radii.bottomLeft, radii.bottomRight) > 0,
      border: Math.max(borders.top, borders.bottom, borders.right, borders.left) > 0,
      drawTexture: style.texture === true,
    },
  };
}

// src/core/rendering/rasterizer.ts
import type { Vec4 } from "wgpu-matrix";
import type { FragmentOutput } from "@/core/types/gpu";
import type { Framebuffer } from "./framebuffer";

export enum BlendMode {
  /** Source overwrites destination. */
  Replace,
  /**
   * Color: `src * src.a + dst * (1 - src.a)`.
   * Alpha: `src.a + dst.a * (1 - src.a)`.
   */
  Alpha,
}

export interface RasterState {
  depthTest: boolean;
  depthWrite: boolean;
  blend: BlendMode;
}

export const DEFAULT_RASTER_STATE: Readonly<RasterState> = Object.freeze({
  depthTest: true,
  depthWrite: true,
  blend: BlendMode.Replace,
});

/** A vertex after the vertex stage. */
export interface ClipVertex {
  clipPosition: Vec4;
  /** Flat list of varyings, interpolated perspective-correctly. */
  varyings: readonly number[];
}

export type FragmentShader = (varyings: number[]) => FragmentOutput;

interface ScreenVertex {
  x: number;
  y: number;
  z: number;
  invW: number;
  varyings: readonly number[];
}

function toScreen(v: ClipVertex, target: Framebuffer): ScreenVertex {
  const [x, y, z, w] = v.clipPosition;
  const invW = 1 / w;
  return {
    x: (x * invW + 1) * 0.5 * target.width,
    y: (1 - y * invW) * 0.5 * target.height,
    z: z * invW,
    invW,
    varyings: v.varyings,
  };
}

function edge(ax: number, ay: number, bx: number, by: number, px: number, py: number): number {
  return (bx - ax) * (py - ay) - (by - ay) * (px - ax);
}

// A pixel center exactly on an edge belongs to one of the two triangles
// sharing it: the one that sees the edge going down, or left when flat.
function ownsEdge(a: ScreenVertex, b: ScreenVertex): boolean {
  const dy = b.y - a.y;
  return dy > 0 || (dy === 0 && b.x - a.x < 0);
}

function writeColor(
  target: Framebuffer,
  pixel: number,
  src: Vec4,
  blend: BlendMode,
): void {
  const i = pixel * 4;
  const c = target.color;
  if (blend === BlendMode.Replace) {
    c[i] = src[0];
    c[i + 1] = src[1];
    c[i + 2] = src[2];
    c[i + 3] = src[3];
    return;
  }
  const a = src[3];
  c[i] = src[0] * a + c[i] * (1 - a);
  c[i + 1] = src[1] * a + c[i + 1] * (1 - a);
  c[i + 2] = src[2] * a + c[i + 2] * (1 - a);
  c[i + 3] = a + c[i + 3] * (1 - a);
}

/**
 * Rasterizes one triangle into `target`, sampling at pixel centers.
 *
 * @remarks
 * Triangles with a vertex at or behind the eye (`w <= 0`) are dropped, and
 * fragments whose depth falls outside `[0, 1]` are clipped. Both windings
 * are drawn. A `discard` from the fragment shader writes neither color nor
 * depth.
 *
 * @returns The number of fragments written.
 */
export function rasterizeTriangle(
  target: Framebuffer,
  vertices: readonly [ClipVertex, ClipVertex, ClipVertex],
  shade: FragmentShader,
  state: Readonly<RasterState> = DEFAULT_RASTER_STATE,
): number {
  if (vertices.some((v) => !(v.clipPosition[3] > 0))) return 0;

  const v0 = toScreen(vertices[0], target);
  let v1 = toScreen(vertices[1], target);
  let v2 = toScreen(vertices[2], target);

  let area = edge(v0.x, v0.y, v1.x, v1.y, v2.x, v2.y);
  if (area === 0 || !Number.isFinite(area)) return 0;
  if (area < 0) {
    [v1, v2] = [v2, v1];
    area = -area;
  }

  const minX = Math.max(0, Math.floor(Math.min(v0.x, v1.x, v2.x)));
  const maxX = Math.min(target.width - 1, Math.ceil(Math.max(v0.x, v1.x, v2.x)));
  const minY = Math.max(0, Math.floor(Math.min(v0.y, v1.y, v2.y)));
  const maxY = Math.min(target.height - 1, Math.ceil(Math.max(v0.y, v1.y, v2.y)));

  const own12 = ownsEdge(v1, v2);
  const own20 = ownsEdge(v2, v0);
  const own01 = ownsEdge(v0, v1);
  const varyingCount = Math.min(
    v0.varyings.length,
    v1.varyings.length,
    v2.varyings.length,
  );

  let written = 0;
  for (let py = minY; py <= maxY; py++) {
    for (let px = minX; px <= maxX; px++) {
      const sx = px + 0.5;
      const sy = py + 0.5;
      const w0 = edge(v1.x, v1.y, v2.x, v2.y, sx, sy);
      const w1 = edge(v2.x, v2.y, v0.x, v0.y, sx, sy);
      const w2 = edge(v0.x, v0.y, v1.x, v1.y, sx, sy);
      if (w0 < 0 || w1 < 0 || w2 < 0) continue;
      if ((w0 === 0 && !own12) || (w1 === 0 && !own20) || (w2 === 0 && !own01)) {
        continue;
      }

      const b0 = w0 / area;
      const b1 = w1 / area;
      const b2 = w2 / area;

      const z = b0 * v0.z + b1 * v1.z + b2 * v2.z;
      if (z < 0 || z > 1) continue;
      const pixel = target.index(px, py);
      if (state.depthTest && !(z < target.depth[pixel])) continue;

      const p0 = b0 * v0.invW;
      const p1 = b1 * v1.invW;
      const p2 = b2 * v2.invW;
      const norm = 1 / (p0 + p1 + p2);
      const varyings = new Array<number>(varyingCount);
      for (let k = 0; k < varyingCount; k++) {
        varyings[k] =
          (p0 * v0.varyings[k] + p1 * v1.varyings[k] + p2 * v2.varyings[k]) * norm;
      }

      const out = shade(varyings);
      if (out.kind === "discard") continue;

      writeColor(target, pixel, out.color, state.blend);
      if (state.depthWrite) target.depth[pixel] = z;
      written++;
    }
  }
  return written;
}

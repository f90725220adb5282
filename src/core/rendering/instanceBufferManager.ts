// src/core/rendering/instanceBufferManager.ts
import { vec2, vec3, vec4 } from "wgpu-matrix";
import type { Mat4, Vec4 } from "wgpu-matrix";
import type { LitInstanceData, ModelMatrixRows } from "@/core/types/gpu";
import type { UIInstanceData } from "@/core/types/ui";
import {
  computeNormalMatrix,
  decomposeModelMatrix,
  decomposeNormalMatrix,
} from "@/core/shading/geometryTransformer";
import {
  borderWidthsFromVec4,
  cornerRadiiFromVec4,
} from "@/core/shading/roundedRect";

/** model(16) + normal(9). */
export const LIT_INSTANCE_STRIDE_IN_FLOATS = 25;
/** model(16) + color(4) + borderColor(4) + radii(4) + borders(4) + dimensions(4) + flags(4). */
export const UI_INSTANCE_STRIDE_IN_FLOATS = 40;

/** Builds the packed form of a lit instance from its model matrix. */
export function litInstanceFromModel(model: Mat4): LitInstanceData {
  return {
    modelRows: decomposeModelMatrix(model),
    normalRows: decomposeNormalMatrix(computeNormalMatrix(model)),
  };
}

function writeRows(
  dst: Float32Array,
  offset: number,
  rows: readonly ArrayLike<number>[],
  width: number,
): void {
  for (let r = 0; r < rows.length; r++) {
    for (let c = 0; c < width; c++) {
      dst[offset + r * width + c] = rows[r][c];
    }
  }
}

function readVec4(src: Float32Array, offset: number): Vec4 {
  return vec4.fromValues(src[offset], src[offset + 1], src[offset + 2], src[offset + 3]);
}

function readModelRows(src: Float32Array, offset: number): ModelMatrixRows {
  return [
    readVec4(src, offset),
    readVec4(src, offset + 4),
    readVec4(src, offset + 8),
    readVec4(src, offset + 12),
  ];
}

/**
 * Packs per-instance data for lit meshes and UI quads into reusable
 * CPU-side buffers, one per instance layout.
 *
 * @remarks
 * Capacity grows by a factor of 1.5 whenever a frame needs more instances
 * than the buffer holds. The returned views cover exactly the packed
 * instances and are valid until the next pack of the same layout.
 */
export class InstanceBufferManager {
  private litBuffer: Float32Array;
  private uiBuffer: Float32Array;
  private litCapacity = 0;
  private uiCapacity = 0;

  constructor(initialCapacity = 64) {
    this.litBuffer = new Float32Array(0);
    this.uiBuffer = new Float32Array(0);
    this.ensureLitCapacity(initialCapacity);
    this.ensureUICapacity(initialCapacity);
  }

  public getLitCapacity(): number {
    return this.litCapacity;
  }

  public getUICapacity(): number {
    return this.uiCapacity;
  }

  private ensureLitCapacity(requiredInstances: number): void {
    if (requiredInstances <= this.litCapacity) return;
    this.litCapacity = Math.ceil(Math.max(requiredInstances, this.litCapacity) * 1.5);
    this.litBuffer = new Float32Array(this.litCapacity * LIT_INSTANCE_STRIDE_IN_FLOATS);
  }

  private ensureUICapacity(requiredInstances: number): void {
    if (requiredInstances <= this.uiCapacity) return;
    this.uiCapacity = Math.ceil(Math.max(requiredInstances, this.uiCapacity) * 1.5);
    this.uiBuffer = new Float32Array(this.uiCapacity * UI_INSTANCE_STRIDE_IN_FLOATS);
  }

  /**
   * Packs lit instances back to back.
   *
   * | Offset (Floats) | Member         |
   * |:----------------|:---------------|
   * | 0-15            | model rows     |
   * | 16-24           | normal rows    |
   */
  public packLitInstances(instances: readonly LitInstanceData[]): Float32Array {
    this.ensureLitCapacity(instances.length);
    for (let i = 0; i < instances.length; i++) {
      const offset = i * LIT_INSTANCE_STRIDE_IN_FLOATS;
      writeRows(this.litBuffer, offset, instances[i].modelRows, 4);
      writeRows(this.litBuffer, offset + 16, instances[i].normalRows, 3);
    }
    return this.litBuffer.subarray(0, instances.length * LIT_INSTANCE_STRIDE_IN_FLOATS);
  }

  /**
   * Packs UI instances back to back.
   *
   * | Offset (Floats) | Member                                   |
   * |:----------------|:-----------------------------------------|
   * | 0-15            | model rows                               |
   * | 16-19           | color                                    |
   * | 20-23           | border color                             |
   * | 24-27           | radii `(tr, tl, bl, br)`                 |
   * | 28-31           | borders `(top, bottom, right, left)`     |
   * | 32-35           | dimensions `(x, y, 0, 0)`                |
   * | 36-39           | flags `(round, border, drawTexture, 0)`  |
   */
  public packUIInstances(instances: readonly UIInstanceData[]): Float32Array {
    this.ensureUICapacity(instances.length);
    const dst = this.uiBuffer;
    for (let i = 0; i < instances.length; i++) {
      const inst = instances[i];
      const o = i * UI_INSTANCE_STRIDE_IN_FLOATS;
      writeRows(dst, o, inst.modelRows, 4);
      dst.set(inst.color, o + 16);
      dst.set(inst.borderColor, o + 20);

      dst[o + 24] = inst.radii.topRight;
      dst[o + 25] = inst.radii.topLeft;
      dst[o + 26] = inst.radii.bottomLeft;
      dst[o + 27] = inst.radii.bottomRight;

      dst[o + 28] = inst.borders.top;
      dst[o + 29] = inst.borders.bottom;
      dst[o + 30] = inst.borders.right;
      dst[o + 31] = inst.borders.left;

      dst[o + 32] = inst.dimensions[0];
      dst[o + 33] = inst.dimensions[1];
      dst[o + 34] = 0;
      dst[o + 35] = 0;

      dst[o + 36] = inst.flags.round ? 1 : 0;
      dst[o + 37] = inst.flags.border ? 1 : 0;
      dst[o + 38] = inst.flags.drawTexture ? 1 : 0;
      dst[o + 39] = 0;
    }
    return dst.subarray(0, instances.length * UI_INSTANCE_STRIDE_IN_FLOATS);
  }
}

function requireInstance(
  what: string,
  data: Float32Array,
  index: number,
  stride: number,
): number {
  const offset = index * stride;
  if (!Number.isInteger(index) || index < 0 || offset + stride > data.length) {
    throw new Error(
      `[InstanceBufferManager] ${what} instance ${index} out of bounds (buffer holds ${Math.floor(data.length / stride)})`,
    );
  }
  return offset;
}

/** Decodes one lit instance from a buffer written by `packLitInstances`. */
export function readLitInstance(data: Float32Array, index: number): LitInstanceData {
  const o = requireInstance("Lit", data, index, LIT_INSTANCE_STRIDE_IN_FLOATS);
  const n = o + 16;
  return {
    modelRows: readModelRows(data, o),
    normalRows: [
      vec3.fromValues(data[n], data[n + 1], data[n + 2]),
      vec3.fromValues(data[n + 3], data[n + 4], data[n + 5]),
      vec3.fromValues(data[n + 6], data[n + 7], data[n + 8]),
    ],
  };
}

/** Decodes one UI instance from a buffer written by `packUIInstances`. */
export function readUIInstance(data: Float32Array, index: number): UIInstanceData {
  const o = requireInstance("UI", data, index, UI_INSTANCE_STRIDE_IN_FLOATS);
  return {
    modelRows: readModelRows(data, o),
    color: readVec4(data, o + 16),
    borderColor: readVec4(data, o + 20),
    radii: cornerRadiiFromVec4(data.subarray(o + 24, o + 28)),
    borders: borderWidthsFromVec4(data.subarray(o + 28, o + 32)),
    dimensions: vec2.fromValues(data[o + 32], data[o + 33]),
    flags: {
      round: data[o + 36] !== 0,
      border: data[o + 37] !== 0,
      drawTexture: data[o + 38] !== 0,
    },
  };
}

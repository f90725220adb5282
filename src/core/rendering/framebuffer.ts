// src/core/rendering/framebuffer.ts
import { vec4 } from "wgpu-matrix";
import type { Vec4 } from "wgpu-matrix";

/**
 * CPU render target: linear RGBA float color plus a depth plane.
 * Pixel `(0, 0)` is the top-left corner.
 */
export class Framebuffer {
  public readonly color: Float32Array;
  public readonly depth: Float32Array;

  constructor(
    public readonly width: number,
    public readonly height: number,
  ) {
    if (!(Number.isInteger(width) && Number.isInteger(height) && width > 0 && height > 0)) {
      throw new Error(`[Framebuffer] Invalid size ${width}x${height}`);
    }
    this.color = new Float32Array(width * height * 4);
    this.depth = new Float32Array(width * height).fill(1);
  }

  public clear(color: Vec4 = vec4.create(0, 0, 0, 0), depth = 1): void {
    for (let i = 0; i < this.width * this.height; i++) {
      this.color.set(color, i * 4);
    }
    this.depth.fill(depth);
  }

  public index(x: number, y: number): number {
    return y * this.width + x;
  }

  public readPixel(x: number, y: number): Vec4 {
    const i = this.index(x, y) * 4;
    return vec4.fromValues(this.color[i], this.color[i + 1], this.color[i + 2], this.color[i + 3]);
  }

  public readDepth(x: number, y: number): number {
    return this.depth[this.index(x, y)];
  }
}

// src/core/lights/lightRegistry.ts
import { vec3 } from "wgpu-matrix";
import type { Vec3 } from "wgpu-matrix";
import type { Light, LightList } from "@/core/types/gpu";
import type { UniformManager } from "@/core/rendering/uniformManager";

export type LightId = string | number;

/**
 * Owns the scene's lights and ambient color and repacks the light buffer
 * only when something changed.
 *
 * @remarks
 * Lights keep insertion order, so the packed buffer is stable from frame to
 * frame. Mutating a light object in place does not mark the registry dirty;
 * call {@link LightRegistry.markDirty} afterwards.
 */
export class LightRegistry {
  private lights = new Map<LightId, Light>();
  private ambient: Vec3 = vec3.create(0, 0, 0);
  private dirty = true;

  /** Adds a light, replacing any light already registered under `id`. */
  public addLight(id: LightId, light: Light): void {
    if (!(light.range > 0)) {
      console.warn(
        `[LightRegistry] Light "${id}" has range ${light.range}; it will not contribute`,
      );
    }
    this.lights.set(id, light);
    this.dirty = true;
  }

  /** @returns False when no light was registered under `id`. */
  public removeLight(id: LightId): boolean {
    const removed = this.lights.delete(id);
    if (removed) this.dirty = true;
    return removed;
  }

  public clearLights(): void {
    if (this.lights.size === 0) return;
    this.lights.clear();
    this.dirty = true;
  }

  public getLight(id: LightId): Light | undefined {
    return this.lights.get(id);
  }

  public getLightCount(): number {
    return this.lights.size;
  }

  public setAmbientColor(color: Vec3 | readonly [number, number, number]): void {
    vec3.set(color[0], color[1], color[2], this.ambient);
    this.dirty = true;
  }

  public getAmbientColor(): Vec3 {
    return vec3.clone(this.ambient);
  }

  public markDirty(): void {
    this.dirty = true;
  }

  public isDirty(): boolean {
    return this.dirty;
  }

  /** The current light block, detached from later registry changes. */
  public snapshot(): LightList {
    const lights = Array.from(this.lights.values());
    return { lights, count: lights.length, ambient: vec3.clone(this.ambient) };
  }

  /**
   * Repacks the light buffer if anything changed since the last update.
   *
   * @returns The packed buffer, or `null` when the previous one is current.
   */
  public update(uniformManager: UniformManager): ArrayBuffer | null {
    if (!this.dirty) return null;
    this.dirty = false;
    return uniformManager.packLightBuffer(this.snapshot());
  }
}

// src/core/rendering/uniformManager.ts
import { mat4, vec3, vec4 } from "wgpu-matrix";
import type {
  CameraUniform,
  Light,
  LightList,
  MaterialBindings,
  MaterialMetadata,
} from "@/core/types/gpu";
import { activeLightCount } from "@/core/shading/illumination";
import { resolveAlphaMode } from "@/core/shading/materialEvaluator";

/** Cutoff written for lights that have none; far above any cosine. */
export const OMNI_LIGHT_CUTOFF = 1000.0;

/** Light header: ambient rgb (3 × f32) followed by the light count (u32). */
export const LIGHT_HEADER_BYTES = 16;
export const LIGHT_STRIDE_IN_FLOATS = 12;
export const LIGHT_STRIDE_BYTES = LIGHT_STRIDE_IN_FLOATS * Float32Array.BYTES_PER_ELEMENT;
export const CAMERA_UNIFORM_FLOATS = 20;
export const MATERIAL_UNIFORM_FLOATS = 12;

/** The constant part of a material bind group, as decoded from its uniform. */
export type MaterialConstants = Pick<
  MaterialBindings,
  "diffuseColor" | "emissiveColor" | "metadata"
>;

/**
 * Packs camera, light and material blocks into the byte layouts the shading
 * programs bind.
 *
 * @remarks
 * Every block is written into a pre-allocated staging array that is reused
 * across calls; the returned arrays are views of that storage and are only
 * valid until the next call that packs the same block. The light staging
 * buffer grows by a factor of 1.5 when a list outgrows it.
 */
export class UniformManager {
  /** viewPosition(4) + viewProjection(16). */
  private cameraDataArray: Float32Array;
  /** diffuseColor(4) + emissiveColor(4) + metadata(4). */
  private materialDataArray: Float32Array;
  /** A resizable, reusable buffer for light data, designed for an SSBO. */
  private lightDataBuffer: ArrayBuffer;
  /** The current capacity (in number of lights) of the lightDataBuffer. */
  private lightStorageBufferCapacity: number;

  constructor(initialLightCapacity = 4) {
    this.cameraDataArray = new Float32Array(CAMERA_UNIFORM_FLOATS);
    this.materialDataArray = new Float32Array(MATERIAL_UNIFORM_FLOATS);
    this.lightStorageBufferCapacity = Math.max(1, Math.ceil(initialLightCapacity));
    this.lightDataBuffer = new ArrayBuffer(
      LIGHT_HEADER_BYTES + this.lightStorageBufferCapacity * LIGHT_STRIDE_BYTES,
    );
  }

  /**
   * Packs the camera block.
   *
   * | Offset (Floats) | Member           | Type          |
   * |:----------------|:-----------------|:--------------|
   * | 0-3             | `viewPosition`   | `vec4<f32>`   |
   * | 4-19            | `viewProjection` | `mat4x4<f32>` |
   */
  public packCameraUniform(camera: CameraUniform): Float32Array {
    this.cameraDataArray.set(camera.viewPosition, 0);
    this.cameraDataArray.set(camera.viewProjection, 4);
    return this.cameraDataArray;
  }

  /**
   * Packs the constant part of a material bind group.
   *
   * | Offset (Floats) | Member          | Type        |
   * |:----------------|:----------------|:------------|
   * | 0-3             | `diffuseColor`  | `vec4<f32>` |
   * | 4-7             | `emissiveColor` | `vec4<f32>` |
   * | 8-11            | `metadata`      | `vec4<f32>` |
   *
   * `metadata` is `(metallicFactor, roughnessFactor, alphaMode, alphaCutoff)`.
   */
  public packMaterialUniform(material: MaterialConstants): Float32Array {
    const { metadata } = material;
    this.materialDataArray.set(material.diffuseColor, 0);
    this.materialDataArray.set(material.emissiveColor, 4);
    this.materialDataArray[8] = metadata.metallicFactor;
    this.materialDataArray[9] = metadata.roughnessFactor;
    this.materialDataArray[10] = metadata.alphaMode;
    this.materialDataArray[11] = metadata.alphaCutoff;
    return this.materialDataArray;
  }

  /**
   * Gets a reusable CPU-side ArrayBuffer for light data, growing it when
   * `lightCount` exceeds the current capacity.
   */
  public getLightDataBuffer(lightCount: number): ArrayBuffer {
    if (lightCount > this.lightStorageBufferCapacity) {
      this.lightStorageBufferCapacity = Math.ceil(lightCount * 1.5);
      this.lightDataBuffer = new ArrayBuffer(
        LIGHT_HEADER_BYTES + this.lightStorageBufferCapacity * LIGHT_STRIDE_BYTES,
      );
    }
    return this.lightDataBuffer;
  }

  public getLightCapacity(): number {
    return this.lightStorageBufferCapacity;
  }

  /**
   * Packs a light list into the light storage layout.
   *
   * @remarks
   * Only the first `count` lights are written and the header carries that
   * clamped count. Lights without a cutoff are written with
   * {@link OMNI_LIGHT_CUTOFF}.
   *
   * @returns The staging buffer; bytes past the written lights are stale.
   */
  public packLightBuffer(lightList: LightList): ArrayBuffer {
    const count = activeLightCount(lightList);
    const buffer = this.getLightDataBuffer(count);
    const f32 = new Float32Array(buffer);
    const u32 = new Uint32Array(buffer);

    f32[0] = lightList.ambient[0];
    f32[1] = lightList.ambient[1];
    f32[2] = lightList.ambient[2];
    u32[3] = count;

    for (let i = 0; i < count; i++) {
      const light = lightList.lights[i];
      const base = LIGHT_HEADER_BYTES / 4 + i * LIGHT_STRIDE_IN_FLOATS;
      for (let c = 0; c < 3; c++) {
        f32[base + c] = light.position[c];
        f32[base + 4 + c] = light.color[c];
        f32[base + 8 + c] = light.direction[c];
      }
      f32[base + 3] = light.range;
      f32[base + 7] = light.exponent;
      f32[base + 11] = light.cutoff ?? OMNI_LIGHT_CUTOFF;
    }

    return buffer;
  }
}

function requireLength(what: string, actual: number, expected: number): void {
  if (actual < expected) {
    throw new Error(
      `[UniformManager] ${what} buffer too short: expected at least ${expected} floats, got ${actual}`,
    );
  }
}

/** Decodes a camera block written by {@link UniformManager.packCameraUniform}. */
export function readCameraUniform(data: Float32Array): CameraUniform {
  requireLength("Camera", data.length, CAMERA_UNIFORM_FLOATS);
  return {
    viewPosition: vec4.fromValues(data[0], data[1], data[2], data[3]),
    viewProjection: mat4.copy(data.subarray(4, 20)),
  };
}

/** Decodes a material block written by {@link UniformManager.packMaterialUniform}. */
export function readMaterialUniform(data: Float32Array): MaterialConstants {
  requireLength("Material", data.length, MATERIAL_UNIFORM_FLOATS);
  const metadata: MaterialMetadata = {
    metallicFactor: data[8],
    roughnessFactor: data[9],
    alphaMode: resolveAlphaMode(data[10]),
    alphaCutoff: data[11],
  };
  return {
    diffuseColor: vec4.fromValues(data[0], data[1], data[2], data[3]),
    emissiveColor: vec4.fromValues(data[4], data[5], data[6], data[7]),
    metadata,
  };
}

/**
 * Decodes a light buffer written by {@link UniformManager.packLightBuffer}.
 *
 * @remarks
 * Cutoffs at or above {@link OMNI_LIGHT_CUTOFF} decode as absent.
 *
 * @throws Error when the buffer is shorter than its header says.
 */
export function readLightBuffer(buffer: ArrayBuffer): LightList {
  if (buffer.byteLength < LIGHT_HEADER_BYTES) {
    throw new Error(
      `[UniformManager] Light buffer too short: ${buffer.byteLength} bytes, header needs ${LIGHT_HEADER_BYTES}`,
    );
  }
  const f32 = new Float32Array(buffer);
  const count = new Uint32Array(buffer, 0, 4)[3];
  const needed = LIGHT_HEADER_BYTES + count * LIGHT_STRIDE_BYTES;
  if (buffer.byteLength < needed) {
    throw new Error(
      `[UniformManager] Light buffer too short: header declares ${count} lights (${needed} bytes), got ${buffer.byteLength}`,
    );
  }

  const lights: Light[] = [];
  for (let i = 0; i < count; i++) {
    const base = LIGHT_HEADER_BYTES / 4 + i * LIGHT_STRIDE_IN_FLOATS;
    const cutoff = f32[base + 11];
    lights.push({
      position: vec3.fromValues(f32[base], f32[base + 1], f32[base + 2]),
      range: f32[base + 3],
      color: vec3.fromValues(f32[base + 4], f32[base + 5], f32[base + 6]),
      exponent: f32[base + 7],
      direction: vec3.fromValues(f32[base + 8], f32[base + 9], f32[base + 10]),
      cutoff: cutoff >= OMNI_LIGHT_CUTOFF ? undefined : cutoff,
    });
  }

  return {
    lights,
    count,
    ambient: vec3.fromValues(f32[0], f32[1], f32[2]),
  };
}

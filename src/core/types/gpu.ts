// src/core/types/gpu.ts
import type { Mat4, Vec2, Vec3, Vec4 } from "wgpu-matrix";

/**
 * A point light or spotlight as seen by the fragment stage.
 *
 * @remarks
 * Mirrors the 48-byte `Light` struct of the light storage buffer:
 * `position(3) range | color(3) exponent | direction(3) cutoff`.
 */
export interface Light {
  /** World-space position. */
  position: Vec3;
  /** Distance at which the light's contribution reaches zero. */
  range: number;
  /** Linear RGB color (may exceed 1 for bright lights). */
  color: Vec3;
  /** Softening exponent applied to the spotlight cone edge. */
  exponent: number;
  /** Unit direction the spotlight points at. Ignored without a cutoff. */
  direction: Vec3;
  /**
   * Cosine of the spotlight half-angle. Omitted (or above the configured
   * omni threshold) for lights that emit in all directions.
   */
  cutoff?: number;
}

/**
 * The light block bound once per lit draw. Only the first `count` entries of
 * `lights` are read.
 */
export interface LightList {
  lights: readonly Light[];
  count: number;
  ambient: Vec3;
}

/** Camera block bound once per draw. */
export interface CameraUniform {
  /** World-space eye position; `w` is free for program-specific use. */
  viewPosition: Vec4;
  viewProjection: Mat4;
}

/** Per-vertex input shared by every shading program. */
export interface VertexInput {
  position: Vec3;
  texCoords: Vec2;
  normal: Vec3;
}

/**
 * Alpha resolution selector. Numeric values match the `metadata.z` float
 * written by the glTF importer.
 */
export enum AlphaMode {
  Opaque = 1,
  Mask = 2,
  Blend = 3,
}

export interface MaterialMetadata {
  metallicFactor: number;
  roughnessFactor: number;
  alphaMode: AlphaMode;
  alphaCutoff: number;
}

/**
 * A bound texture/sampler pair. Implementations decide filtering and
 * addressing; the shading core only asks for a texel at a uv.
 */
export interface TextureSampler {
  sample(uv: Vec2): Vec4;
}

/**
 * Material bind group: tint constants, metadata and the five texture slots.
 *
 * @remarks
 * `roughnessTexture`, `normalTexture` and `occlusionTexture` are staged for a
 * future micro-facet path. They are part of the binding contract but are not
 * read by {@link evaluateMaterial}.
 */
export interface MaterialBindings {
  diffuseColor: Vec4;
  emissiveColor: Vec4;
  metadata: MaterialMetadata;
  diffuseTexture?: TextureSampler;
  emissiveTexture?: TextureSampler;
  roughnessTexture?: TextureSampler;
  normalTexture?: TextureSampler;
  occlusionTexture?: TextureSampler;
}

/**
 * The result of a fragment program: either a color, or an explicit discard
 * meaning "no color and no depth contribution".
 */
export type FragmentOutput =
  | { kind: "color"; color: Vec4 }
  | { kind: "discard" };

/**
 * The four packed vectors of a model matrix as they travel in the instance
 * buffer. They are stored back to back, so they are also the matrix's
 * column-major storage.
 */
export type ModelMatrixRows = readonly [Vec4, Vec4, Vec4, Vec4];

/** The three packed vectors of a normal matrix (rotation/scale only). */
export type NormalMatrixRows = readonly [Vec3, Vec3, Vec3];

/** One lit drawable as read back from the instance buffer. */
export interface LitInstanceData {
  modelRows: ModelMatrixRows;
  normalRows: NormalMatrixRows;
}

/** A triangle mesh in the fixed per-vertex layout. */
export interface Mesh {
  vertices: readonly VertexInput[];
  /** Triangle list indices into `vertices`. */
  indices: readonly number[];
}

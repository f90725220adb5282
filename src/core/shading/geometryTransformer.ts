// src/core/shading/geometryTransformer.ts
import { mat3, mat4, vec2, vec3, vec4 } from "wgpu-matrix";
import type { Mat3, Mat4, Vec2, Vec3, Vec4 } from "wgpu-matrix";
import type {
  CameraUniform,
  ModelMatrixRows,
  NormalMatrixRows,
  VertexInput,
} from "@/core/types/gpu";

/** Output of the vertex stage shared by every program. */
export interface VertexOutput {
  clipPosition: Vec4;
  texCoords: Vec2;
}

/** Output of the vertex stage for lit geometry. */
export interface LitVertexOutput extends VertexOutput {
  worldPosition: Vec3;
  /** Transformed by the normal matrix; not re-normalized. */
  worldNormal: Vec3;
}

/**
 * Rebuilds an instance's model matrix from its four packed vectors.
 *
 * @remarks
 * The packed vectors are written back to back, so stacking them reproduces
 * the column-major storage `wgpu-matrix` uses. No validation is performed.
 */
export function composeModelMatrix(rows: ModelMatrixRows, dst?: Mat4): Mat4 {
  const out = dst ?? mat4.create();
  for (let i = 0; i < 4; i++) {
    const row = rows[i];
    out[i * 4] = row[0];
    out[i * 4 + 1] = row[1];
    out[i * 4 + 2] = row[2];
    out[i * 4 + 3] = row[3];
  }
  return out;
}

/** Rebuilds a normal matrix from its three packed vectors. */
export function composeNormalMatrix(rows: NormalMatrixRows, dst?: Mat3): Mat3 {
  const [r0, r1, r2] = rows;
  const out = dst ?? mat3.create();
  mat3.set(r0[0], r0[1], r0[2], r1[0], r1[1], r1[2], r2[0], r2[1], r2[2], out);
  return out;
}

/** Producer side of {@link composeModelMatrix}. */
export function decomposeModelMatrix(m: Mat4): ModelMatrixRows {
  return [
    vec4.fromValues(m[0], m[1], m[2], m[3]),
    vec4.fromValues(m[4], m[5], m[6], m[7]),
    vec4.fromValues(m[8], m[9], m[10], m[11]),
    vec4.fromValues(m[12], m[13], m[14], m[15]),
  ];
}

/** Producer side of {@link composeNormalMatrix}. */
export function decomposeNormalMatrix(m: Mat3): NormalMatrixRows {
  // wgpu-matrix pads each mat3 column to four floats
  return [
    vec3.fromValues(m[0], m[1], m[2]),
    vec3.fromValues(m[4], m[5], m[6]),
    vec3.fromValues(m[8], m[9], m[10]),
  ];
}

/**
 * Computes the normal matrix of a model matrix: the inverse-transpose of its
 * upper 3x3, so that normals stay perpendicular under non-uniform scale.
 *
 * @remarks
 * A singular upper 3x3 (zero scale on an axis) has no inverse; the upper 3x3
 * itself is returned in that case.
 */
export function computeNormalMatrix(model: Mat4, dst?: Mat3): Mat3 {
  const upper = mat3.fromMat4(model);
  const out = dst ?? mat3.create();
  if (mat3.determinant(upper) === 0) {
    return mat3.copy(upper, out);
  }
  mat3.inverse(upper, out);
  return mat3.transpose(out, out);
}

function toWorld(position: Vec3, model: Mat4): Vec4 {
  return vec4.transformMat4(
    vec4.fromValues(position[0], position[1], position[2], 1),
    model,
  );
}

/**
 * Transforms a vertex to clip space and passes its uv through.
 *
 * @param vertex - Per-vertex input.
 * @param camera - Camera block of the current draw.
 * @param modelRows - Packed model matrix of the instance.
 */
export function transformVertex(
  vertex: VertexInput,
  camera: CameraUniform,
  modelRows: ModelMatrixRows,
): VertexOutput {
  const world = toWorld(vertex.position, composeModelMatrix(modelRows));
  return {
    clipPosition: vec4.transformMat4(world, camera.viewProjection),
    texCoords: vec2.clone(vertex.texCoords),
  };
}

/**
 * Vertex stage for lit geometry: clip position, uv, world position and the
 * normal transformed by the instance's normal matrix.
 */
export function transformLitVertex(
  vertex: VertexInput,
  camera: CameraUniform,
  modelRows: ModelMatrixRows,
  normalRows: NormalMatrixRows,
): LitVertexOutput {
  const world = toWorld(vertex.position, composeModelMatrix(modelRows));
  return {
    clipPosition: vec4.transformMat4(world, camera.viewProjection),
    texCoords: vec2.clone(vertex.texCoords),
    worldPosition: vec3.fromValues(world[0], world[1], world[2]),
    worldNormal: vec3.transformMat3(
      vertex.normal,
      composeNormalMatrix(normalRows),
    ),
  };
}

import { describe, it, expect } from "vitest";
import { mat4, vec2, vec3, vec4 } from "wgpu-matrix";
import type { CameraUniform, VertexInput } from "@/core/types/gpu";
import {
  composeModelMatrix,
  composeNormalMatrix,
  computeNormalMatrix,
  decomposeModelMatrix,
  decomposeNormalMatrix,
  transformLitVertex,
  transformVertex,
} from "./geometryTransformer";

const identityCamera: CameraUniform = {
  viewPosition: vec4.create(0, 0, 0, 1),
  viewProjection: mat4.identity(),
};

function vertexAt(x: number, y: number, z: number): VertexInput {
  return {
    position: vec3.fromValues(x, y, z),
    texCoords: vec2.fromValues(0.25, 0.75),
    normal: vec3.fromValues(1, 0, 0),
  };
}

describe("model matrix packing", () => {
  it("reassembles the matrix it was split from", () => {
    const m = mat4.translation([1, 2, 3]);
    mat4.rotateY(m, 0.5, m);
    expect(composeModelMatrix(decomposeModelMatrix(m))).toEqual(m);
  });

  it("stores translation in the fourth packed vector", () => {
    const rows = decomposeModelMatrix(mat4.translation([4, 5, 6]));
    expect(Array.from(rows[3])).toEqual([4, 5, 6, 1]);
  });
});

describe("normal matrix packing", () => {
  it("reassembles the matrix it was split from", () => {
    const n = computeNormalMatrix(mat4.rotationX(0.3));
    const back = composeNormalMatrix(decomposeNormalMatrix(n));
    expect(Array.from(decomposeNormalMatrix(back)[1])).toEqual(
      Array.from(decomposeNormalMatrix(n)[1]),
    );
  });
});

describe("computeNormalMatrix", () => {
  it("keeps normals perpendicular under non-uniform scale", () => {
    const model = mat4.scaling([2, 1, 1]);
    const normalMatrix = computeNormalMatrix(model);

    const surfaceTangent = vec4.transformMat4(vec4.fromValues(1, -1, 0, 0), model);
    const normal = vec3.transformMat3(vec3.fromValues(1, 1, 0), normalMatrix);

    expect(normal[0]).toBeCloseTo(0.5, 6);
    expect(normal[1]).toBeCloseTo(1, 6);
    expect(
      normal[0] * surfaceTangent[0] + normal[1] * surfaceTangent[1] + normal[2] * surfaceTangent[2],
    ).toBeCloseTo(0, 6);
  });

  it("falls back to the upper 3x3 when it is singular", () => {
    const normalMatrix = computeNormalMatrix(mat4.scaling([0, 1, 1]));
    const [c0, c1, c2] = decomposeNormalMatrix(normalMatrix);
    expect(Array.from(c0)).toEqual([0, 0, 0]);
    expect(Array.from(c1)).toEqual([0, 1, 0]);
    expect(Array.from(c2)).toEqual([0, 0, 1]);
  });
});

describe("transformVertex", () => {
  it("applies the model then the view-projection matrix", () => {
    const camera: CameraUniform = {
      viewPosition: vec4.create(0, 0, 0, 1),
      viewProjection: mat4.scaling([2, 2, 1]),
    };
    const out = transformVertex(
      vertexAt(1, 0, 0),
      camera,
      decomposeModelMatrix(mat4.translation([0, 1, 0.5])),
    );
    expect(Array.from(out.clipPosition)).toEqual([2, 2, 0.5, 1]);
    expect(Array.from(out.texCoords)).toEqual([0.25, 0.75]);
  });

  it("copies the uv instead of aliasing it", () => {
    const vertex = vertexAt(0, 0, 0);
    const out = transformVertex(vertex, identityCamera, decomposeModelMatrix(mat4.identity()));
    out.texCoords[0] = 9;
    expect(vertex.texCoords[0]).toBe(0.25);
  });
});

describe("transformLitVertex", () => {
  it("outputs world position and an unnormalized world normal", () => {
    const model = mat4.translation([0, 0, -2]);
    mat4.scale(model, [2, 1, 1], model);
    const out = transformLitVertex(
      vertexAt(1, 1, 0),
      identityCamera,
      decomposeModelMatrix(model),
      decomposeNormalMatrix(computeNormalMatrix(model)),
    );
    expect(Array.from(out.worldPosition)).toEqual([2, 1, -2]);
    expect(Array.from(out.clipPosition)).toEqual([2, 1, -2, 1]);
    expect(out.worldNormal[0]).toBeCloseTo(0.5, 6);
    expect(out.worldNormal[1]).toBeCloseTo(0, 6);
    expect(out.worldNormal[2]).toBeCloseTo(0, 6);
  });
});

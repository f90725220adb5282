import { describe, it, expect } from "vitest";
import { mat4, vec2, vec4 } from "wgpu-matrix";
import { ShapeMode, type UIInstanceData } from "@/core/types/ui";
import { decomposeModelMatrix } from "@/core/shading/geometryTransformer";
import { UI_QUAD } from "@/core/ui/uiLayout";
import { uiFragment, uiInstanceShape, uiVertex } from "./uiProgram";

function instance(flags: Partial<UIInstanceData["flags"]> = {}): UIInstanceData {
  return {
    modelRows: decomposeModelMatrix(mat4.scaling([0.5, 0.5, 1])),
    color: vec4.fromValues(0.5, 0.5, 0.5, 1),
    borderColor: vec4.fromValues(1, 0, 0, 1),
    radii: { topRight: 0.5, topLeft: 0.5, bottomLeft: 0.5, bottomRight: 0.5 },
    borders: { top: 0.25, bottom: 0.25, right: 0.25, left: 0.25 },
    dimensions: vec2.fromValues(1, 1),
    flags: { round: false, border: false, drawTexture: false, ...flags },
  };
}

const corner = vec2.fromValues(0.02, 0.02);

describe("uiVertex", () => {
  it("places quad corners with the instance model matrix", () => {
    const camera = { viewPosition: vec4.create(0, 0, 0, 1), viewProjection: mat4.identity() };
    const out = uiVertex(UI_QUAD.vertices[2], camera, instance());
    expect(Array.from(out.clipPosition)).toEqual([0.5, 0.5, 0, 1]);
    expect(Array.from(out.texCoords)).toEqual([1, 0]);
  });
});

describe("uiFragment", () => {
  it("draws plain quads edge to edge", () => {
    expect(uiFragment(vec2.fromValues(0, 0.5), instance(), ShapeMode.Discard)).toEqual({
      kind: "color",
      color: vec4.fromValues(0.5, 0.5, 0.5, 1),
    });
  });

  it("only rounds corners when the round flag is set", () => {
    expect(uiFragment(corner, instance({ border: true }), ShapeMode.Discard).kind).toBe("color");
    expect(uiFragment(corner, instance({ round: true }), ShapeMode.Discard)).toEqual({ kind: "discard" });
  });

  it("only draws borders when the border flag is set", () => {
    const uv = vec2.fromValues(0.1, 0.5);
    const withoutBorder = uiInstanceShape(instance({ round: true }));
    expect(withoutBorder.borders).toEqual({ top: 0, bottom: 0, right: 0, left: 0 });

    const out = uiFragment(uv, instance({ border: true }), ShapeMode.BorderBlend);
    expect(out).toEqual({ kind: "color", color: vec4.fromValues(1, 0, 0, 1) });
  });

  it("tints the bound texture when drawTexture is set", () => {
    const texture = { sample: () => vec4.fromValues(1, 0.5, 0, 1) };
    const uv = vec2.fromValues(0.5, 0.5);

    expect(uiFragment(uv, instance({ drawTexture: true }), ShapeMode.Discard, texture)).toEqual({
      kind: "color",
      color: vec4.fromValues(0.5, 0.25, 0, 1),
    });
    expect(uiFragment(uv, instance(), ShapeMode.Discard, texture)).toEqual({
      kind: "color",
      color: vec4.fromValues(0.5, 0.5, 0.5, 1),
    });
  });
});

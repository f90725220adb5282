import { describe, it, expect } from "vitest";
import { vec4 } from "wgpu-matrix";
import { ShapeMode, type RoundedRectShape } from "@/core/types/ui";
import {
  NO_BORDERS,
  NO_RADII,
  blendBorder,
  borderWidthsFromVec4,
  borderWidthsToVec4,
  cornerRadiiFromVec4,
  cornerRadiiToVec4,
  edgeSignal,
  sampleRoundedRect,
  sanitizeShape,
  shadeRoundedRect,
} from "./roundedRect";

const fill = vec4.fromValues(0.75, 0.5, 0.25, 1);
const border = vec4.fromValues(0.25, 0.25, 0.75, 1);

function uniformRadii(r: number) {
  return { topRight: r, topLeft: r, bottomLeft: r, bottomRight: r };
}

function uniformBorders(b: number) {
  return { top: b, bottom: b, right: b, left: b };
}

function interiorGrid(steps: number): [number, number][] {
  const points: [number, number][] = [];
  for (let i = 0; i < steps; i++) {
    for (let j = 0; j < steps; j++) {
      points.push([(i + 0.5) / steps, (j + 0.5) / steps]);
    }
  }
  return points;
}

describe("wire ordering", () => {
  it("reads radii as (topRight, topLeft, bottomLeft, bottomRight)", () => {
    expect(cornerRadiiFromVec4([1, 2, 3, 4])).toEqual({
      topRight: 1,
      topLeft: 2,
      bottomLeft: 3,
      bottomRight: 4,
    });
    expect(Array.from(cornerRadiiToVec4(cornerRadiiFromVec4([1, 2, 3, 4])))).toEqual([1, 2, 3, 4]);
  });

  it("reads borders as (top, bottom, right, left)", () => {
    expect(borderWidthsFromVec4([1, 2, 3, 4])).toEqual({ top: 1, bottom: 2, right: 3, left: 4 });
    expect(Array.from(borderWidthsToVec4(borderWidthsFromVec4([1, 2, 3, 4])))).toEqual([1, 2, 3, 4]);
  });
});

describe("sanitizeShape", () => {
  it("clamps radii to half the shorter side and zeroes invalid values", () => {
    const s = sanitizeShape({
      dimensions: [2, 1],
      radii: { topRight: 5, topLeft: Number.NaN, bottomLeft: -1, bottomRight: 0.25 },
      borders: { top: Infinity, bottom: -2, right: 0.1, left: Number.NaN },
    });
    expect(s.hasArea).toBe(true);
    expect(s.radii).toEqual({ topRight: 0.5, topLeft: 0, bottomLeft: 0, bottomRight: 0.25 });
    expect(s.borders).toEqual({ top: 0, bottom: 0, right: 0.1, left: 0 });
  });

  it("marks shapes without area as empty", () => {
    expect(sanitizeShape({ dimensions: [0, 1], radii: NO_RADII, borders: NO_BORDERS }).hasArea).toBe(false);
    expect(sanitizeShape({ dimensions: [1, -1], radii: NO_RADII, borders: NO_BORDERS }).hasArea).toBe(false);
    expect(sanitizeShape({ dimensions: [Number.NaN, 1], radii: NO_RADII, borders: NO_BORDERS }).hasArea).toBe(false);
  });
});

describe("sampleRoundedRect", () => {
  it("keeps every interior point of a rect without radii or borders", () => {
    const shape: RoundedRectShape = { dimensions: [1, 1], radii: NO_RADII, borders: NO_BORDERS };
    for (const p of interiorGrid(8)) {
      expect(shadeRoundedRect(p, shape, ShapeMode.Discard, fill, border)).toEqual({
        kind: "color",
        color: fill,
      });
      expect(shadeRoundedRect(p, shape, ShapeMode.BorderBlend, fill, border)).toEqual({
        kind: "color",
        color: fill,
      });
    }
  });

  it("treats the boundary itself as outside", () => {
    const shape: RoundedRectShape = { dimensions: [1, 1], radii: NO_RADII, borders: NO_BORDERS };
    expect(edgeSignal([0, 0.5], shape)).toBe(0);
    expect(edgeSignal([0.5, 1], shape)).toBe(0);
    expect(shadeRoundedRect([1, 0.5], shape, ShapeMode.Discard, fill, border)).toEqual({ kind: "discard" });
  });

  it("is continuous across the corner seam of a stadium", () => {
    const shape: RoundedRectShape = {
      dimensions: [2, 1],
      radii: uniformRadii(10),
      borders: NO_BORDERS,
    };
    // shape-space seam at x = 0.5, i.e. uv x = 0.25
    for (const y of [0.05, 0.25, 0.4, 0.75, 0.95]) {
      const before = sampleRoundedRect([0.25 - 1e-7, y], shape);
      const after = sampleRoundedRect([0.25 + 1e-7, y], shape);
      expect(before.region).not.toBe(after.region);
      expect(Math.abs(before.signal - after.signal)).toBeLessThan(1e-5);
    }
  });

  it("stays continuous across corner seams when borders are set", () => {
    const cases: { shape: RoundedRectShape; seamU: number; ys: number[] }[] = [
      {
        shape: { dimensions: [2, 1], radii: uniformRadii(0.5), borders: uniformBorders(0.05) },
        seamU: 0.25,
        ys: [0.02, 0.04, 0.2, 0.4],
      },
      {
        // border wider than the radius
        shape: { dimensions: [1, 1], radii: uniformRadii(0.1), borders: uniformBorders(0.2) },
        seamU: 0.1,
        ys: [0.01, 0.05, 0.09],
      },
    ];

    for (const { shape, seamU, ys } of cases) {
      for (const y of ys) {
        const before = sampleRoundedRect([seamU - 1e-7, y], shape);
        const after = sampleRoundedRect([seamU + 1e-7, y], shape);
        expect(before.region).toBe("corner");
        expect(after.region).toBe("edge");
        expect(Math.abs(before.signal - after.signal)).toBeLessThan(1e-5);
        expect(Math.abs(before.borderRatio - after.borderRatio)).toBeLessThan(1e-5);

        const colorBefore = blendBorder(before, fill, border);
        const colorAfter = blendBorder(after, fill, border);
        for (let c = 0; c < 4; c++) {
          expect(colorBefore[c]).toBeCloseTo(colorAfter[c], 4);
        }
      }
    }
  });

  it("scales the flat edges of a bordered stadium by the corner radius", () => {
    const shape: RoundedRectShape = {
      dimensions: [2, 1],
      radii: uniformRadii(0.5),
      borders: uniformBorders(0.05),
    };
    const sample = sampleRoundedRect([0.5, 0.02], shape);
    expect(sample.region).toBe("edge");
    expect(sample.signal).toBeCloseTo(0.04, 10);
    expect(sample.borderRatio).toBeCloseTo(0.1, 10);
  });

  it("measures a corner from its arc center", () => {
    const shape: RoundedRectShape = { dimensions: [1, 1], radii: uniformRadii(0.5), borders: NO_BORDERS };
    const sample = sampleRoundedRect([0.25, 0.25], shape);
    expect(sample.region).toBe("corner");
    expect(sample.signal).toBeCloseTo(1 - Math.SQRT1_2, 10);
    expect(edgeSignal([0.01, 0.01], shape)).toBeLessThan(0);
  });

  it("rounds only the corners that have a radius", () => {
    const shape: RoundedRectShape = {
      dimensions: [1, 1],
      radii: { topRight: 0, topLeft: 0.5, bottomLeft: 0, bottomRight: 0 },
      borders: NO_BORDERS,
    };
    const mode = ShapeMode.Discard;
    expect(shadeRoundedRect([0.02, 0.02], shape, mode, fill, border).kind).toBe("discard");
    expect(shadeRoundedRect([0.98, 0.02], shape, mode, fill, border).kind).toBe("color");
    expect(shadeRoundedRect([0.02, 0.98], shape, mode, fill, border).kind).toBe("color");
    expect(shadeRoundedRect([0.98, 0.98], shape, mode, fill, border).kind).toBe("color");
  });

  it("normalizes each flat edge by its own border width", () => {
    const shape: RoundedRectShape = {
      dimensions: [1, 1],
      radii: NO_RADII,
      borders: { top: 0, bottom: 0, right: 0, left: 0.2 },
    };
    expect(sampleRoundedRect([0.1, 0.5], shape)).toEqual({ signal: 0.5, borderRatio: 0.99, region: "edge" });
    expect(sampleRoundedRect([0.9, 0.5], shape)).toEqual({ signal: 1, borderRatio: 0, region: "edge" });
  });

  it("blends adjacent border widths by angle inside a corner", () => {
    const shape: RoundedRectShape = {
      dimensions: [1, 1],
      radii: uniformRadii(0.5),
      borders: { top: 0.3, bottom: 0, right: 0, left: 0.1 },
    };
    expect(sampleRoundedRect([0.25, 0.25], shape).borderRatio).toBeCloseTo(0.4, 10);
    // almost level with the arc center: the left border dominates
    expect(sampleRoundedRect([0.1, 0.5 - 1e-9], shape).borderRatio).toBeCloseTo(0.2, 6);
  });

  it("stays finite for oversized and invalid inputs", () => {
    const shape: RoundedRectShape = {
      dimensions: [3, 1],
      radii: { topRight: 1e9, topLeft: Infinity, bottomLeft: Number.NaN, bottomRight: -4 },
      borders: { top: Number.NaN, bottom: 1e9, right: Infinity, left: -1 },
    };
    for (const p of interiorGrid(12)) {
      const sample = sampleRoundedRect(p, shape);
      expect(Number.isFinite(sample.signal)).toBe(true);
      expect(Number.isFinite(sample.borderRatio)).toBe(true);
      const out = shadeRoundedRect(p, shape, ShapeMode.BorderBlend, fill, border);
      expect(out.kind === "color" && Array.from(out.color).every(Number.isFinite)).toBe(true);
    }
  });

  it("produces nothing for a shape without area", () => {
    const shape: RoundedRectShape = { dimensions: [0, 1], radii: NO_RADII, borders: NO_BORDERS };
    expect(sampleRoundedRect([0.5, 0.5], shape)).toEqual({ signal: 0, borderRatio: 0, region: "empty" });
    expect(shadeRoundedRect([0.5, 0.5], shape, ShapeMode.Discard, fill, border)).toEqual({ kind: "discard" });
    expect(shadeRoundedRect([0.5, 0.5], shape, ShapeMode.RawDistance, fill, border)).toEqual({
      kind: "color",
      color: vec4.create(0, 0, 0, 0),
    });
  });
});

describe("border blending", () => {
  const shape: RoundedRectShape = { dimensions: [1, 1], radii: NO_RADII, borders: uniformBorders(0.25) };

  it("is fully transparent at and outside the edge", () => {
    expect(blendBorder({ signal: 0, borderRatio: 0.5, region: "edge" }, fill, border)).toEqual(
      vec4.create(0, 0, 0, 0),
    );
    expect(blendBorder({ signal: -0.3, borderRatio: 0.5, region: "corner" }, fill, border)).toEqual(
      vec4.create(0, 0, 0, 0),
    );
  });

  it("reaches the fill color at the border ratio", () => {
    expect(blendBorder({ signal: 0.5, borderRatio: 0.5, region: "edge" }, fill, border)).toEqual(fill);
    expect(blendBorder({ signal: 0.99, borderRatio: 0.99, region: "edge" }, fill, border)).toEqual(fill);
  });

  it("fits both transitions inside a band thinner than the smoothing width", () => {
    expect(blendBorder({ signal: 0.04, borderRatio: 0.04, region: "corner" }, fill, border)).toEqual(fill);
    expect(blendBorder({ signal: 0.02, borderRatio: 0.04, region: "corner" }, fill, border)).toEqual(border);
    expect(blendBorder({ signal: 0.5, borderRatio: 0, region: "edge" }, fill, border)).toEqual(fill);
  });

  it("draws a thin border around a rounded corner", () => {
    const rounded: RoundedRectShape = {
      dimensions: [1, 1],
      radii: uniformRadii(0.25),
      borders: uniformBorders(0.01),
    };
    // on the corner diagonal, `distance` away from the arc center at (0.25, 0.25)
    const onDiagonal = (distance: number): [number, number] => {
      const c = 0.25 - distance * Math.SQRT1_2;
      return [c, c];
    };

    const atRatio = sampleRoundedRect(onDiagonal(0.24), rounded);
    expect(atRatio.signal).toBeCloseTo(0.04, 10);
    expect(atRatio.borderRatio).toBeCloseTo(0.04, 10);

    const inFill = shadeRoundedRect(onDiagonal(0.24), rounded, ShapeMode.BorderBlend, fill, border);
    const inBand = shadeRoundedRect(onDiagonal(0.245), rounded, ShapeMode.BorderBlend, fill, border);
    expect(inFill.kind).toBe("color");
    expect(inBand.kind).toBe("color");
    if (inFill.kind !== "color" || inBand.kind !== "color") return;
    for (let c = 0; c < 4; c++) {
      expect(inFill.color[c]).toBeCloseTo(fill[c], 4);
      expect(inBand.color[c]).toBeCloseTo(border[c], 4);
    }
  });

  it("shows the border color inside the band", () => {
    const out = shadeRoundedRect([0.125, 0.5], shape, ShapeMode.BorderBlend, fill, border);
    expect(out).toEqual({ kind: "color", color: border });
  });

  it("fades the outer edge over the smoothing width", () => {
    const color = blendBorder({ signal: 0.05, borderRatio: 0.5, region: "edge" }, fill, border);
    expect(color[0]).toBeCloseTo(0.125, 6);
    expect(color[2]).toBeCloseTo(0.375, 6);
    expect(color[3]).toBeCloseTo(0.5, 6);
  });

  it("shows the fill past the band", () => {
    const out = shadeRoundedRect([0.5, 0.5], shape, ShapeMode.BorderBlend, fill, border);
    expect(out).toEqual({ kind: "color", color: fill });
  });
});

describe("raw distance", () => {
  it("writes the clamped signal to all four channels", () => {
    const shape: RoundedRectShape = { dimensions: [1, 1], radii: uniformRadii(0.5), borders: NO_BORDERS };
    const inside = shadeRoundedRect([0.25, 0.25], shape, ShapeMode.RawDistance, fill, border);
    const s = Math.fround(1 - Math.hypot(0.25, 0.25) / 0.5);
    expect(inside).toEqual({ kind: "color", color: vec4.create(s, s, s, s) });

    const outside = shadeRoundedRect([0.01, 0.01], shape, ShapeMode.RawDistance, fill, border);
    expect(outside).toEqual({ kind: "color", color: vec4.create(0, 0, 0, 0) });
  });
});

import { describe, it, expect } from "vitest";
import { blit, createCanvas, fillRect, pixelAt, planAtlas, renderAtlas } from "../src/index.js";
import { makeFont, makeImage, makeTileset, region } from "./fixtures.js";

describe("blit", () => {
  it("replaces pixels instead of blending and clips to the destination", () => {
    const dst = makeImage(4, 4, () => [10, 10, 10, 255]);
    const src = makeImage(2, 2, () => [200, 0, 0, 0]);
    blit(dst, src, { x: 0, y: 0, width: 2, height: 2 }, 3, 3);
    expect(pixelAt(dst, 3, 3)).toEqual([200, 0, 0, 0]);
    expect(pixelAt(dst, 2, 2)).toEqual([10, 10, 10, 255]);
  });

  it("reads outside the source as transparent", () => {
    const dst = makeImage(3, 1, () => [1, 2, 3, 4]);
    const src = makeImage(1, 1, () => [9, 9, 9, 9]);
    blit(dst, src, { x: 0, y: 0, width: 3, height: 1 }, 0, 0);
    expect(pixelAt(dst, 0, 0)).toEqual([9, 9, 9, 9]);
    expect(pixelAt(dst, 1, 0)).toEqual([0, 0, 0, 0]);
    expect(pixelAt(dst, 2, 0)).toEqual([0, 0, 0, 0]);
  });
});

describe("fillRect", () => {
  it("clips negative origins", () => {
    const img = createCanvas(3, 3);
    fillRect(img, { x: -2, y: -2, width: 3, height: 3 }, [255, 255, 255, 255]);
    expect(pixelAt(img, 0, 0)).toEqual([255, 255, 255, 255]);
    expect(pixelAt(img, 1, 0)).toEqual([0, 0, 0, 0]);
    expect(pixelAt(img, 0, 1)).toEqual([0, 0, 0, 0]);
  });
});

describe("renderAtlas", () => {
  const tileset = makeTileset(40, 10);
  const font = makeFont();
  const plan = planAtlas(tileset);
  const out = renderAtlas(plan, tileset, font);

  it("sizes the canvas from the plan", () => {
    expect(out.width).toBe(40);
    expect(out.height).toBe(37);
  });

  it("keeps the tileset pixel-identical", () => {
    expect(region(out, 0, 0, 40, 10).equals(tileset.data)).toBe(true);
  });

  it("pastes glyphs row-major", () => {
    expect(pixelAt(out, 1, 11)).toEqual([0, 7, 9, 255]);
    expect(pixelAt(out, 27, 11)).toEqual([2, 7, 9, 255]);
    expect(pixelAt(out, 1, 24)).toEqual([3, 7, 9, 255]);
    expect(pixelAt(out, 25, 35)).toEqual([4, 7, 9, 255]);
  });

  it("leaves spacing transparent", () => {
    expect(pixelAt(out, 0, 11)).toEqual([0, 0, 0, 0]);
    expect(pixelAt(out, 13, 11)).toEqual([0, 0, 0, 0]);
    expect(pixelAt(out, 5, 10)).toEqual([0, 0, 0, 0]);
    expect(pixelAt(out, 5, 36)).toEqual([0, 0, 0, 0]);
  });

  it("paints the last appended cell white over glyph 5", () => {
    expect(plan.glyphs[5]?.dest).toEqual({ x: 27, y: 24 });
    const white = Buffer.alloc(12 * 12 * 4, 255);
    expect(region(out, 27, 24, 12, 12).equals(white)).toBe(true);
  });
});

describe("renderAtlas past the font supply", () => {
  const tileset = makeTileset(2600, 13);
  const plan = planAtlas(tileset);
  const out = renderAtlas(plan, tileset, makeFont());

  it("stops at glyph 255", () => {
    expect(plan.glyphs).toHaveLength(256);
    expect(pixelAt(out, 716, 27)).toEqual([255, 7, 9, 255]);
    expect(pixelAt(out, 727, 38)).toEqual([255, 7, 9, 255]);
  });

  it("leaves the slots after it transparent", () => {
    expect(region(out, 729, 27, 12, 12).equals(Buffer.alloc(12 * 12 * 4))).toBe(true);
    expect(region(out, 2575, 27, 12, 12).equals(Buffer.alloc(12 * 12 * 4))).toBe(true);
  });

  it("still paints the last slot white", () => {
    expect(region(out, 2588, 27, 12, 12).equals(Buffer.alloc(12 * 12 * 4, 255))).toBe(true);
  });
});

import fs from "node:fs/promises";
import path from "node:path";
import { AtlasError, describeCause } from "./errors.js";
import type { AtlasPlan, GlyphManifest, Point, RGBA } from "./types.js";

export const SOLID_WHITE: RGBA = [255, 255, 255, 255];

export function manifestPathFor(outputPath: string): string {
  return `${outputPath}.glyphs.json`;
}

/** Columns the tile viewer sees: cells start at spacing + n*(tileSize+spacing). */
export function viewerCols(plan: AtlasPlan): number {
  const { tileSize, spacing } = plan.geometry;
  return Math.max(0, Math.floor((plan.canvas.width - spacing) / (tileSize + spacing)));
}

export function viewerRows(plan: AtlasPlan): number {
  const { tileSize, spacing } = plan.geometry;
  return Math.max(0, Math.floor((plan.canvas.height - spacing) / (tileSize + spacing)));
}

/** Viewer tile index of a cell origin, or null when it is off the viewer grid. */
export function viewerTile(plan: AtlasPlan, at: Point): number | null {
  const { tileSize, spacing } = plan.geometry;
  const step = tileSize + spacing;
  const cols = viewerCols(plan);
  const ox = at.x - spacing, oy = at.y - spacing;
  if (ox < 0 || oy < 0 || ox % step !== 0 || oy % step !== 0) return null;
  const col = ox / step, row = oy / step;
  if (col >= cols || row >= viewerRows(plan)) return null;
  return row * cols + col;
}

export function buildManifest(plan: AtlasPlan, outputPath: string): GlyphManifest {
  return {
    schema: "tilefont.glyphs/1.0",
    image: path.basename(outputPath),
    canvas: { ...plan.canvas },
    geometry: { ...plan.geometry },
    tilesPerRow: plan.tilesPerRow,
    viewerCols: viewerCols(plan),
    glyphs: plan.glyphs.map((g) => ({ code: g.code, x: g.dest.x, y: g.dest.y, tile: viewerTile(plan, g.dest) })),
    solid: { ...plan.solidCell, tile: viewerTile(plan, plan.solidCell), color: SOLID_WHITE },
  };
}

export async function writeManifest(p: string, data: GlyphManifest): Promise<string> {
  try {
    await fs.writeFile(p, JSON.stringify(data, null, 2), "utf8");
  } catch (err) {
    throw new AtlasError("output", p, `cannot write ${p}: ${describeCause(err)}`, { cause: err });
  }
  return p;
}

import { createLogger } from "@tilefont/log";
import { DEFAULT_GEOMETRY } from "@tilefont/config";
import { planAtlas } from "./plan.js";
import { blit, createCanvas, encodeImage, fillRect, loadRgba } from "./raster.js";
import { buildManifest, manifestPathFor, SOLID_WHITE, writeManifest } from "./manifest.js";
import type { AtlasPlan, CombineOptions, CombineResult, RgbaImage } from "./types.js";

const log = createLogger("@tilefont/atlas-compose");

/** Apply a plan to decoded images. Pure pixel work, no I/O. */
export function renderAtlas(plan: AtlasPlan, tileset: RgbaImage, font: RgbaImage): RgbaImage {
  const { tileSize } = plan.geometry;
  const canvas = createCanvas(plan.canvas.width, plan.canvas.height);

  blit(canvas, tileset, { x: 0, y: 0, width: tileset.width, height: tileset.height }, 0, 0);

  for (const g of plan.glyphs) {
    blit(canvas, font, { ...g.source, width: tileSize, height: tileSize }, g.dest.x, g.dest.y);
  }

  fillRect(canvas, { ...plan.solidCell, width: tileSize, height: tileSize }, SOLID_WHITE);
  return canvas;
}

export async function combineAtlases(opts: CombineOptions): Promise<CombineResult> {
  const geometry = opts.geometry ?? DEFAULT_GEOMETRY;

  const tileset = await loadRgba(opts.tilesetPath);
  const font = await loadRgba(opts.fontPath);

  const plan = planAtlas(tileset, geometry);
  log.info(
    { tileset: opts.tilesetPath, width: plan.canvas.width, height: plan.canvas.height, tilesPerRow: plan.tilesPerRow },
    "atlas.plan",
  );

  const fontCells = Math.floor(font.width / geometry.tileSize) * Math.floor(font.height / geometry.tileSize);
  if (fontCells < geometry.fontGrid * geometry.fontGrid) {
    log.warn({ font: opts.fontPath, width: font.width, height: font.height }, "font atlas smaller than its grid; missing cells stay transparent");
  }

  const canvas = renderAtlas(plan, tileset, font);
  log.info({ glyphs: plan.glyphs.length, solid: plan.solidCell }, "atlas.glyphs");

  await encodeImage(canvas, opts.outputPath);

  let manifestPath: string | undefined;
  if (opts.manifest) {
    manifestPath = await writeManifest(manifestPathFor(opts.outputPath), buildManifest(plan, opts.outputPath));
  }
  log.info({ out: opts.outputPath, manifest: manifestPath ?? null }, "atlas.written");

  return {
    outputPath: opts.outputPath,
    width: canvas.width,
    height: canvas.height,
    tilesPerRow: plan.tilesPerRow,
    glyphsCopied: plan.glyphs.length,
    rowsAdded: geometry.rowsToAdd,
    ...(manifestPath ? { manifestPath } : {}),
  };
}

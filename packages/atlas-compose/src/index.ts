export { combineAtlases, renderAtlas } from "./combine.js";
export { planAtlas, tilesPerRow, canvasSize } from "./plan.js";
export { loadRgba, createCanvas, blit, fillRect, pixelAt, encodeImage, outputFormat } from "./raster.js";
export { buildManifest, writeManifest, manifestPathFor, viewerCols, viewerRows, viewerTile, SOLID_WHITE } from "./manifest.js";
export { AtlasError, type AtlasStage } from "./errors.js";
export type * from "./types.js";

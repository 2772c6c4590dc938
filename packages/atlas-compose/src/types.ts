import type { AtlasGeometry } from "@tilefont/config";

export type RGBA = [number, number, number, number];

/** Raw 8-bit RGBA pixels, row-major, 4 bytes per pixel. */
export type RgbaImage = { data: Buffer; width: number; height: number };

export type Size = { width: number; height: number };
export type Point = { x: number; y: number };
export type Rect = Point & Size;

export type GlyphPlacement = {
  code: number;        // running glyph index, 0..fontGrid²-1
  source: Point;       // top-left in the font atlas
  dest: Point;         // top-left in the combined canvas
  cell: { col: number; row: number }; // slot within the appended rows
};

export type AtlasPlan = {
  geometry: AtlasGeometry;
  tileset: Size;
  canvas: Size;
  tilesPerRow: number;
  startY: number;
  glyphs: GlyphPlacement[];
  solidCell: Point;    // bottom-right appended slot, always painted white
};

export type CombineOptions = {
  tilesetPath: string;
  fontPath: string;
  outputPath: string;
  geometry?: AtlasGeometry;
  manifest?: boolean;  // write <output>.glyphs.json next to the image
};

export type CombineResult = {
  outputPath: string;
  width: number;
  height: number;
  tilesPerRow: number;
  glyphsCopied: number;
  rowsAdded: number;
  manifestPath?: string;
};

export type GlyphManifest = {
  schema: "tilefont.glyphs/1.0";
  image: string;
  canvas: Size;
  geometry: AtlasGeometry;
  tilesPerRow: number;
  viewerCols: number;
  glyphs: Array<{ code: number; x: number; y: number; tile: number | null }>;
  solid: { x: number; y: number; tile: number | null; color: RGBA };
};

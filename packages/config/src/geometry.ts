/** Pixel geometry shared by the tileset, the font atlas and the combined output. */
export type AtlasGeometry = {
  tileSize: number;   // edge of a tile / glyph cell in px
  spacing: number;    // transparent gap between output cells
  fontGrid: number;   // font atlas is fontGrid x fontGrid glyphs, no spacing
  rowsToAdd: number;  // glyph rows appended below the tileset
};

export const DEFAULT_GEOMETRY: Readonly<AtlasGeometry> = Object.freeze({
  tileSize: 12,
  spacing: 1,
  fontGrid: 16,
  rowsToAdd: 2,
});

export const DEFAULT_TILESET_FILE = "urizen_onebit_tileset__v2d0.png";
export const DEFAULT_FONT_FILE = "cp437_12x12.png";

import { DEFAULT_GEOMETRY, type AtlasGeometry } from "@tilefont/config";
import type { AtlasPlan, GlyphPlacement, Size } from "./types.js";

export function tilesPerRow(width: number, g: AtlasGeometry = DEFAULT_GEOMETRY): number {
  return Math.floor((width + g.spacing) / (g.tileSize + g.spacing));
}

export function canvasSize(tileset: Size, g: AtlasGeometry = DEFAULT_GEOMETRY): Size {
  return {
    width: tileset.width,
    height: tileset.height + g.rowsToAdd * (g.tileSize + g.spacing) + g.spacing,
  };
}

/**
 * Where every glyph goes. Row-major over the appended rows; once the font
 * supply (fontGrid²) runs out a row places nothing more, and later rows
 * stay empty too.
 */
export function planAtlas(tileset: Size, g: AtlasGeometry = DEFAULT_GEOMETRY): AtlasPlan {
  const step = g.tileSize + g.spacing;
  const perRow = tilesPerRow(tileset.width, g);
  const startY = tileset.height + g.spacing;
  const supply = g.fontGrid * g.fontGrid;

  const glyphs: GlyphPlacement[] = [];
  let code = 0;
  for (let row = 0; row < g.rowsToAdd; row++) {
    for (let col = 0; col < perRow; col++) {
      if (code >= supply) break;
      glyphs.push({
        code,
        source: { x: (code % g.fontGrid) * g.tileSize, y: Math.floor(code / g.fontGrid) * g.tileSize },
        dest: { x: g.spacing + col * step, y: startY + row * step },
        cell: { col, row },
      });
      code++;
    }
  }

  return {
    geometry: { ...g },
    tileset: { width: tileset.width, height: tileset.height },
    canvas: canvasSize(tileset, g),
    tilesPerRow: perRow,
    startY,
    glyphs,
    solidCell: {
      x: g.spacing + (perRow - 1) * step,
      y: startY + (g.rowsToAdd - 1) * step,
    },
  };
}

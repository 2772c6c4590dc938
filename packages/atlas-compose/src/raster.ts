import path from "node:path";
import fs from "node:fs/promises";
import sharp from "sharp";
import { AtlasError, describeCause } from "./errors.js";
import type { RGBA, Rect, RgbaImage } from "./types.js";

/**
 * Decode to 8-bit RGBA exactly as stored. An embedded ICC profile is ignored,
 * so tagged (P3, Adobe RGB) sheets keep their bytes.
 */
export async function loadRgba(file: string): Promise<RgbaImage> {
  try {
    const { data, info } = await sharp(file, { ignoreIcc: true })
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
    if (info.channels !== 4 || data.length !== info.width * info.height * 4) {
      throw new Error(`expected 8-bit RGBA, got ${info.channels} channels in ${data.length} bytes`);
    }
    return { data, width: info.width, height: info.height };
  } catch (err) {
    throw new AtlasError("input", file, `cannot decode ${file}: ${describeCause(err)}`, { cause: err });
  }
}

export function createCanvas(width: number, height: number): RgbaImage {
  return { data: Buffer.alloc(width * height * 4), width, height };
}

/**
 * Copy `src` region into `dst` at (dx, dy), replacing pixels (no blending).
 * Writes are clipped to `dst`; reads outside `src` yield transparent pixels.
 */
export function blit(dst: RgbaImage, src: RgbaImage, region: Rect, dx: number, dy: number): void {
  for (let y = 0; y < region.height; y++) {
    const ty = dy + y;
    if (ty < 0 || ty >= dst.height) continue;
    const sy = region.y + y;
    for (let x = 0; x < region.width; x++) {
      const tx = dx + x;
      if (tx < 0 || tx >= dst.width) continue;
      const sx = region.x + x;
      const o = (ty * dst.width + tx) * 4;
      if (sx < 0 || sy < 0 || sx >= src.width || sy >= src.height) {
        dst.data.fill(0, o, o + 4);
        continue;
      }
      const i = (sy * src.width + sx) * 4;
      src.data.copy(dst.data, o, i, i + 4);
    }
  }
}

export function fillRect(dst: RgbaImage, rect: Rect, [r, g, b, a]: RGBA): void {
  const x0 = Math.max(0, rect.x), x1 = Math.min(dst.width, rect.x + rect.width);
  const y0 = Math.max(0, rect.y), y1 = Math.min(dst.height, rect.y + rect.height);
  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      const o = (y * dst.width + x) * 4;
      dst.data[o] = r; dst.data[o + 1] = g; dst.data[o + 2] = b; dst.data[o + 3] = a;
    }
  }
}

export function pixelAt(img: RgbaImage, x: number, y: number): RGBA {
  const o = (y * img.width + x) * 4;
  return [img.data[o] ?? 0, img.data[o + 1] ?? 0, img.data[o + 2] ?? 0, img.data[o + 3] ?? 0];
}

type LosslessFormat = "png" | "tiff";

const FORMATS: Record<string, LosslessFormat> = {
  ".png": "png",
  ".tif": "tiff",
  ".tiff": "tiff",
};

export function outputFormat(file: string): LosslessFormat | undefined {
  return FORMATS[path.extname(file).toLowerCase()];
}

/** Encode losslessly with alpha; the format follows the file extension. */
export async function encodeImage(img: RgbaImage, file: string): Promise<void> {
  const format = outputFormat(file);
  if (!format) {
    throw new AtlasError("output", file, `unsupported output format: ${path.extname(file) || "(none)"} (use .png or .tiff)`);
  }
  const pipeline = sharp(img.data, { raw: { width: img.width, height: img.height, channels: 4 } });
  const encoded = format === "png" ? pipeline.png() : pipeline.tiff({ compression: "lzw" });
  try {
    const buf = await encoded.toBuffer();
    await fs.writeFile(file, buf);
  } catch (err) {
    throw new AtlasError("output", file, `cannot write ${file}: ${describeCause(err)}`, { cause: err });
  }
}

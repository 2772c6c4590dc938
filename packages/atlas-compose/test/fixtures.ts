import { writeFile } from "node:fs/promises";
import sharp from "sharp";
import type { RGBA, RgbaImage } from "../src/index.js";

export function makeImage(width: number, height: number, px: (x: number, y: number) => RGBA): RgbaImage {
  const data = Buffer.alloc(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const [r, g, b, a] = px(x, y);
      const o = (y * width + x) * 4;
      data[o] = r; data[o + 1] = g; data[o + 2] = b; data[o + 3] = a;
    }
  }
  return { data, width, height };
}

/** Tileset with a distinct, partly translucent colour per pixel. */
export function makeTileset(width: number, height: number): RgbaImage {
  return makeImage(width, height, (x, y) => [x % 256, y % 256, (x + y) % 256, (x * 7 + y * 3) % 256]);
}

/** 16x16 font of 12px cells; every pixel of cell `code` is (code, 7, 9, 255). */
export function makeFont(grid = 16, tile = 12): RgbaImage {
  return makeImage(grid * tile, grid * tile, (x, y) => {
    const code = Math.floor(y / tile) * grid + Math.floor(x / tile);
    return [code, 7, 9, 255];
  });
}

export async function writePng(img: RgbaImage, file: string): Promise<void> {
  await sharp(img.data, { raw: { width: img.width, height: img.height, channels: 4 } }).png().toFile(file);
}

export function region(img: RgbaImage, x: number, y: number, w: number, h: number): Buffer {
  const rows: Buffer[] = [];
  for (let j = 0; j < h; j++) {
    const o = ((y + j) * img.width + x) * 4;
    rows.push(img.data.subarray(o, o + w * 4));
  }
  return Buffer.concat(rows);
}

const PNG_SIGNATURE_LENGTH = 8;

function chunks(png: Buffer): Array<{ type: string; start: number; end: number }> {
  const out: Array<{ type: string; start: number; end: number }> = [];
  let at = PNG_SIGNATURE_LENGTH;
  while (at < png.length) {
    const length = png.readUInt32BE(at);
    const end = at + 12 + length; // length + type + data + crc
    out.push({ type: png.toString("latin1", at + 4, at + 8), start: at, end });
    at = end;
  }
  return out;
}

/**
 * Encode `img` unchanged and splice in the iCCP chunk of a P3-tagged PNG, so
 * the file carries a colour profile while its stored samples are `img.data`.
 */
export async function writePngWithP3Profile(img: RgbaImage, file: string): Promise<void> {
  const raw = { raw: { width: img.width, height: img.height, channels: 4 as const } };
  const plain = await sharp(img.data, raw).png().toBuffer();
  const tagged = await sharp(img.data, raw).withIccProfile("p3").png().toBuffer();

  const iccp = chunks(tagged).find((c) => c.type === "iCCP");
  const ihdr = chunks(plain).find((c) => c.type === "IHDR");
  if (!iccp || !ihdr) throw new Error("fixture: missing iCCP or IHDR chunk");

  await writeFile(file, Buffer.concat([
    plain.subarray(0, ihdr.end),
    tagged.subarray(iccp.start, iccp.end),
    plain.subarray(ihdr.end),
  ]));
}

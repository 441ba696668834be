/**
 * @module png-codec
 * Minimal RGBA PNG encoder using fflate for the zlib stream.
 * Used to ship raster surfaces to the viewer page.
 *
 * @see https://www.w3.org/TR/PNG/
 */

import { zlibSync } from 'fflate';

/** RGBA image data suitable for PNG encoding. */
export interface RgbaImage {
  /** RGBA pixel data. Length must be width * height * 4. */
  data: Uint8Array;
  /** Width in pixels. */
  width: number;
  /** Height in pixels. */
  height: number;
}

/** Options for {@link encodePng}. */
export interface EncodePngOptions {
  /** Deflate level; frames favour speed over size. */
  level?: 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;
}

// ── CRC32 lookup table (256 entries) ──

const crcTable = new Uint32Array(256);
for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  crcTable[n] = c;
}

function crc32(data: Uint8Array, start: number, end: number): number {
  let crc = 0xffffffff;
  for (let i = start; i < end; i++) {
    crc = crcTable[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

function write32(buf: Uint8Array, offset: number, value: number): void {
  buf[offset] = (value >>> 24) & 0xff;
  buf[offset + 1] = (value >>> 16) & 0xff;
  buf[offset + 2] = (value >>> 8) & 0xff;
  buf[offset + 3] = value & 0xff;
}

/** PNG signature: 8 bytes. */
export const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

/**
 * Write one chunk (length, type, payload, CRC over type + payload).
 * @returns Offset just past the chunk.
 */
function writeChunk(out: Uint8Array, offset: number, type: string, payload: Uint8Array): number {
  write32(out, offset, payload.length);
  const typeStart = offset + 4;
  for (let i = 0; i < 4; i++) {
    out[typeStart + i] = type.charCodeAt(i);
  }
  out.set(payload, typeStart + 4);
  const end = typeStart + 4 + payload.length;
  write32(out, end, crc32(out, typeStart, end));
  return end + 4;
}

/**
 * Build the filtered scanlines. Each row uses filter type 1 (Sub), which
 * compresses flat fills well and is cheap to compute.
 */
function filterScanlines(data: Uint8Array, width: number, height: number): Uint8Array {
  const rowBytes = width * 4;
  const raw = new Uint8Array(height * (1 + rowBytes));
  for (let y = 0; y < height; y++) {
    const src = y * rowBytes;
    const dst = y * (1 + rowBytes);
    raw[dst] = 1;
    for (let x = 0; x < rowBytes; x++) {
      const left = x >= 4 ? data[src + x - 4] : 0;
      raw[dst + 1 + x] = (data[src + x] - left) & 0xff;
    }
  }
  return raw;
}

/**
 * Encode an RGBA image as an 8-bit truecolour-with-alpha PNG.
 * @throws {Error} If the data length does not match the dimensions.
 */
export function encodePng(image: RgbaImage, options: EncodePngOptions = {}): Uint8Array {
  const { data, width, height } = image;

  if (width <= 0 || height <= 0 || data.length !== width * height * 4) {
    throw new Error(
      `Image data length (${data.length}) does not match dimensions (${width}x${height}x4 = ${width * height * 4})`,
    );
  }

  const ihdr = new Uint8Array(13);
  write32(ihdr, 0, width);
  write32(ihdr, 4, height);
  ihdr[8] = 8; // bit depth
  ihdr[9] = 6; // color type: RGBA
  // compression, filter and interlace methods stay 0

  const idat = zlibSync(filterScanlines(data, width, height), { level: options.level ?? 1 });

  const out = new Uint8Array(8 + (12 + ihdr.length) + (12 + idat.length) + 12);
  out.set(PNG_SIGNATURE, 0);
  let offset = PNG_SIGNATURE.length;
  offset = writeChunk(out, offset, 'IHDR', ihdr);
  offset = writeChunk(out, offset, 'IDAT', idat);
  writeChunk(out, offset, 'IEND', new Uint8Array(0));
  return out;
}

import type { ByteSource } from '../source';
import { argb, IconImage } from './image';

export const BitmapInfoHeaderSize = 40;

export interface BitmapInfoHeader {
  size: number;
  width: number;
  /** Twice the pixel height: the XOR plane and the AND plane are stacked. */
  height: number;
  planes: number;
  bitCount: number;
  compression: number;
  sizeImage: number;
  xPelsPerMeter: number;
  yPelsPerMeter: number;
  colorUsed: number;
  colorImportant: number;
}

export interface RGBQuad {
  blue: number;
  green: number;
  red: number;
  reserved: number;
}

/** The raw parts of a DIB block, kept alongside the decoded image. */
export interface IconBitmap {
  header: BitmapInfoHeader;
  colorTable: RGBQuad[];
  xor: Buffer;
  and: Buffer;
}

export interface ExpandOptions {
  /**
   * Take 32 bpp rows in stored order instead of bottom-up. Off by default:
   * every depth, 32 bpp included, stores its rows bottom-up.
   */
  storedOrder32?: boolean;
}

const BitMasks = [128, 64, 32, 16, 8, 4, 2, 1];

/** Parses the 36 bytes that follow the size field of a BITMAPINFOHEADER. */
export function parseBitmapInfoHeader(size: number, buf: Buffer): BitmapInfoHeader {
  return {
    size,
    width: buf.readInt32LE(0),
    height: buf.readInt32LE(4),
    planes: buf.readUInt16LE(8),
    bitCount: buf.readUInt16LE(10),
    compression: buf.readUInt32LE(12),
    sizeImage: buf.readUInt32LE(16),
    xPelsPerMeter: buf.readInt32LE(20),
    yPelsPerMeter: buf.readInt32LE(24),
    colorUsed: buf.readUInt32LE(28),
    colorImportant: buf.readUInt32LE(32),
  };
}

/**
 * Number of color table entries. A non-zero count from the directory entry
 * wins; otherwise it follows from the bitmap's planes and bit count, with 0
 * meaning true color.
 */
export function resolveColorCount(colorCount: number, planes: number, bitCount: number): number {
  if (colorCount !== 0) return colorCount;
  if (planes === 1) {
    switch (bitCount) {
      case 1: return 2;
      case 4: return 16;
      case 8: return 256;
      default: return 0;
    }
  }
  return 2 ** (bitCount * planes);
}

export function xorStride(width: number, bitCount: number): number {
  return Math.ceil((width * bitCount) / 32) * 4;
}

export function andStride(width: number): number {
  return Math.ceil(width / 32) * 4;
}

export function pixelHeight(header: BitmapInfoHeader): number {
  return Math.floor(header.height / 2);
}

/** Returns why a header/color count pair cannot be expanded, or undefined if it can. */
export function unsupportedLayout(header: BitmapInfoHeader, colorCount: number): string | undefined {
  if (header.compression !== 0) {
    return `unsupported compression: ${header.compression}`;
  }
  if (colorCount > 0) {
    if (header.bitCount !== 1 && header.bitCount !== 4 && header.bitCount !== 8) {
      return `no indexed decoder for ${header.bitCount} bpp with ${colorCount} colors`;
    }
  } else if (header.bitCount !== 16 && header.bitCount !== 24 && header.bitCount !== 32) {
    return `no true color decoder for ${header.bitCount} bpp`;
  }
  return undefined;
}

export async function readColorTable(source: ByteSource, count: number): Promise<RGBQuad[]> {
  const buf = await source.read(count * 4);
  const table: RGBQuad[] = [];
  for (let i = 0; i < count; i++) {
    table.push({
      blue: buf[i * 4],
      green: buf[i * 4 + 1],
      red: buf[i * 4 + 2],
      reserved: buf[i * 4 + 3],
    });
  }
  return table;
}

/** Reads the color table and both pixel planes that follow a bitmap header. */
export async function readBitmap(source: ByteSource, header: BitmapInfoHeader, colorCount: number): Promise<IconBitmap> {
  const colorTable = colorCount > 0 ? await readColorTable(source, colorCount) : [];
  const height = pixelHeight(header);
  const xor = await source.read(xorStride(header.width, header.bitCount) * height);
  const and = await source.read(andStride(header.width) * height);
  return { header, colorTable, xor, and };
}

type Sampler = (row: number, x: number) => number;

function indexedSampler(bitmap: IconBitmap): Sampler {
  const { header, colorTable, xor } = bitmap;
  const stride = xorStride(header.width, header.bitCount);

  let index: (row: number, x: number) => number;
  switch (header.bitCount) {
    case 1:
      index = (row, x) => (xor[row * stride + (x >> 3)] & BitMasks[x % 8]) === 0 ? 0 : 1;
      break;
    case 4:
      index = (row, x) => {
        const byte = xor[row * stride + (x >> 1)];
        return (x & 1) === 0 ? byte >> 4 : byte & 0x0f;
      };
      break;
    case 8:
      index = (row, x) => xor[row * stride + x];
      break;
    default:
      throw new Error(`no indexed decoder for ${header.bitCount} bpp`);
  }

  return (row, x) => {
    const i = index(row, x);
    if (i >= colorTable.length) {
      throw new Error(`color index ${i} out of range (${colorTable.length} colors)`);
    }
    const q = colorTable[i];
    return argb(0, q.red, q.green, q.blue);
  };
}

function widen5(c: number): number {
  return (c << 3) | (c >> 2);
}

function trueColorSampler(bitmap: IconBitmap): Sampler {
  const { header, xor } = bitmap;
  const stride = xorStride(header.width, header.bitCount);

  switch (header.bitCount) {
    case 16:
      return (row, x) => {
        const word = xor.readUInt16LE(row * stride + x * 2);
        return argb(0, widen5((word >> 10) & 0x1f), widen5((word >> 5) & 0x1f), widen5(word & 0x1f));
      };
    case 24:
      return (row, x) => {
        const i = row * stride + x * 3;
        return argb(0, xor[i + 2], xor[i + 1], xor[i]);
      };
    case 32:
      return (row, x) => {
        const i = row * stride + x * 4;
        return argb(xor[i + 3], xor[i + 2], xor[i + 1], xor[i]);
      };
    default:
      throw new Error(`no true color decoder for ${header.bitCount} bpp`);
  }
}

/**
 * Expands the XOR plane into ARGB pixels. Rows are stored bottom-up. Every
 * depth except 32 bpp takes its alpha from the AND plane (set bit = transparent).
 */
export function expandDib(bitmap: IconBitmap, options: ExpandOptions = {}): IconImage {
  const { header, and } = bitmap;
  const width = header.width;
  const height = pixelHeight(header);
  const hasAlpha = header.bitCount === 32;
  const sample = bitmap.colorTable.length > 0 ? indexedSampler(bitmap) : trueColorSampler(bitmap);
  const maskStride = andStride(width);
  const image = IconImage.create(width, height);

  for (let y = 0; y < height; y++) {
    const row = hasAlpha && options.storedOrder32 ? y : height - 1 - y;
    for (let x = 0; x < width; x++) {
      let pix = sample(row, x);
      if (!hasAlpha) {
        const transparent = (and[row * maskStride + (x >> 3)] & BitMasks[x % 8]) !== 0;
        pix = transparent ? pix & 0x00ffffff : (pix | 0xff000000) >>> 0;
      }
      image.pixels[y * width + x] = pix;
    }
  }
  return image;
}

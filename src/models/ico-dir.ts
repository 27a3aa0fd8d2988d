import { DirectoryEntryError, HeaderError } from '../errors';
import type { ByteSource } from '../source';
import type { IconBitmap } from './dib';
import type { IconImage } from './image';

export const HeaderSize = 6;
export const EntrySize = 16;

export enum IconType {
  ICON = 1,
  CURSOR = 2,
}

export interface IconDir {
  reserved: number;
  type: IconType;
  count: number;
}

export interface IconDirEntry {
  /** Position of the record in the directory table. */
  index: number;
  width: number;
  height: number;
  colorCount: number;
  reserved: number;
  /** Color planes, or the horizontal hotspot of a cursor. */
  planes: number;
  /** Bits per pixel, or the vertical hotspot of a cursor. */
  bitCount: number;
  bytesInResource: number;
  imageOffset: number;
  image?: IconImage;
  bitmap?: IconBitmap;
}

export function parseIconDir(buf: Buffer): IconDir {
  const reserved = buf.readUInt16LE(0);
  if (reserved !== 0) {
    throw new HeaderError(`reserved word is not 0: ${reserved}`);
  }
  const type = buf.readUInt16LE(2);
  if (type !== IconType.ICON && type !== IconType.CURSOR) {
    throw new HeaderError(`unsupported resource type: ${type}`);
  }
  return { reserved, type, count: buf.readUInt16LE(4) };
}

export async function readIconDir(source: ByteSource): Promise<IconDir> {
  return parseIconDir(await source.read(HeaderSize));
}

export function parseIconDirEntry(buf: Buffer, index: number): IconDirEntry {
  return {
    index,
    width: buf[0],
    height: buf[1],
    colorCount: buf[2],
    reserved: buf[3],
    planes: buf.readUInt16LE(4),
    bitCount: buf.readUInt16LE(6),
    bytesInResource: buf.readUInt32LE(8),
    imageOffset: buf.readUInt32LE(12),
  };
}

/**
 * Reads `count` directory records. Records whose reserved byte is set are
 * reported and left out; they still occupy their 16 bytes.
 */
export async function readIconDirEntries(
  source: ByteSource,
  count: number,
  onDropped: (err: DirectoryEntryError) => void,
): Promise<IconDirEntry[]> {
  const buf = await source.read(count * EntrySize);
  const entries: IconDirEntry[] = [];
  for (let index = 0; index < count; index++) {
    const entry = parseIconDirEntry(buf.subarray(index * EntrySize, (index + 1) * EntrySize), index);
    if (entry.reserved !== 0) {
      onDropped(new DirectoryEntryError(`directory entry ${index}: reserved byte is ${entry.reserved}`, index));
      continue;
    }
    entries.push(entry);
  }
  return entries;
}

export const IconDirEntry = {
  pixelWidth(entry: IconDirEntry): number {
    return entry.width || 256;
  },
  pixelHeight(entry: IconDirEntry): number {
    return entry.height || 256;
  },
  hotspot(dir: IconDir, entry: IconDirEntry): { x: number; y: number } | undefined {
    if (dir.type !== IconType.CURSOR) return undefined;
    return { x: entry.planes, y: entry.bitCount };
  },
};

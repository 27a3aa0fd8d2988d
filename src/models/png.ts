import Sharp from 'sharp';
import type { ByteSource } from '../source';
import { IconImage } from './image';

// the PNG signature 89 50 4E 47 0D 0A 1A 0A, read as two little-endian words
export const PngMagic1 = 0x474e5089;
export const PngMagic2 = 0x0a1a0a0d;
export const PngSignatureSize = 8;

const IEND = 0x49454e44;

export type PngDecoder = (png: Buffer) => Promise<IconImage>;

export const decodePngWithSharp: PngDecoder = async (png) => {
  const { data, info } = await Sharp(png).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  return IconImage.fromRGBA(info.width, info.height, data);
};

function signature(): Buffer {
  const buf = Buffer.alloc(PngSignatureSize);
  buf.writeUInt32LE(PngMagic1, 0);
  buf.writeUInt32LE(PngMagic2, 4);
  return buf;
}

/**
 * Reads the rest of a PNG resource whose signature has already been consumed
 * and returns the whole resource, signature included.
 */
export async function readPngResource(source: ByteSource, bytesInResource: number): Promise<Buffer> {
  return Buffer.concat([signature(), await source.read(bytesInResource - PngSignatureSize)]);
}

/**
 * Reads chunks up to and including IEND. Used for PNG blocks that no
 * directory entry claims, whose length is therefore unknown.
 */
export async function readPngChunks(source: ByteSource): Promise<Buffer> {
  const parts = [signature()];
  for (;;) {
    const head = await source.read(8);
    const length = head.readUInt32BE(0);
    const type = head.readUInt32BE(4);
    parts.push(head, await source.read(length + 4));
    if (type === IEND) {
      return Buffer.concat(parts);
    }
  }
}

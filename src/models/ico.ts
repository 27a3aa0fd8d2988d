import { range } from 'lodash';
import { MaxImageDimension } from '../config';
import { DirectoryEntryError, ImageDecodeError } from '../errors';
import { openSource } from '../source';
import type { ByteSource, IconInput } from '../source';
import { errorMessage } from '../utils';
import {
  BitmapInfoHeaderSize,
  expandDib,
  parseBitmapInfoHeader,
  pixelHeight,
  readBitmap,
  resolveColorCount,
  unsupportedLayout,
} from './dib';
import type { ExpandOptions, IconBitmap } from './dib';
import { HeaderSize, IconDirEntry, IconType, readIconDir, readIconDirEntries } from './ico-dir';
import type { IconDir } from './ico-dir';
import { IconImage } from './image';
import { PendingEntries } from './locator';
import { decodePngWithSharp, PngMagic1, PngMagic2, PngSignatureSize, readPngChunks, readPngResource } from './png';
import type { PngDecoder } from './png';

export type IconIssue = DirectoryEntryError | ImageDecodeError;

export interface ParseOptions extends ExpandOptions {
  decodePng?: PngDecoder;
  /** Largest bitmap width or pixel height accepted. */
  maxDimension?: number;
  /** Receives every recoverable problem: dropped records and empty image slots. */
  onIssue?: (issue: IconIssue) => void;
}

export interface IconDirectory extends IconDir {
  /** Usable directory entries, in directory order. */
  entries: readonly IconDirEntry[];
  /** One slot per declared record; empty where the record was dropped or its image failed. */
  images: readonly (IconImage | undefined)[];
}

type BlockResult =
  | { kind: 'bitmap'; image: IconImage; bitmap: IconBitmap }
  | { kind: 'png'; image: IconImage }
  | { kind: 'failed'; error: ImageDecodeError; aligned: boolean };

/**
 * Moves to the end of the owner's resource after a failed block. A block that
 * already read past that end leaves the reader where it is. Without an owner
 * the block length is unknown and the stream cannot be realigned.
 */
async function realign(source: ByteSource, owner: IconDirEntry | undefined, start: number): Promise<boolean> {
  if (!owner) return false;
  const end = start + owner.bytesInResource;
  if (source.position < end) await source.skip(end - source.position);
  return true;
}

async function decodeBlock(
  source: ByteSource,
  owner: IconDirEntry | undefined,
  options: ParseOptions,
): Promise<BlockResult> {
  const offset = source.position;
  const fail = async (message: string, cause?: unknown): Promise<BlockResult> => ({
    kind: 'failed',
    error: new ImageDecodeError(
      `image at offset ${offset}: ${message}`,
      owner?.index,
      offset,
      cause === undefined ? undefined : { cause },
    ),
    aligned: await realign(source, owner, offset),
  });

  const size = (await source.read(4)).readUInt32LE(0);

  if (size === BitmapInfoHeaderSize) {
    const header = parseBitmapInfoHeader(size, await source.read(BitmapInfoHeaderSize - 4));
    const height = pixelHeight(header);
    const maxDimension = options.maxDimension ?? MaxImageDimension;
    if (header.width <= 0 || height <= 0 || header.width > maxDimension || height > maxDimension) {
      return fail(`unusable bitmap size ${header.width}x${height}`);
    }
    const colorCount = resolveColorCount(owner ? owner.colorCount : 0, header.planes, header.bitCount);
    const unsupported = unsupportedLayout(header, colorCount);
    if (unsupported) {
      return fail(unsupported);
    }
    const bitmap = await readBitmap(source, header, colorCount);
    try {
      return { kind: 'bitmap', image: expandDib(bitmap, options), bitmap };
    } catch (err) {
      return fail(errorMessage(err), err);
    }
  }

  if (size === PngMagic1) {
    const second = (await source.read(4)).readUInt32LE(0);
    if (second !== PngMagic2) {
      return fail('incomplete PNG signature');
    }
    if (owner && owner.bytesInResource < PngSignatureSize) {
      return fail(`PNG resource of ${owner.bytesInResource} bytes is shorter than its signature`);
    }
    const png = owner ? await readPngResource(source, owner.bytesInResource) : await readPngChunks(source);
    const decodePng = options.decodePng ?? decodePngWithSharp;
    try {
      return { kind: 'png', image: await decodePng(png) };
    } catch (err) {
      return fail(`PNG decode failed: ${errorMessage(err)}`, err);
    }
  }

  return fail(`unrecognized bitmap header size: ${size}`);
}

async function parseSource(source: ByteSource, options: ParseOptions): Promise<IconDirectory> {
  const report: (issue: IconIssue) => void = options.onIssue ?? (() => undefined);
  const dir = await readIconDir(source);
  const entries = await readIconDirEntries(source, dir.count, report);

  const pending = new PendingEntries(entries);
  const attached = new Map<number, { image: IconImage; bitmap?: IconBitmap }>();

  for (let block = 0; block < dir.count && pending.size > 0; block++) {
    const offset = source.position;
    const owner = pending.claim(offset);
    const result = await decodeBlock(source, owner, options);

    if (result.kind === 'failed') {
      report(result.error);
      if (!result.aligned) break;
    } else if (!owner) {
      report(new ImageDecodeError(`no directory entry claims the image at offset ${offset}`, undefined, offset));
    } else {
      attached.set(owner.index, result.kind === 'bitmap'
        ? { image: result.image, bitmap: result.bitmap }
        : { image: result.image });
    }
  }

  const resolved = entries.map((entry) => Object.freeze({ ...entry, ...attached.get(entry.index) }));
  return Object.freeze({
    ...dir,
    entries: Object.freeze(resolved),
    images: Object.freeze(range(dir.count).map((index) => attached.get(index)?.image)),
  });
}

export const ICO = {
  match(buf: Uint8Array): boolean {
    return buf.length >= HeaderSize &&
      buf[0] === 0 && buf[1] === 0 &&
      (buf[2] === IconType.ICON || buf[2] === IconType.CURSOR) && buf[3] === 0;
  },
  /**
   * Decodes an icon or cursor in a single forward pass. Rejects with
   * `HeaderError` for anything that is not an icon directory and with
   * `SourceIOError` when the input ends early. The source is closed once
   * parsing settles.
   */
  async parse(input: IconInput, options: ParseOptions = {}): Promise<IconDirectory> {
    const source = await openSource(input);
    try {
      return await parseSource(source, options);
    } finally {
      await source.close();
    }
  },
};

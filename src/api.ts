export { HeaderError, DirectoryEntryError, IconError, ImageDecodeError, SourceIOError } from './errors';
export { ICO } from './models/ico';
export type { IconDirectory, IconIssue, ParseOptions } from './models/ico';
export { IconDirEntry, IconType, parseIconDir, parseIconDirEntry, readIconDir, readIconDirEntries } from './models/ico-dir';
export type { IconDir } from './models/ico-dir';
export {
  andStride,
  expandDib,
  parseBitmapInfoHeader,
  readBitmap,
  readColorTable,
  resolveColorCount,
  xorStride,
} from './models/dib';
export type { BitmapInfoHeader, ExpandOptions, IconBitmap, RGBQuad } from './models/dib';
export { argb, IconImage } from './models/image';
export { decodePngWithSharp } from './models/png';
export type { PngDecoder } from './models/png';
export { PendingEntries } from './models/locator';
export { fromBuffer, isUrl, openFile, openSource, openUrl, StreamSource } from './source';
export type { ByteSource, Chunk, IconInput } from './source';

import { Readable } from 'stream';
import { fileURLToPath } from 'url';
import { fromBuffer, openFile } from './file';
import type { ByteSource } from './reader';
import { StreamSource } from './reader';
import { isUrl, openUrl } from './url';

export type { ByteSource, Chunk } from './reader';
export { StreamSource } from './reader';
export { fromBuffer, openFile } from './file';
export { isUrl, openUrl } from './url';

/** Anything `openSource` knows how to turn into a forward-only byte source. */
export type IconInput = string | URL | Uint8Array | Readable | ByteSource;

export async function openSource(input: IconInput): Promise<ByteSource> {
  if (typeof input === 'string') {
    return isUrl(input) ? openUrl(input) : openFile(input);
  } else if (input instanceof URL) {
    return input.protocol === 'file:' ? openFile(fileURLToPath(input)) : openUrl(input);
  } else if (input instanceof Uint8Array) {
    return fromBuffer(input);
  } else if (input instanceof Readable) {
    return new StreamSource(input);
  }
  return input;
}

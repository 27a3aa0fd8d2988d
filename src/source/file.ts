import { createReadStream } from 'fs';
import { Readable } from 'stream';
import { StreamSource } from './reader';

export function openFile(path: string): StreamSource {
  return new StreamSource(createReadStream(path));
}

export function fromBuffer(buf: Uint8Array): StreamSource {
  return new StreamSource(Readable.from([buf]));
}

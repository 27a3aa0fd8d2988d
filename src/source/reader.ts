import { SourceIOError } from '../errors';

/**
 * A forward-only byte source. Reads never move backwards, so the decoder can
 * run directly on a network response.
 */
export interface ByteSource {
  /** Number of bytes consumed so far. */
  readonly position: number;
  /** Reads exactly `length` bytes, rejecting with `SourceIOError` at end of input. */
  read(length: number): Promise<Buffer>;
  skip(length: number): Promise<void>;
  close(): Promise<void>;
}

export type Chunk = Buffer | Uint8Array | string;

export class StreamSource implements ByteSource {
  private readonly iterator: AsyncIterator<Chunk>;
  private buffered: Buffer = Buffer.alloc(0);
  private consumed = 0;
  private closed = false;

  constructor(chunks: AsyncIterable<Chunk>) {
    this.iterator = chunks[Symbol.asyncIterator]();
  }

  get position(): number {
    return this.consumed;
  }

  async read(length: number): Promise<Buffer> {
    if (length < 0 || !Number.isInteger(length)) {
      throw new RangeError(`invalid read length: ${length}`);
    }
    await this.fill(length);
    const out = this.buffered.subarray(0, length);
    this.buffered = this.buffered.subarray(length);
    this.consumed += length;
    return out;
  }

  async skip(length: number): Promise<void> {
    let remaining = length;
    while (remaining > 0) {
      if (this.buffered.length === 0) {
        await this.fill(1);
      }
      const n = Math.min(remaining, this.buffered.length);
      this.buffered = this.buffered.subarray(n);
      this.consumed += n;
      remaining -= n;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.buffered = Buffer.alloc(0);
    if (this.iterator.return) {
      await this.iterator.return();
    }
  }

  private async fill(length: number) {
    const parts: Buffer[] = [this.buffered];
    let available = this.buffered.length;
    while (available < length) {
      const next = this.closed ? undefined : await this.iterator.next();
      if (!next || next.done) {
        this.buffered = Buffer.concat(parts);
        throw new SourceIOError(
          `unexpected end of input at offset ${this.consumed + available}: needed ${length - available} more byte(s)`,
          this.consumed + available,
        );
      }
      const chunk = typeof next.value === 'string' ? Buffer.from(next.value, 'binary') : Buffer.from(next.value);
      parts.push(chunk);
      available += chunk.length;
    }
    if (parts.length > 1) {
      this.buffered = Buffer.concat(parts);
    }
  }
}

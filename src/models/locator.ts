import type { IconDirEntry } from './ico-dir';

/**
 * Directory entries whose image block has not been reached yet. The stream is
 * only read forwards, so each block is matched to its entry by comparing the
 * entry's offset with the number of bytes consumed so far.
 */
export class PendingEntries {
  private readonly entries: IconDirEntry[];

  constructor(entries: readonly IconDirEntry[]) {
    this.entries = [...entries];
  }

  get size(): number {
    return this.entries.length;
  }

  /** Removes and returns the first pending entry whose image starts at `offset`. */
  claim(offset: number): IconDirEntry | undefined {
    const i = this.entries.findIndex((entry) => entry.imageOffset === offset);
    if (i < 0) return undefined;
    return this.entries.splice(i, 1)[0];
  }
}

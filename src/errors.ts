export class IconError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The container header is not an icon or cursor directory. Aborts the parse. */
export class HeaderError extends IconError {}

/** A directory record that was dropped from the entry list. */
export class DirectoryEntryError extends IconError {
  constructor(message: string, public readonly index: number) {
    super(message);
  }
}

/**
 * An image block that produced no image. `index` is the directory record the
 * block belongs to, or `undefined` when no pending entry claimed the block.
 */
export class ImageDecodeError extends IconError {
  constructor(
    message: string,
    public readonly index: number | undefined,
    public readonly offset: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/** The byte source ended before a read could be satisfied. */
export class SourceIOError extends IconError {
  constructor(message: string, public readonly position: number) {
    super(message);
  }
}

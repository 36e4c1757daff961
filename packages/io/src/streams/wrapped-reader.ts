import type { ByteReader } from "./byte-streams.js";

/**
 * A byte reader paired with the path it was opened from.
 *
 * Reads are forwarded as they are: native read failures propagate without
 * conversion, callers needing the Error Model convert them with the path.
 */
export class WrappedReader implements ByteReader {
  readonly path: string;
  private readonly inner: ByteReader;

  constructor(path: string, inner: ByteReader) {
    this.path = path;
    this.inner = inner;
  }

  read(buffer: Uint8Array): number {
    return this.inner.read(buffer);
  }

  close(): void {
    this.inner.close?.();
  }
}

import type { ByteReader } from "@quarry/io";

/**
 * Byte reader over an in-memory array.
 *
 * `maxChunk` caps the bytes returned per read, to exercise callers
 * against short reads.
 */
export class BytesReader implements ByteReader {
  private offset = 0;
  closed = false;

  constructor(
    private readonly data: Uint8Array,
    private readonly maxChunk = Number.POSITIVE_INFINITY,
  ) {}

  read(buffer: Uint8Array): number {
    const n = Math.min(buffer.length, this.maxChunk, this.data.length - this.offset);
    buffer.set(this.data.subarray(this.offset, this.offset + n));
    this.offset += n;
    return n;
  }

  close(): void {
    this.closed = true;
  }
}

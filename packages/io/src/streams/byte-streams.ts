/**
 * Low-level byte stream contracts.
 *
 * These are the opaque resources wrapped by {@link WrappedReader} and
 * {@link WrappedWriter}. Their failures are native errors; conversion into
 * the Error Model happens one layer up.
 */

/**
 * A resource bytes can be pulled from.
 */
export interface ByteReader {
  /**
   * Read up to `buffer.length` bytes into `buffer`.
   * @returns Number of bytes read; 0 signals the end of the stream
   */
  read(buffer: Uint8Array): number;
  close?(): void;
}

/**
 * A resource bytes can be appended to.
 */
export interface ByteWriter {
  /** Append all of `bytes` after everything written before */
  write(bytes: Uint8Array): void;
  flush(): void;
  close?(): void;
}

/**
 * Read from `reader` until `buffer` is full or the stream ends.
 *
 * @returns Number of bytes read; less than `buffer.length` only at end of stream
 */
export function readFully(reader: ByteReader, buffer: Uint8Array): number {
  let offset = 0;
  while (offset < buffer.length) {
    const n = reader.read(buffer.subarray(offset));
    if (n === 0) break;
    offset += n;
  }
  return offset;
}

/**
 * Read everything left in `reader` into one array.
 */
export function readToEnd(reader: ByteReader, chunkSize = 64 * 1024): Uint8Array {
  const chunks: Uint8Array[] = [];
  let total = 0;
  while (true) {
    const chunk = new Uint8Array(chunkSize);
    const n = reader.read(chunk);
    if (n === 0) break;
    chunks.push(chunk.subarray(0, n));
    total += n;
  }
  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

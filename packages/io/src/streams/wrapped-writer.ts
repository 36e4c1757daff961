import type { ByteWriter } from "./byte-streams.js";
import { convertWriteErrors, type Writer } from "./utf8-writer.js";

const textEncoder = new TextEncoder();

/**
 * A byte writer paired with the path it was opened for.
 *
 * Exposes the raw {@link ByteWriter} facet (`write`, `writeString`, `flush`),
 * whose failures are native, and the {@link Writer} facet (`writeBytes`,
 * `writeText`), whose failures are {@link FileIoError}s carrying this
 * handle's path. Both facets deliver the same bytes to the inner resource.
 */
export class WrappedWriter implements ByteWriter, Writer {
  readonly path: string;
  private readonly inner: ByteWriter;
  private closed = false;

  constructor(path: string, inner: ByteWriter) {
    this.path = path;
    this.inner = inner;
  }

  write(bytes: Uint8Array): void {
    this.inner.write(bytes);
  }

  /** Raw text write: UTF-8 bytes of `text`, native failures */
  writeString(text: string): void {
    this.inner.write(textEncoder.encode(text));
  }

  flush(): void {
    this.inner.flush();
  }

  writeBytes(bytes: Uint8Array): void {
    convertWriteErrors(this.path, () => this.inner.write(bytes));
  }

  writeText(text: string): void {
    convertWriteErrors(this.path, () => this.writeString(text));
  }

  /** Flush and close the inner resource; later calls do nothing */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    convertWriteErrors(this.path, () => {
      try {
        this.inner.flush();
      } finally {
        this.inner.close?.();
      }
    });
  }
}

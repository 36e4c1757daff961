/**
 * Write contracts with Error Model handling.
 *
 * Implementations append to their underlying resource and convert any
 * failure into a {@link FileIoError} carrying the resource's path.
 */

import { writeError } from "../errors/index.js";

/** Path reported by in-memory text buffers, which have no path of their own */
export const IN_MEMORY_PATH = "<in memory>";

/**
 * Can append UTF-8 text.
 */
export interface Utf8Writer {
  /**
   * Append `text` encoded as UTF-8.
   * @throws FileIoError when the underlying write fails
   */
  writeText(text: string): void;
}

/**
 * Can append UTF-8 text and raw bytes.
 */
export interface Writer extends Utf8Writer {
  /**
   * Append `bytes`.
   * @throws FileIoError when the underlying write fails
   */
  writeBytes(bytes: Uint8Array): void;
}

/**
 * Run a native write operation, converting its failure into a write error
 * attributed to `path`.
 */
export function convertWriteErrors<T>(path: string, operation: () => T): T {
  try {
    return operation();
  } catch (error) {
    throw writeError(path, error);
  }
}

/**
 * In-memory text buffer.
 */
export class StringWriter implements Utf8Writer {
  private text = "";

  writeText(text: string): void {
    convertWriteErrors(IN_MEMORY_PATH, () => {
      this.text += text;
    });
  }

  toString(): string {
    return this.text;
  }
}

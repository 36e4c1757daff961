/**
 * Filesystem capability interfaces.
 *
 * Calling code depends on the narrowest interface it needs: a backend used
 * only to load sources does not have to support writing, and the reverse.
 */

import type { WrappedReader } from "../streams/wrapped-reader.js";
import type { WrappedWriter } from "../streams/wrapped-writer.js";

/**
 * Read side of a filesystem backend.
 */
export interface FileSystemReader {
  /**
   * Lazily enumerate the source files under `dir`.
   *
   * What counts as a source file is decided by the backend. The sequence is
   * finite, yields each matching path once and cannot be restarted.
   */
  enumerateSourceFiles(dir: string): Iterable<string>;

  /**
   * Read a whole file as UTF-8 text.
   * @throws FileIoError when the file cannot be read or is not valid UTF-8
   */
  readToString(path: string): string;

  /**
   * Open a file for streaming reads.
   * @throws FileIoError when the file cannot be opened
   */
  openForRead(path: string): WrappedReader;

  /** False for missing paths, never an error */
  isFile(path: string): boolean;

  /** False for missing paths, never an error */
  isDirectory(path: string): boolean;
}

/**
 * Write side of a filesystem backend.
 */
export interface FileSystemWriter {
  /**
   * Open a path for streaming writes.
   * @throws FileIoError when the path cannot be opened
   */
  openForWrite(path: string): WrappedWriter;
}

/** A backend supporting both directions */
export interface FileSystemIO extends FileSystemReader, FileSystemWriter {}

import { writeError } from "../errors/index.js";
import type { IoLogger } from "../logger.js";
import type { WrappedReader } from "../streams/wrapped-reader.js";
import type { GzipReader } from "./gzip-reader.js";
import type { TarArchive } from "./tar-archive.js";

/** A gzip-compressed tar archive read from an opened file */
export type TarGzArchive = TarArchive<GzipReader<WrappedReader>>;

/**
 * Archive unpacking capability.
 *
 * Backends supply only {@link ioResultUnpack}, the mechanical extraction
 * step, which may throw native errors. {@link unpack} adds tracing and
 * converts those errors into a directory write error for every backend.
 */
export abstract class TarUnpacker {
  protected readonly logger?: IoLogger;

  constructor(options: { logger?: IoLogger } = {}) {
    this.logger = options.logger;
  }

  /**
   * Extract `archive` into the directory `path`.
   * Failures are native errors.
   */
  abstract ioResultUnpack(path: string, archive: TarGzArchive): void;

  /**
   * Extract `archive` into the directory `path`.
   * @throws FileIoError with action "write" and kind "directory" on any failure
   */
  unpack(path: string, archive: TarGzArchive): void {
    this.logger?.trace?.("unpacking tar archive", { path });
    try {
      this.ioResultUnpack(path, archive);
    } catch (error) {
      throw writeError(path, error, "directory");
    }
  }
}

import { closeSync, mkdirSync, openSync, writeSync } from "node:fs";
import { dirname, isAbsolute, join } from "node:path";
import { type IoLogger, type TarGzArchive, TarUnpacker } from "@quarry/io";

export interface NodeTarUnpackerOptions {
  logger?: IoLogger;
  /** Replace files that already exist in the target directory (default true) */
  overwrite?: boolean;
}

const COPY_BUFFER_SIZE = 64 * 1024;

/**
 * Paths that would land outside the target directory
 */
function isUnsafePath(path: string): boolean {
  return isAbsolute(path) || path.split(/[\\/]/).includes("..");
}

/**
 * Unpacks archives onto the Node.js filesystem.
 *
 * Directories and regular files are extracted; links and special entries
 * are skipped, as are entries whose path is absolute or contains `..`.
 */
export class NodeTarUnpacker extends TarUnpacker {
  private readonly overwrite: boolean;

  constructor(options: NodeTarUnpackerOptions = {}) {
    super({ logger: options.logger });
    this.overwrite = options.overwrite ?? true;
  }

  ioResultUnpack(path: string, archive: TarGzArchive): void {
    const buffer = new Uint8Array(COPY_BUFFER_SIZE);
    try {
      mkdirSync(path, { recursive: true });
      for (const entry of archive.entries()) {
        if (isUnsafePath(entry.path)) {
          this.logger?.trace?.("skipping unsafe archive entry", { path: entry.path });
          continue;
        }
        const target = join(path, entry.path);
        switch (entry.type) {
          case "directory":
            mkdirSync(target, { recursive: true });
            break;
          case "file": {
            this.logger?.trace?.("extracting file", { path: target, size: entry.size });
            mkdirSync(dirname(target), { recursive: true });
            const fd = openSync(target, this.overwrite ? "w" : "wx", entry.mode || 0o644);
            try {
              let n = entry.read(buffer);
              while (n > 0) {
                let offset = 0;
                while (offset < n) {
                  offset += writeSync(fd, buffer, offset, n - offset);
                }
                n = entry.read(buffer);
              }
            } finally {
              closeSync(fd);
            }
            break;
          }
          default:
            this.logger?.trace?.("skipping archive entry", { path: entry.path, type: entry.type });
        }
      }
    } finally {
      archive.close();
    }
  }
}

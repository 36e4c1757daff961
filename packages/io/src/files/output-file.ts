import type { FileSystemWriter } from "./file-system.js";

/**
 * A fully materialized text artifact destined for a writer.
 */
export interface OutputFile {
  readonly path: string;
  readonly text: string;
}

/**
 * Write each file through `writer`, in order.
 *
 * Every handle is closed before the next file is opened. The first failure
 * stops the loop and propagates as a {@link FileIoError}.
 */
export function writeOutputFiles(writer: FileSystemWriter, files: Iterable<OutputFile>): void {
  for (const file of files) {
    const handle = writer.openForWrite(file.path);
    try {
      handle.writeText(file.text);
    } finally {
      handle.close();
    }
  }
}

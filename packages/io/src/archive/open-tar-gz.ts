import type { FileSystemReader } from "../files/file-system.js";
import { GzipReader } from "./gzip-reader.js";
import { TarArchive } from "./tar-archive.js";
import type { TarGzArchive } from "./tar-unpacker.js";

/**
 * Open a `.tar.gz` file for unpacking.
 * @throws FileIoError when the file cannot be opened
 */
export function openTarGz(files: FileSystemReader, path: string): TarGzArchive {
  return new TarArchive(new GzipReader(files.openForRead(path)));
}

import {
  describeError,
  type FileSystemIO,
  type OutputFile,
  type WrappedReader,
  WrappedWriter,
} from "@quarry/io";
import { createChannel, type Receiver, type Sender } from "./channel.js";
import { FilesChannelError, NotImplementedError } from "./errors.js";
import { InMemoryFile } from "./in-memory-file.js";

/** A path opened for writing and the buffer behind it */
export type FileMessage = readonly [path: string, file: InMemoryFile];

/**
 * Write-only filesystem that reports every opened file on a channel.
 *
 * Each {@link openForWrite} call sends the path and a handle sharing the
 * new file's buffer right away, so a test can collect the written text once
 * the writers are closed. The read capabilities are not provided.
 *
 * @example
 * ```ts
 * const [files, receiver] = FilesChannel.create();
 * writeOutputFiles(files, [{ path: "/out/a.txt", text: "a" }]);
 * FilesChannel.recvUtf8Files(receiver); // [{ path: "/out/a.txt", text: "a" }]
 * ```
 */
export class FilesChannel implements FileSystemIO {
  private constructor(private readonly sender: Sender<FileMessage>) {}

  static create(): [FilesChannel, Receiver<FileMessage>] {
    const [sender, receiver] = createChannel<FileMessage>();
    return [new FilesChannel(sender), receiver];
  }

  /**
   * Collect every file queued on `receiver`, in the order they were opened.
   *
   * Messages are taken one at a time: a failure discards the failing message
   * and leaves the later ones queued.
   *
   * @throws FilesChannelError when the receiver is closed, a file is still
   *   open elsewhere, or a file is not valid UTF-8
   */
  static recvUtf8Files(receiver: Receiver<FileMessage>): OutputFile[] {
    const decoder = new TextDecoder("utf-8", { fatal: true });
    const files: OutputFile[] = [];
    for (;;) {
      let message: FileMessage | undefined;
      try {
        message = receiver.tryRecv();
      } catch (error) {
        throw new FilesChannelError(`Cannot receive files: ${describeError(error)}`, {
          cause: error,
        });
      }
      if (message === undefined) return files;

      const [path, file] = message;
      let bytes: Uint8Array;
      try {
        bytes = file.intoContents();
      } catch (error) {
        file.release();
        throw new FilesChannelError(`Cannot reclaim ${path}: ${describeError(error)}`, {
          cause: error,
        });
      }
      try {
        files.push({ path, text: decoder.decode(bytes) });
      } catch (error) {
        throw new FilesChannelError(`${path} is not valid UTF-8`, { cause: error });
      }
    }
  }

  /** Another sender on the same channel */
  clone(): FilesChannel {
    return new FilesChannel(this.sender.clone());
  }

  openForWrite(path: string): WrappedWriter {
    const file = new InMemoryFile();
    const observed = file.clone();
    if (!this.sender.send([path, observed])) {
      observed.release();
    }
    return new WrappedWriter(path, file);
  }

  enumerateSourceFiles(_dir: string): Iterable<string> {
    throw new NotImplementedError("FilesChannel.enumerateSourceFiles");
  }

  readToString(_path: string): string {
    throw new NotImplementedError("FilesChannel.readToString");
  }

  openForRead(_path: string): WrappedReader {
    throw new NotImplementedError("FilesChannel.openForRead");
  }

  isFile(_path: string): boolean {
    throw new NotImplementedError("FilesChannel.isFile");
  }

  isDirectory(_path: string): boolean {
    throw new NotImplementedError("FilesChannel.isDirectory");
  }
}

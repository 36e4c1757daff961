import { type ByteWriter, convertWriteErrors, type Writer } from "@quarry/io";
import { SharedFileError } from "./errors.js";

/** Path reported by write errors of an {@link InMemoryFile} used directly */
export const IN_MEMORY_TEST_FILE_PATH = "<in memory test file>";

const textEncoder = new TextEncoder();

interface SharedContents {
  chunks: Uint8Array[];
  length: number;
  owners: number;
}

/**
 * In-memory file whose byte buffer is shared between handles.
 *
 * {@link clone} returns a new handle over the same buffer and counts it as
 * an owner; {@link release} gives up a handle's ownership. The buffer can be
 * reclaimed with {@link intoContents} only by the last remaining owner.
 */
export class InMemoryFile implements ByteWriter, Writer {
  private shared: SharedContents | null = { chunks: [], length: 0, owners: 1 };

  clone(): InMemoryFile {
    const contents = this.storage();
    contents.owners++;
    const copy = new InMemoryFile();
    copy.shared = contents;
    return copy;
  }

  /** Owners of the buffer, 0 once this handle has been released */
  get ownerCount(): number {
    return this.shared?.owners ?? 0;
  }

  write(bytes: Uint8Array): void {
    const contents = this.storage();
    contents.chunks.push(bytes.slice());
    contents.length += bytes.length;
  }

  flush(): void {
    this.storage();
  }

  writeBytes(bytes: Uint8Array): void {
    convertWriteErrors(IN_MEMORY_TEST_FILE_PATH, () => this.write(bytes));
  }

  writeText(text: string): void {
    convertWriteErrors(IN_MEMORY_TEST_FILE_PATH, () => this.write(textEncoder.encode(text)));
  }

  /** Give up this handle's ownership; later use of the handle fails */
  release(): void {
    if (this.shared) {
      this.shared.owners--;
      this.shared = null;
    }
  }

  close(): void {
    this.release();
  }

  /** Copy of the bytes written so far */
  contents(): Uint8Array {
    const { chunks, length } = this.storage();
    const result = new Uint8Array(length);
    let offset = 0;
    for (const chunk of chunks) {
      result.set(chunk, offset);
      offset += chunk.length;
    }
    return result;
  }

  /**
   * Take the buffer out of the file, consuming this handle.
   * @throws SharedFileError when another handle still owns the buffer
   */
  intoContents(): Uint8Array {
    const owners = this.storage().owners;
    if (owners !== 1) {
      throw new SharedFileError(owners);
    }
    const result = this.contents();
    this.release();
    return result;
  }

  private storage(): SharedContents {
    if (!this.shared) {
      throw new Error("In-memory file handle has been released");
    }
    return this.shared;
  }
}

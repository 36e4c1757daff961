import { closeSync, readSync, writeSync } from "node:fs";
import type { ByteReader, ByteWriter } from "@quarry/io";

/**
 * Byte reader over an open file descriptor. Owns the descriptor.
 */
export class NodeFileReader implements ByteReader {
  private fd: number | null;

  constructor(fd: number) {
    this.fd = fd;
  }

  read(buffer: Uint8Array): number {
    if (this.fd === null) {
      throw new Error("File is closed");
    }
    return readSync(this.fd, buffer, 0, buffer.length, null);
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }
}

/**
 * Byte writer over an open file descriptor. Owns the descriptor.
 */
export class NodeFileWriter implements ByteWriter {
  private fd: number | null;

  constructor(fd: number) {
    this.fd = fd;
  }

  write(bytes: Uint8Array): void {
    const fd = this.descriptor();
    let offset = 0;
    // writeSync may write fewer bytes than requested
    while (offset < bytes.length) {
      offset += writeSync(fd, bytes, offset, bytes.length - offset);
    }
  }

  /** Writes are unbuffered; only checks that the file is still open */
  flush(): void {
    this.descriptor();
  }

  close(): void {
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }

  private descriptor(): number {
    if (this.fd === null) {
      throw new Error("File is closed");
    }
    return this.fd;
  }
}

/**
 * Synchronous tar reader over a {@link ByteReader}.
 *
 * Understands ustar and GNU headers: octal and base-256 numeric fields,
 * the ustar name prefix, GNU long names (`L`) and PAX `path` records (`x`).
 * Reading stops at the first zero block or at a clean end of input.
 */

import { type ByteReader, readFully } from "../streams/byte-streams.js";

const BLOCK_SIZE = 512;

const textDecoder = new TextDecoder();

export type TarEntryType = "file" | "directory" | "symlink" | "hardlink" | "other";

/**
 * One archive member. Its content is read through `read()` and is only
 * available until the next entry is requested.
 */
export interface TarEntry extends ByteReader {
  readonly path: string;
  readonly type: TarEntryType;
  /** Content size in bytes */
  readonly size: number;
  /** Permission bits */
  readonly mode: number;
  /** Target of symbolic and hard links, empty otherwise */
  readonly linkName: string;
}

interface RawHeader {
  name: string;
  mode: number;
  size: number;
  typeFlag: string;
  linkName: string;
  prefix: string;
}

class EntryContent implements ByteReader {
  private remaining: number;

  constructor(
    private readonly inner: ByteReader,
    readonly size: number,
  ) {
    this.remaining = size;
  }

  read(buffer: Uint8Array): number {
    if (this.remaining === 0 || buffer.length === 0) return 0;
    const n = this.inner.read(buffer.subarray(0, Math.min(buffer.length, this.remaining)));
    if (n === 0) {
      throw new Error("Unexpected end of tar archive");
    }
    this.remaining -= n;
    return n;
  }

  /** Consume the unread content and the block padding after it */
  skipRest(): void {
    const padding = (BLOCK_SIZE - (this.size % BLOCK_SIZE)) % BLOCK_SIZE;
    let toSkip = this.remaining + padding;
    this.remaining = 0;
    const scratch = new Uint8Array(BLOCK_SIZE * 16);
    while (toSkip > 0) {
      const n = readFully(this.inner, scratch.subarray(0, Math.min(scratch.length, toSkip)));
      if (n === 0) {
        throw new Error("Unexpected end of tar archive");
      }
      toSkip -= n;
    }
  }

  readAll(): Uint8Array {
    const data = new Uint8Array(this.remaining);
    if (readFully(this, data) !== data.length) {
      throw new Error("Unexpected end of tar archive");
    }
    return data;
  }
}

function readString(block: Uint8Array, offset: number, length: number): string {
  const field = block.subarray(offset, offset + length);
  const end = field.indexOf(0);
  return textDecoder.decode(end >= 0 ? field.subarray(0, end) : field);
}

function readNumber(block: Uint8Array, offset: number, length: number): number {
  const field = block.subarray(offset, offset + length);
  // GNU base-256 encoding for values that do not fit in octal
  if (field[0] !== undefined && (field[0] & 0x80) !== 0) {
    let value = field[0] & 0x7f;
    for (const byte of field.subarray(1)) {
      value = value * 256 + byte;
    }
    return value;
  }
  const text = readString(block, offset, length).trim();
  if (text === "") return 0;
  const value = Number.parseInt(text, 8);
  if (Number.isNaN(value)) {
    throw new Error(`Invalid numeric field in tar header: "${text}"`);
  }
  return value;
}

function verifyChecksum(block: Uint8Array): void {
  const expected = readNumber(block, 148, 8);
  let actual = 0;
  for (let i = 0; i < BLOCK_SIZE; i++) {
    actual += i >= 148 && i < 156 ? 0x20 : (block[i] ?? 0);
  }
  if (actual !== expected) {
    throw new Error(`Invalid tar header checksum: expected ${expected}, got ${actual}`);
  }
}

function parseHeader(block: Uint8Array): RawHeader {
  verifyChecksum(block);
  const magic = readString(block, 257, 6);
  return {
    name: readString(block, 0, 100),
    mode: readNumber(block, 100, 8),
    size: readNumber(block, 124, 12),
    typeFlag: String.fromCharCode(block[156] ?? 0),
    linkName: readString(block, 157, 100),
    prefix: magic.startsWith("ustar") ? readString(block, 345, 155) : "",
  };
}

/**
 * Parse PAX extended header records: `<length> <key>=<value>\n`.
 */
export function parsePaxRecords(data: Uint8Array): Map<string, string> {
  const records = new Map<string, string>();
  let pos = 0;
  while (pos < data.length) {
    const space = data.indexOf(0x20, pos);
    if (space < 0) break;
    const length = Number.parseInt(textDecoder.decode(data.subarray(pos, space)), 10);
    if (Number.isNaN(length) || length <= space - pos || pos + length > data.length) {
      throw new Error("Invalid PAX header record");
    }
    const record = textDecoder.decode(data.subarray(space + 1, pos + length - 1));
    const eq = record.indexOf("=");
    if (eq > 0) {
      records.set(record.slice(0, eq), record.slice(eq + 1));
    }
    pos += length;
  }
  return records;
}

function entryType(typeFlag: string): TarEntryType {
  switch (typeFlag) {
    case "0":
    case "\0":
    case "7":
      return "file";
    case "5":
      return "directory";
    case "2":
      return "symlink";
    case "1":
      return "hardlink";
    default:
      return "other";
  }
}

function isZeroBlock(block: Uint8Array): boolean {
  return block.every((byte) => byte === 0);
}

export class TarArchive<R extends ByteReader = ByteReader> {
  readonly inner: R;
  private current: EntryContent | null = null;

  constructor(inner: R) {
    this.inner = inner;
  }

  /**
   * Iterate over the archive members in order.
   * @throws Error on malformed headers or truncated input
   */
  *entries(): Generator<TarEntry> {
    const block = new Uint8Array(BLOCK_SIZE);
    let longName: string | undefined;
    let paxPath: string | undefined;

    while (true) {
      this.current?.skipRest();
      this.current = null;

      const n = readFully(this.inner, block);
      if (n === 0) return;
      if (n < BLOCK_SIZE) {
        throw new Error("Unexpected end of tar archive");
      }
      if (isZeroBlock(block)) return;

      const header = parseHeader(block);
      const content = new EntryContent(this.inner, header.size);
      this.current = content;

      if (header.typeFlag === "L") {
        longName = readString(content.readAll(), 0, header.size);
        continue;
      }
      if (header.typeFlag === "x") {
        paxPath = parsePaxRecords(content.readAll()).get("path") ?? paxPath;
        continue;
      }
      if (header.typeFlag === "g") {
        continue;
      }

      const path =
        paxPath ?? longName ?? (header.prefix ? `${header.prefix}/${header.name}` : header.name);
      longName = undefined;
      paxPath = undefined;

      yield {
        path,
        type: entryType(header.typeFlag),
        size: header.size,
        mode: header.mode & 0o7777,
        linkName: header.linkName,
        read: (buffer: Uint8Array) => content.read(buffer),
      };
    }
  }

  close(): void {
    this.inner.close?.();
  }
}

/**
 * Builds tar archives for tests.
 */

const BLOCK_SIZE = 512;

const textEncoder = new TextEncoder();

export interface TarFixtureEntry {
  path: string;
  /** Content of regular files */
  content?: string | Uint8Array;
  /** Defaults to "file" */
  type?: "file" | "directory" | "symlink";
  mode?: number;
  linkName?: string;
  /** Emit the path as a PAX `path` record instead of in the header */
  pax?: boolean;
}

function writeString(block: Uint8Array, offset: number, length: number, value: string): void {
  block.set(textEncoder.encode(value).subarray(0, length), offset);
}

function writeOctal(block: Uint8Array, offset: number, length: number, value: number): void {
  writeString(block, offset, length - 1, value.toString(8).padStart(length - 1, "0"));
}

function header(name: string, typeFlag: string, size: number, mode: number, linkName = "") {
  const block = new Uint8Array(BLOCK_SIZE);
  writeString(block, 0, 100, name);
  writeOctal(block, 100, 8, mode);
  writeOctal(block, 108, 8, 0);
  writeOctal(block, 116, 8, 0);
  writeOctal(block, 124, 12, size);
  writeOctal(block, 136, 12, 0);
  writeString(block, 156, 1, typeFlag);
  writeString(block, 157, 100, linkName);
  writeString(block, 257, 6, "ustar");
  writeString(block, 263, 2, "00");
  block.fill(0x20, 148, 156);
  const checksum = block.reduce((sum, byte) => sum + byte, 0);
  writeString(block, 148, 8, `${checksum.toString(8).padStart(6, "0")}\0 `);
  return block;
}

function padded(data: Uint8Array): Uint8Array {
  const size = Math.ceil(data.length / BLOCK_SIZE) * BLOCK_SIZE;
  const result = new Uint8Array(size);
  result.set(data);
  return result;
}

/** `<length> path=<value>\n`, where the length counts itself */
function paxRecord(key: string, value: string): Uint8Array {
  const body = ` ${key}=${value}\n`;
  const bodyLength = textEncoder.encode(body).length;
  let length = bodyLength + 1;
  while (String(length).length + bodyLength !== length) {
    length = String(length).length + bodyLength;
  }
  return textEncoder.encode(`${length}${body}`);
}

/**
 * Serialize `entries` as a ustar archive ending with two zero blocks.
 * Names longer than 100 bytes are written with a GNU long-name entry.
 */
export function buildTar(entries: TarFixtureEntry[]): Uint8Array {
  const blocks: Uint8Array[] = [];
  for (const entry of entries) {
    const type = entry.type ?? "file";
    const content =
      typeof entry.content === "string"
        ? textEncoder.encode(entry.content)
        : (entry.content ?? new Uint8Array(0));
    const data = type === "file" ? content : new Uint8Array(0);
    const mode = entry.mode ?? (type === "directory" ? 0o755 : 0o644);
    const typeFlag = type === "directory" ? "5" : type === "symlink" ? "2" : "0";

    let name = entry.path;
    if (entry.pax) {
      const records = paxRecord("path", entry.path);
      blocks.push(header("PaxHeader", "x", records.length, 0o644), padded(records));
      name = "pax-placeholder";
    } else if (textEncoder.encode(name).length > 100) {
      const longName = textEncoder.encode(`${name}\0`);
      blocks.push(header("././@LongLink", "L", longName.length, 0o644), padded(longName));
      name = name.slice(0, 100);
    }

    blocks.push(header(name, typeFlag, data.length, mode, entry.linkName), padded(data));
  }
  blocks.push(new Uint8Array(BLOCK_SIZE * 2));

  const result = new Uint8Array(blocks.reduce((sum, block) => sum + block.length, 0));
  let offset = 0;
  for (const block of blocks) {
    result.set(block, offset);
    offset += block.length;
  }
  return result;
}

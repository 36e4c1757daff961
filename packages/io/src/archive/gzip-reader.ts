/**
 * Pull-based gzip decompression over a {@link ByteReader}.
 *
 * Compressed bytes are pulled from the inner reader on demand and pushed
 * through pako's streaming inflater, which detects gzip and zlib headers.
 */

import pako from "pako";
import type { ByteReader } from "../streams/byte-streams.js";

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

const textEncoder = new TextEncoder();

type InflateChunk = Parameters<pako.Inflate["onData"]>[0];

function toBytes(chunk: InflateChunk): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk;
  if (typeof chunk === "string") return textEncoder.encode(chunk);
  return new Uint8Array(chunk);
}

export class GzipReader<R extends ByteReader = ByteReader> implements ByteReader {
  readonly inner: R;
  private readonly inflater = new pako.Inflate();
  private readonly input: Uint8Array;
  private pending: Uint8Array[] = [];
  private finished = false;

  constructor(inner: R, chunkSize = DEFAULT_CHUNK_SIZE) {
    this.inner = inner;
    this.input = new Uint8Array(chunkSize);
    this.inflater.onData = (chunk) => {
      this.pending.push(toBytes(chunk));
    };
    const onEnd = this.inflater.onEnd.bind(this.inflater);
    this.inflater.onEnd = (status) => {
      onEnd(status);
      this.finished = true;
    };
  }

  read(buffer: Uint8Array): number {
    if (buffer.length === 0) return 0;
    while (this.pending.length === 0 && !this.finished) {
      this.pull();
    }
    const head = this.pending[0];
    if (!head) return 0;
    const n = Math.min(buffer.length, head.length);
    buffer.set(head.subarray(0, n));
    if (n === head.length) {
      this.pending.shift();
    } else {
      this.pending[0] = head.subarray(n);
    }
    return n;
  }

  close(): void {
    this.inner.close?.();
  }

  private pull(): void {
    const n = this.inner.read(this.input);
    if (n === 0) {
      this.inflater.push(new Uint8Array(0), true);
      this.checkStatus();
      if (!this.finished) {
        throw new Error("Unexpected end of gzip stream");
      }
      return;
    }
    this.inflater.push(this.input.slice(0, n), false);
    this.checkStatus();
  }

  private checkStatus(): void {
    if (this.inflater.err !== 0) {
      throw new Error(this.inflater.msg || `gzip error code ${this.inflater.err}`);
    }
  }
}

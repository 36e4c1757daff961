import { BytesReader, buildTar } from "@quarry/io-testing";
import pako from "pako";
import { describe, expect, it } from "vitest";
import {
  GzipReader,
  TarArchive,
  type TarGzArchive,
  TarUnpacker,
} from "../src/archive/index.js";
import { FileIoError } from "../src/errors/index.js";
import type { IoLogger } from "../src/logger.js";
import { readToEnd, WrappedReader } from "../src/streams/index.js";

const decoder = new TextDecoder();

function archiveOf(data: Uint8Array): TarGzArchive {
  const file = new WrappedReader("/cache/pkg.tar.gz", new BytesReader(data));
  return new TarArchive(new GzipReader(file));
}

/** Collects entry contents instead of touching a disk */
class CollectingUnpacker extends TarUnpacker {
  readonly files = new Map<string, string>();

  ioResultUnpack(path: string, archive: TarGzArchive): void {
    for (const entry of archive.entries()) {
      if (entry.type === "file") {
        this.files.set(`${path}/${entry.path}`, decoder.decode(readToEnd(entry)));
      }
    }
  }
}

class FailingUnpacker extends TarUnpacker {
  ioResultUnpack(_path: string, _archive: TarGzArchive): void {
    throw new Error("EACCES: permission denied");
  }
}

function recordingLogger() {
  const traces: Array<{ message: string; fields?: Record<string, unknown> }> = [];
  const logger: IoLogger = {
    trace: (message, fields) => traces.push({ message, fields }),
  };
  return { logger, traces };
}

describe("TarUnpacker", () => {
  it("unpacks through the backend primitive", () => {
    const data = pako.gzip(buildTar([{ path: "src/a.qr", content: "a" }]));
    const unpacker = new CollectingUnpacker();

    unpacker.unpack("/deps/pkg", archiveOf(data));

    expect([...unpacker.files]).toEqual([["/deps/pkg/src/a.qr", "a"]]);
  });

  it("traces the target directory", () => {
    const { logger, traces } = recordingLogger();
    const unpacker = new CollectingUnpacker({ logger });

    unpacker.unpack("/deps/pkg", archiveOf(pako.gzip(buildTar([]))));

    expect(traces).toEqual([{ message: "unpacking tar archive", fields: { path: "/deps/pkg" } }]);
  });

  it("converts backend failures into directory write errors", () => {
    const unpacker = new FailingUnpacker();

    let caught: unknown;
    try {
      unpacker.unpack("/deps/pkg", archiveOf(pako.gzip(buildTar([]))));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(FileIoError);
    expect(caught).toMatchObject({
      action: "write",
      kind: "directory",
      path: "/deps/pkg",
      cause: "EACCES: permission denied",
    });
  });

  it("converts corrupt archives into directory write errors", () => {
    const unpacker = new CollectingUnpacker();
    const corrupt = new TextEncoder().encode("definitely not gzip");

    let caught: unknown;
    try {
      unpacker.unpack("/deps/broken", archiveOf(corrupt));
    } catch (error) {
      caught = error;
    }

    if (!(caught instanceof FileIoError)) {
      throw new Error(`expected a FileIoError, got ${String(caught)}`);
    }
    const error = caught;
    expect(error.kind).toBe("directory");
    expect(error.path).toBe("/deps/broken");
    expect(error.cause?.length).toBeGreaterThan(0);
  });
});

import { existsSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileIoError, GzipReader, openTarGz, TarArchive, WrappedReader } from "@quarry/io";
import { BytesReader, buildTar } from "@quarry/io-testing";
import pako from "pako";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NodeFileSystem, NodeTarUnpacker } from "../src/index.js";

describe("NodeTarUnpacker", () => {
  let root: string;
  let files: NodeFileSystem;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "quarry-tar-"));
    files = new NodeFileSystem({ sourceExtensions: [".qr"] });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function writeArchive(data: Uint8Array): string {
    const path = join(root, "package.tar.gz");
    writeFileSync(path, data);
    return path;
  }

  it("unpacks a gzip-compressed tar archive", () => {
    const archivePath = writeArchive(
      pako.gzip(
        buildTar([
          { path: "pkg/", type: "directory" },
          { path: "pkg/src/lib.qr", content: "pub const answer = 42\n" },
          { path: "pkg/empty/", type: "directory" },
          { path: "pkg/run.sh", content: "#!/bin/sh\n", mode: 0o755 },
        ]),
      ),
    );
    const target = join(root, "deps/pkg");

    new NodeTarUnpacker().unpack(target, openTarGz(files, archivePath));

    expect(readFileSync(join(target, "pkg/src/lib.qr"), "utf8")).toBe("pub const answer = 42\n");
    expect(files.isDirectory(join(target, "pkg/empty"))).toBe(true);
    expect(statSync(join(target, "pkg/run.sh")).mode & 0o100).toBe(0o100);
  });

  it("fails with a directory write error on a corrupted archive", () => {
    const archivePath = writeArchive(new TextEncoder().encode("corrupted archive bytes"));
    const target = join(root, "deps/broken");

    let caught: unknown;
    try {
      new NodeTarUnpacker().unpack(target, openTarGz(files, archivePath));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(FileIoError);
    expect(caught).toMatchObject({ action: "write", kind: "directory", path: target });
    expect(caught).toHaveProperty("cause", expect.stringMatching(/.+/));
  });

  it("closes the archive when the target directory cannot be created", () => {
    const target = join(root, "occupied");
    writeFileSync(target, "not a directory");
    const source = new BytesReader(pako.gzip(buildTar([{ path: "a.txt", content: "a" }])));
    const archive = new TarArchive(new GzipReader(new WrappedReader("/deps/a.tar.gz", source)));

    expect(() => new NodeTarUnpacker().unpack(target, archive)).toThrow(FileIoError);
    expect(source.closed).toBe(true);
  });

  it("skips entries that would escape the target directory", () => {
    const archivePath = writeArchive(
      pako.gzip(
        buildTar([
          { path: "../escape.txt", content: "nope" },
          { path: "safe.txt", content: "ok" },
        ]),
      ),
    );
    const target = join(root, "out");

    new NodeTarUnpacker().unpack(target, openTarGz(files, archivePath));

    expect(existsSync(join(root, "escape.txt"))).toBe(false);
    expect(readFileSync(join(target, "safe.txt"), "utf8")).toBe("ok");
  });

  it("skips symbolic links", () => {
    const archivePath = writeArchive(
      pako.gzip(buildTar([{ path: "link", type: "symlink", linkName: "/etc/passwd" }])),
    );
    const target = join(root, "out");

    new NodeTarUnpacker().unpack(target, openTarGz(files, archivePath));

    expect(existsSync(join(target, "link"))).toBe(false);
  });

  it("refuses to overwrite existing files when asked to", () => {
    const target = join(root, "out");
    const archivePath = writeArchive(pako.gzip(buildTar([{ path: "a.txt", content: "new" }])));
    new NodeTarUnpacker().unpack(target, openTarGz(files, archivePath));

    expect(() =>
      new NodeTarUnpacker({ overwrite: false }).unpack(target, openTarGz(files, archivePath)),
    ).toThrow(FileIoError);
    expect(readFileSync(join(target, "a.txt"), "utf8")).toBe("new");
  });

  it("traces the unpacked target and entries", () => {
    const messages: string[] = [];
    const archivePath = writeArchive(pako.gzip(buildTar([{ path: "a.txt", content: "a" }])));

    new NodeTarUnpacker({ logger: { trace: (message) => messages.push(message) } }).unpack(
      join(root, "out"),
      openTarGz(files, archivePath),
    );

    expect(messages).toEqual(["unpacking tar archive", "extracting file"]);
  });
});

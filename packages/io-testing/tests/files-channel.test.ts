import { FileIoError, writeOutputFiles } from "@quarry/io";
import { describe, expect, it } from "vitest";
import { FilesChannel, FilesChannelError, NotImplementedError } from "../src/index.js";

describe("FilesChannel", () => {
  it("collects written files in the order they were opened", () => {
    const [files, receiver] = FilesChannel.create();

    const a = files.openForWrite("/a");
    const b = files.openForWrite("/b");
    b.writeText("text b");
    a.writeText("text ");
    a.writeText("a");
    a.close();
    b.close();

    expect(FilesChannel.recvUtf8Files(receiver)).toEqual([
      { path: "/a", text: "text a" },
      { path: "/b", text: "text b" },
    ]);
  });

  it("reports the path as soon as the file is opened", () => {
    const [files, receiver] = FilesChannel.create();

    files.openForWrite("/out/early.js");

    expect(receiver.pending).toBe(1);
  });

  it("fails to collect a file whose writer is still open", () => {
    const [files, receiver] = FilesChannel.create();
    const writer = files.openForWrite("/open.txt");
    writer.writeText("unfinished");

    expect(() => FilesChannel.recvUtf8Files(receiver)).toThrow(FilesChannelError);
  });

  it("leaves later files queued when one cannot be reclaimed", () => {
    const [files, receiver] = FilesChannel.create();
    const a = files.openForWrite("/a");
    const b = files.openForWrite("/b");
    b.writeText("text b");
    b.close();

    expect(() => FilesChannel.recvUtf8Files(receiver)).toThrow("Cannot reclaim /a");
    a.close();

    expect(FilesChannel.recvUtf8Files(receiver)).toEqual([{ path: "/b", text: "text b" }]);
  });

  it("drops the observer's ownership when a drained message is discarded", () => {
    const [files, receiver] = FilesChannel.create();
    files.openForWrite("/dropped.txt");

    const messages = receiver.tryDrain();
    const observed = messages[0]?.[1];

    expect(messages.map(([path]) => path)).toEqual(["/dropped.txt"]);
    expect(observed?.ownerCount).toBe(2);
    observed?.release();
    expect(observed?.ownerCount).toBe(0);
  });

  it("fails on files that are not valid UTF-8", () => {
    const [files, receiver] = FilesChannel.create();
    const writer = files.openForWrite("/binary.bin");
    writer.writeBytes(new Uint8Array([0xff, 0xfe]));
    writer.close();

    expect(() => FilesChannel.recvUtf8Files(receiver)).toThrow("/binary.bin is not valid UTF-8");
  });

  it("fails when the receiver is closed", () => {
    const [, receiver] = FilesChannel.create();
    receiver.close();

    expect(() => FilesChannel.recvUtf8Files(receiver)).toThrow(FilesChannelError);
  });

  it("keeps writing when nobody is listening", () => {
    const [files, receiver] = FilesChannel.create();
    receiver.close();

    const writer = files.openForWrite("/unobserved.txt");

    expect(() => writer.writeText("still works")).not.toThrow();
  });

  it("shares one queue between cloned channels", () => {
    const [files, receiver] = FilesChannel.create();
    const other = files.clone();

    writeOutputFiles(files, [{ path: "/one", text: "1" }]);
    writeOutputFiles(other, [{ path: "/two", text: "2" }]);

    expect(FilesChannel.recvUtf8Files(receiver)).toEqual([
      { path: "/one", text: "1" },
      { path: "/two", text: "2" },
    ]);
  });

  it("attributes write failures to the opened path", () => {
    const [files] = FilesChannel.create();
    const writer = files.openForWrite("/closed.txt");
    writer.close();

    let caught: unknown;
    try {
      writer.writeText("too late");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(FileIoError);
    expect(caught).toMatchObject({ action: "write", kind: "file", path: "/closed.txt" });
  });

  it("does not provide read capabilities", () => {
    const [files] = FilesChannel.create();

    expect(() => files.readToString("/a")).toThrow(NotImplementedError);
    expect(() => files.openForRead("/a")).toThrow(NotImplementedError);
    expect(() => files.enumerateSourceFiles("/")).toThrow(NotImplementedError);
    expect(() => files.isFile("/a")).toThrow(NotImplementedError);
    expect(() => files.isDirectory("/a")).toThrow(NotImplementedError);
  });
});

describe("writeOutputFiles", () => {
  it("writes each output file and closes its handle", () => {
    const [files, receiver] = FilesChannel.create();

    writeOutputFiles(files, [
      { path: "/build/main.js", text: "main();\n" },
      { path: "/build/lib.js", text: "export {};\n" },
    ]);

    expect(FilesChannel.recvUtf8Files(receiver)).toEqual([
      { path: "/build/main.js", text: "main();\n" },
      { path: "/build/lib.js", text: "export {};\n" },
    ]);
  });
});

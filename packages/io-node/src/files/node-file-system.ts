/**
 * Node.js filesystem backend.
 *
 * All operations are synchronous, built on the `*Sync` functions of
 * `node:fs`. Failures are converted into {@link FileIoError}s.
 */

import { mkdirSync, openSync, readdirSync, readFileSync, statSync } from "node:fs";
import { dirname, extname, join } from "node:path";
import {
  type FileSystemIO,
  type IoLogger,
  readError,
  WrappedReader,
  WrappedWriter,
  writeError,
} from "@quarry/io";
import { NodeFileReader, NodeFileWriter } from "./node-file-streams.js";

export const DEFAULT_IGNORED_DIRECTORIES: readonly string[] = ["node_modules", ".git"];

export interface NodeFileSystemOptions {
  /** File extensions, with the leading dot, that mark source files */
  sourceExtensions: string[];
  /** Directory names never descended into while enumerating sources */
  ignoredDirectories?: readonly string[];
  logger?: IoLogger;
}

export class NodeFileSystem implements FileSystemIO {
  private readonly sourceExtensions: Set<string>;
  private readonly ignoredDirectories: Set<string>;
  private readonly logger?: IoLogger;

  constructor(options: NodeFileSystemOptions) {
    this.sourceExtensions = new Set(options.sourceExtensions);
    this.ignoredDirectories = new Set(options.ignoredDirectories ?? DEFAULT_IGNORED_DIRECTORIES);
    this.logger = options.logger;
  }

  /**
   * Walk `dir` depth-first, entries sorted by name, yielding the files whose
   * extension is one of the configured source extensions. A missing or
   * unreadable directory yields nothing.
   */
  *enumerateSourceFiles(dir: string): Generator<string> {
    const entries = this.listDirectory(dir);
    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!this.ignoredDirectories.has(entry.name)) {
          yield* this.enumerateSourceFiles(path);
        }
      } else if (entry.isFile() && this.sourceExtensions.has(extname(entry.name))) {
        yield path;
      }
    }
  }

  readToString(path: string): string {
    try {
      const bytes = readFileSync(path);
      return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    } catch (error) {
      throw readError(path, error);
    }
  }

  openForRead(path: string): WrappedReader {
    this.logger?.debug?.("opening file for reading", { path });
    try {
      return new WrappedReader(path, new NodeFileReader(openSync(path, "r")));
    } catch (error) {
      throw readError(path, error);
    }
  }

  /** Creates missing parent directories and truncates an existing file */
  openForWrite(path: string): WrappedWriter {
    this.logger?.debug?.("opening file for writing", { path });
    try {
      mkdirSync(dirname(path), { recursive: true });
      return new WrappedWriter(path, new NodeFileWriter(openSync(path, "w")));
    } catch (error) {
      throw writeError(path, error);
    }
  }

  isFile(path: string): boolean {
    return this.stat(path)?.isFile() ?? false;
  }

  isDirectory(path: string): boolean {
    return this.stat(path)?.isDirectory() ?? false;
  }

  private stat(path: string) {
    try {
      return statSync(path, { throwIfNoEntry: false });
    } catch (error) {
      this.logger?.debug?.("stat failed", { path, error });
      return undefined;
    }
  }

  private listDirectory(dir: string) {
    try {
      return readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
        a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
      );
    } catch (error) {
      this.logger?.debug?.("cannot list directory", { path: dir, error });
      return [];
    }
  }
}

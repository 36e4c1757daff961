/**
 * Error Model for the I/O layer.
 *
 * Every boundary operation converts the failures of its backend (disk,
 * encoding, archive, network) into one of these classes before they reach
 * calling code.
 */

/** Direction of the failed file operation. */
export type FileIoAction = "read" | "write";

/** Kind of resource the failed file operation targeted. */
export type FileKind = "file" | "directory";

/**
 * Base error for all I/O operations.
 */
export class IoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IoError";
  }
}

/**
 * A file or directory could not be read from or written to.
 */
export class FileIoError extends IoError {
  readonly action: FileIoAction;
  readonly kind: FileKind;
  readonly path: string;
  /** Description of the underlying failure, if one was reported */
  declare readonly cause?: string;

  constructor(options: { action: FileIoAction; kind: FileKind; path: string; cause?: string }) {
    const { action, kind, path, cause } = options;
    super(`Failed to ${action} ${kind} ${path}${cause !== undefined ? `: ${cause}` : ""}`);
    this.name = "FileIoError";
    this.action = action;
    this.kind = kind;
    this.path = path;
    this.cause = cause;
  }
}

/**
 * The HTTP transport failed before a response was received.
 */
export class HttpError extends IoError {
  readonly method: string;
  readonly uri: string;
  declare readonly cause?: string;

  constructor(options: { method: string; uri: string; cause?: string }) {
    const { method, uri, cause } = options;
    super(`HTTP ${method} ${uri} failed${cause !== undefined ? `: ${cause}` : ""}`);
    this.name = "HttpError";
    this.method = method;
    this.uri = uri;
    this.cause = cause;
  }
}

/**
 * Human-readable description of any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Convert a native read failure into a {@link FileIoError}.
 */
export function readError(path: string, error: unknown, kind: FileKind = "file"): FileIoError {
  return new FileIoError({ action: "read", kind, path, cause: describeError(error) });
}

/**
 * Convert a native write failure into a {@link FileIoError}.
 */
export function writeError(path: string, error: unknown, kind: FileKind = "file"): FileIoError {
  return new FileIoError({ action: "write", kind, path, cause: describeError(error) });
}

/**
 * In-memory test double for the I/O layer, and fixtures for testing code
 * built on it.
 *
 * @packageDocumentation
 */

export * from "./bytes-reader.js";
export * from "./channel.js";
export * from "./errors.js";
export * from "./files-channel.js";
export * from "./in-memory-file.js";
export * from "./tar-builder.js";

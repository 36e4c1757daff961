/**
 * Pluggable I/O layer.
 *
 * Capability interfaces for reading and writing files, sending HTTP requests
 * and unpacking archives, with one structured error type for every failure.
 * Calling code depends on these interfaces only; real and in-memory backends
 * implement them independently.
 *
 * @packageDocumentation
 */

export * from "./archive/index.js";
export * from "./errors/index.js";
export * from "./files/index.js";
export * from "./http/index.js";
export type { IoLogger } from "./logger.js";
export * from "./streams/index.js";

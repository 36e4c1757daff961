export * from "./gzip-reader.js";
export * from "./open-tar-gz.js";
export * from "./tar-archive.js";
export * from "./tar-unpacker.js";

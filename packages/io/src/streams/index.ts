export * from "./byte-streams.js";
export * from "./utf8-writer.js";
export * from "./wrapped-reader.js";
export * from "./wrapped-writer.js";

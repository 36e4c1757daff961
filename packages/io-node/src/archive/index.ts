export * from "./node-tar-unpacker.js";

export * from "./file-system.js";
export * from "./output-file.js";

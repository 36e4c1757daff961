export * from "./node-file-streams.js";
export * from "./node-file-system.js";

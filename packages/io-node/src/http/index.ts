export * from "./fetch-http-client.js";

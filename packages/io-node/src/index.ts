/**
 * Node.js backends for @quarry/io
 *
 * - {@link NodeFileSystem}: filesystem capabilities over `node:fs`
 * - {@link NodeTarUnpacker}: archive extraction onto disk
 * - {@link FetchHttpClient}: HTTP capability over `fetch`
 *
 * @packageDocumentation
 */

export * from "./archive/index.js";
export * from "./files/index.js";
export * from "./http/index.js";

/**
 * Store Exports
 */

export type { IStore, StoreOptions } from "./types.js";
export { FileStore, createFileStore } from "./file.js";

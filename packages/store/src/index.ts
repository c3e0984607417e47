export { FileStore } from "./file-store";
export { loadRegistryConfig } from "./config";
export { openRegistry } from "./open-registry";

export type { FileStoreOptions } from "./file-store";
export type { StoreRegistryConfig } from "./config";

export { AzureStorageManager, createStorageManager } from "./manager.js";
export type { FileShare, StorageAccount, StorageAccountOptions, StorageAccountResult } from "./types.js";

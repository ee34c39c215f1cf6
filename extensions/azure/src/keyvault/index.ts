export { AzureKeyVault, createKeyVault } from "./manager.js";
export { READINESS_SECRET } from "./types.js";
export type { KeyVault, KeyVaultCreateOptions, KeyVaultDeleteOptions } from "./types.js";

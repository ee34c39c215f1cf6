export { AzureResourceManager, createResourceManager, getResourceGroupLocation } from "./manager.js";
export type { ResourceGroup } from "./types.js";

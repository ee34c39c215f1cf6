export { AzureClientRegistry, createClientRegistry } from "./manager.js";
export type { AzureClientKind, AzureClientMap, ClientFactories, ClientRegistryStats } from "./manager.js";

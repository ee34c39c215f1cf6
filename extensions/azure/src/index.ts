/**
 * @cirrus/azure — Barrel Exports
 */

// Core
export type { AzureScope, ResourceTags } from "./types.js";
export { resourceGroupFromId, virtualNetworkId } from "./types.js";
export {
  configSchema,
  deploymentProfileSchema,
  getDefaultConfig,
  loadDeploymentProfile,
  parseDeploymentProfile,
  resolveConfig,
} from "./config.js";
export type { CirrusConfig, DeploymentProfile, ImageReference, MarketplacePlan, ResolvedCirrusConfig } from "./config.js";
export { AzureManager, createAzureManager, generatePassword, quietAzureSdkLogs } from "./manager.js";
export type { AzureManagerOptions, HostOptions } from "./manager.js";

// Infrastructure support
export * from "./credentials/index.js";
export * from "./client-pool/index.js";
export * from "./reconcile/index.js";
export * from "./cli/index.js";

// Resources
export * from "./resources/index.js";
export * from "./network/index.js";
export * from "./vms/index.js";
export * from "./keyvault/index.js";
export * from "./dns/index.js";
export * from "./storage/index.js";

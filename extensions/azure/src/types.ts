/**
 * Azure — Shared Types
 */

import type { CirrusLogger } from "@cirrus/core";
import type { AzureClientRegistry } from "./client-pool/index.js";
import type { ResolvedCirrusConfig } from "./config.js";
import type { AzureCredentialsManager } from "./credentials/index.js";
import type { Reconciler } from "./reconcile/index.js";

export type ResourceTags = Record<string, string>;

/**
 * Everything a resource manager needs to act on one resource group.
 */
export type AzureScope = {
  clients: AzureClientRegistry;
  reconciler: Reconciler;
  credentials: AzureCredentialsManager;
  subscriptionId: string;
  resourceGroup: string;
  config: ResolvedCirrusConfig;
  logger: CirrusLogger;
  /** Location of the scope's resource group, queried on every call. */
  location: () => Promise<string>;
};

/** Resource group segment of an ARM id, or "" when absent. */
export function resourceGroupFromId(id: string | undefined): string {
  return (id ?? "").match(/resourceGroups\/([^/]+)/i)?.[1] ?? "";
}

export function virtualNetworkId(subscriptionId: string, resourceGroup: string, vnet: string): string {
  return `/subscriptions/${subscriptionId}/resourceGroups/${resourceGroup}/providers/Microsoft.Network/virtualNetworks/${vnet}`;
}

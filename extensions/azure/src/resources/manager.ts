/**
 * Azure Resource Manager
 *
 * Resource groups via @azure/arm-resources.
 */

import type { ResourceGroup as ArmResourceGroup } from "@azure/arm-resources";
import { ProvisioningError, unwrapWait, waitFor } from "@cirrus/core";
import type { AzureClientRegistry } from "../client-pool/index.js";
import type { RemoveOutcome, ResourceRef } from "../reconcile/index.js";
import type { AzureScope, ResourceTags } from "../types.js";
import type { ResourceGroup } from "./types.js";

const FAILED_STATES = new Set(["Failed", "Canceled"]);

function toResourceGroup(rg: ArmResourceGroup): ResourceGroup {
  return {
    id: rg.id ?? "",
    name: rg.name ?? "",
    location: rg.location,
    tags: rg.tags,
    provisioningState: rg.properties?.provisioningState,
  };
}

function resourceGroupRef(name: string): ResourceRef {
  return { provider: "Microsoft.Resources", type: "resourceGroups", resourceGroup: name, name };
}

export async function getResourceGroupLocation(clients: AzureClientRegistry, name: string): Promise<string> {
  const rg = await clients.get("resources").resourceGroups.get(name);
  return rg.location;
}

// =============================================================================
// AzureResourceManager
// =============================================================================

export class AzureResourceManager {
  private readonly scope: AzureScope;

  constructor(scope: AzureScope) {
    this.scope = scope;
  }

  private get client() {
    return this.scope.clients.get("resources");
  }

  async getResourceGroup(name: string = this.scope.resourceGroup): Promise<ResourceGroup> {
    return toResourceGroup(await this.client.resourceGroups.get(name));
  }

  async getLocation(name: string = this.scope.resourceGroup): Promise<string> {
    return getResourceGroupLocation(this.scope.clients, name);
  }

  /**
   * Create or update the scope's resource group and poll until its
   * provisioning state is Succeeded.
   */
  async ensureResourceGroup(location: string, tags?: ResourceTags): Promise<ResourceGroup> {
    const name = this.scope.resourceGroup;
    const { config, logger } = this.scope;
    logger.info({ resourceGroup: name, location }, `Ensuring resource group ${name}`);
    await this.client.resourceGroups.createOrUpdate(name, { location, tags });

    const outcome = await waitFor(
      async () => {
        const rg = await this.getResourceGroup(name);
        const state = rg.provisioningState ?? "";
        if (FAILED_STATES.has(state)) throw new ProvisioningError(`Resource group ${name}`, state);
        return state === "Succeeded" ? rg : undefined;
      },
      {
        intervalMs: config.resourceGroupPollIntervalMs,
        timeoutMs: config.resourceGroupTimeoutMs,
        onPending: (attempt) => logger.debug({ resourceGroup: name, attempt }, "Resource group not ready yet"),
      },
    );
    return unwrapWait(outcome, `resource group ${name}`);
  }

  async deleteResourceGroup(
    name: string = this.scope.resourceGroup,
    options: { tolerateMissing?: boolean } = {},
  ): Promise<RemoveOutcome> {
    return this.scope.reconciler.remove(
      resourceGroupRef(name),
      () => this.client.resourceGroups.beginDelete(name),
      options,
    );
  }

  async listResourceGroups(): Promise<ResourceGroup[]> {
    const groups: ResourceGroup[] = [];
    for await (const rg of this.client.resourceGroups.list()) groups.push(toResourceGroup(rg));
    return groups;
  }
}

export function createResourceManager(scope: AzureScope): AzureResourceManager {
  return new AzureResourceManager(scope);
}

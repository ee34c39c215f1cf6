/**
 * Azure Key Vault
 *
 * One named vault: its lifecycle via @azure/arm-keyvault and its secrets via
 * @azure/keyvault-secrets.
 */

import type { NetworkRuleSet, Vault, VaultProperties } from "@azure/arm-keyvault";
import { SecretClient } from "@azure/keyvault-secrets";
import { unwrapWait, waitUntil, type CirrusLogger } from "@cirrus/core";
import {
  completedOperation,
  type EnsureOptions,
  type NameAvailability,
  type Reconciled,
  type RemoveOutcome,
  type ResourceRef,
  isNotFoundError,
} from "../reconcile/index.js";
import { resourceGroupFromId, type AzureScope } from "../types.js";
import { READINESS_SECRET, type KeyVault, type KeyVaultCreateOptions, type KeyVaultDeleteOptions } from "./types.js";

function toKeyVault(vault: Vault): KeyVault {
  return {
    id: vault.id ?? "",
    name: vault.name ?? "",
    resourceGroup: resourceGroupFromId(vault.id),
    location: vault.location ?? "",
    vaultUri: vault.properties.vaultUri ?? "",
    tenantId: vault.properties.tenantId,
    enableSoftDelete: vault.properties.enableSoftDelete,
    accessPolicyObjectIds: (vault.properties.accessPolicies ?? []).map((policy) => policy.objectId),
    networkDefaultAction: vault.properties.networkAcls?.defaultAction,
    provisioningState: vault.properties.provisioningState,
  };
}

function subnetRules(subnetIds: string[]): NetworkRuleSet {
  return { defaultAction: "Deny", ipRules: [], virtualNetworkRules: subnetIds.map((id) => ({ id })) };
}

// =============================================================================
// AzureKeyVault
// =============================================================================

export class AzureKeyVault {
  readonly name: string;
  readonly uri: string;
  private readonly scope: AzureScope;
  private readonly logger: CirrusLogger;
  private secretClient: SecretClient | null = null;

  constructor(name: string, scope: AzureScope) {
    this.name = name;
    this.uri = `https://${name}.vault.azure.net`;
    this.scope = scope;
    this.logger = scope.logger.child({ keyVault: name });
  }

  private get client() {
    return this.scope.clients.get("keyvault");
  }

  private get ref(): ResourceRef {
    return { provider: "Microsoft.KeyVault", type: "vaults", resourceGroup: this.scope.resourceGroup, name: this.name };
  }

  private async secrets(): Promise<SecretClient> {
    if (!this.secretClient) {
      const { credential } = await this.scope.credentials.getCredential();
      this.secretClient = new SecretClient(this.uri, credential);
    }
    return this.secretClient;
  }

  async getVault(): Promise<KeyVault> {
    return toKeyVault(await this.client.vaults.get(this.scope.resourceGroup, this.name));
  }

  async exists(): Promise<boolean> {
    try {
      await this.getVault();
      return true;
    } catch (error) {
      if (isNotFoundError(error)) return false;
      throw error;
    }
  }

  /**
   * Vault names are global and stay reserved while a deleted vault is
   * retained, so both the deleted list and ARM's check are consulted.
   */
  async checkNameAvailable(): Promise<boolean> {
    return (await this.nameAvailability()).available;
  }

  private async nameAvailability(): Promise<NameAvailability> {
    for await (const deleted of this.client.vaults.listDeleted()) {
      if (deleted.name === this.name) return { available: false, reason: "taken by a soft-deleted key vault" };
    }
    const result = await this.client.vaults.checkNameAvailability({ name: this.name, type: "Microsoft.KeyVault/vaults" });
    if (result.nameAvailable) return { available: true };
    return { available: false, reason: result.message ?? result.reason ?? "already in use" };
  }

  /**
   * Create the vault with a secrets policy for the current principal, then
   * wait until a secret can be written, which fails while the vault's network
   * rules are still propagating.
   */
  async create(create: KeyVaultCreateOptions = {}, options?: EnsureOptions): Promise<Reconciled<KeyVault>> {
    const rg = this.scope.resourceGroup;
    const result = await this.scope.reconciler.ensure(
      {
        ref: this.ref,
        lookup: () => this.getVault(),
        desired: async () => ({
          location: await this.scope.location(),
          tenantId: this.scope.credentials.getTenantId(),
          objectId: await this.scope.credentials.getObjectId(),
        }),
        required: ["location", "tenantId", "objectId"],
        precheck: () => this.nameAvailability(),
        create: (desired) => {
          const properties: VaultProperties = {
            sku: { family: "A", name: "standard" },
            tenantId: desired.tenantId,
            enableSoftDelete: create.softDelete ?? true,
            accessPolicies: [
              {
                tenantId: desired.tenantId,
                objectId: desired.objectId,
                permissions: { keys: ["all"], secrets: ["all", "purge"] },
              },
            ],
          };
          if (create.subnetIds?.length) properties.networkAcls = subnetRules(create.subnetIds);
          return this.client.vaults.beginCreateOrUpdate(rg, this.name, { location: desired.location, properties });
        },
      },
      options,
    );
    if (result.state === "created") await this.waitUntilReachable();
    return result;
  }

  private async waitUntilReachable(): Promise<void> {
    const { keyVaultPollIntervalMs, keyVaultReadyTimeoutMs } = this.scope.config;
    const outcome = await waitUntil(
      async () => {
        try {
          await this.setSecret(READINESS_SECRET, "x");
          return true;
        } catch (error) {
          this.logger.warn({ err: error }, "Waiting for key vault to come up. Please check connection to the VNET.");
          return false;
        }
      },
      { intervalMs: keyVaultPollIntervalMs, timeoutMs: keyVaultReadyTimeoutMs },
    );
    unwrapWait(outcome, `key vault ${this.name} to accept secrets`);
    await this.deleteSecret(READINESS_SECRET);
  }

  /**
   * Add a secrets policy for the current principal when the vault lacks one
   * for this tenant, and restrict network access to `subnetIds` when given.
   */
  async grantAccess(subnetIds: string[] = []): Promise<boolean> {
    const rg = this.scope.resourceGroup;
    this.logger.info(`Granting access to key vault ${this.name}`);
    const tenantId = this.scope.credentials.getTenantId();
    const vault = await this.client.vaults.get(rg, this.name);
    const properties = vault.properties;
    const policies = properties.accessPolicies ?? [];

    const tenantUpdate = properties.tenantId !== tenantId || !policies.some((policy) => policy.tenantId === tenantId);
    if (tenantUpdate) {
      properties.tenantId = tenantId;
      properties.accessPolicies = [
        ...policies,
        { tenantId, objectId: await this.scope.credentials.getObjectId(), permissions: { secrets: ["all"] } },
      ];
    }
    if (subnetIds.length > 0) properties.networkAcls = subnetRules(subnetIds);
    if (!tenantUpdate && subnetIds.length === 0) return false;

    const poller = await this.client.vaults.beginCreateOrUpdate(rg, this.name, {
      location: vault.location ?? (await this.scope.location()),
      properties,
    });
    await this.scope.reconciler.settle(poller, this.ref);
    return true;
  }

  async getSecret(name: string): Promise<string> {
    const client = await this.secrets();
    try {
      const secret = await client.getSecret(name);
      this.logger.debug(`Retrieved secret: ${secret.properties.id ?? name}`);
      return secret.value ?? "";
    } catch (error) {
      this.logger.error({ err: error }, `Could not get secret: ${name}`);
      throw error;
    }
  }

  async setSecret(name: string, value: string): Promise<string> {
    const client = await this.secrets();
    try {
      const secret = await client.setSecret(name, value);
      this.logger.debug(`Set secret: ${secret.properties.id ?? name}`);
      return secret.value ?? value;
    } catch (error) {
      this.logger.error({ err: error }, `Could not set secret: ${name}`);
      throw error;
    }
  }

  /** Delete a secret and, by default, purge it so the name can be reused. */
  async deleteSecret(name: string, purge = true): Promise<void> {
    const client = await this.secrets();
    const poller = await client.beginDeleteSecret(name);
    await poller.pollUntilDone();
    if (purge) await client.purgeDeletedSecret(name);
  }

  /**
   * Delete the vault and, by default, purge it from the deleted list. A
   * missing vault is tolerated unless `tolerateMissing` is false.
   */
  async delete(options: KeyVaultDeleteOptions = {}): Promise<RemoveOutcome> {
    const rg = this.scope.resourceGroup;
    let location: string | undefined;
    const outcome = await this.scope.reconciler.remove(
      this.ref,
      async () => {
        location = (await this.client.vaults.get(rg, this.name)).location;
        await this.client.vaults.delete(rg, this.name);
        return completedOperation;
      },
      { tolerateMissing: options.tolerateMissing ?? true },
    );
    if (outcome === "missing" || options.purge === false || !location) return outcome;

    this.logger.info(`Purging key vault ${this.name}`);
    const poller = await this.client.vaults.beginPurgeDeleted(this.name, location);
    return (await this.scope.reconciler.settle(poller, this.ref)) ? "deleted" : "pending";
  }
}

export function createKeyVault(name: string, scope: AzureScope): AzureKeyVault {
  return new AzureKeyVault(name, scope);
}

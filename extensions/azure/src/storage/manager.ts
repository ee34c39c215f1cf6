/**
 * Azure Storage Manager
 *
 * Storage accounts and file shares via @azure/arm-storage.
 */

import type { FileShare as ArmFileShare, NetworkRuleSet, StorageAccount as ArmStorageAccount } from "@azure/arm-storage";
import { ConfigurationError } from "@cirrus/core";
import { resourceOf, type NameAvailability, type ResourceRef } from "../reconcile/index.js";
import type { AzureScope } from "../types.js";
import type { FileShare, StorageAccount, StorageAccountOptions, StorageAccountResult } from "./types.js";

function toAccount(account: ArmStorageAccount): StorageAccount {
  const rules = account.networkRuleSet;
  return {
    id: account.id ?? "",
    name: account.name ?? "",
    location: account.location,
    kind: account.kind,
    sku: account.sku?.name,
    accessTier: account.accessTier,
    httpsOnly: account.enableHttpsTrafficOnly,
    allowBlobPublicAccess: account.allowBlobPublicAccess,
    networkDefaultAction: rules?.defaultAction,
    allowedSubnets: (rules?.virtualNetworkRules ?? []).map((rule) => rule.virtualNetworkResourceId),
    provisioningState: account.provisioningState,
  };
}

function networkRules(subnets: string[]): NetworkRuleSet {
  if (subnets.length === 0) return { defaultAction: "Allow", ipRules: [], virtualNetworkRules: [] };
  return {
    defaultAction: "Deny",
    ipRules: [],
    virtualNetworkRules: [...new Set(subnets)].map((id) => ({ virtualNetworkResourceId: id, action: "Allow" })),
  };
}

export class AzureStorageManager {
  private readonly scope: AzureScope;

  constructor(scope: AzureScope) {
    this.scope = scope;
  }

  private get client() {
    return this.scope.clients.get("storage");
  }

  private ref(name: string): ResourceRef {
    return { provider: "Microsoft.Storage", type: "storageAccounts", resourceGroup: this.scope.resourceGroup, name };
  }

  async getStorageAccount(name: string): Promise<StorageAccount> {
    return toAccount(await this.client.storageAccounts.getProperties(this.scope.resourceGroup, name));
  }

  private async nameAvailability(name: string): Promise<NameAvailability> {
    const result = await this.client.storageAccounts.checkNameAvailability({
      name,
      type: "Microsoft.Storage/storageAccounts",
    });
    return { available: result.nameAvailable ?? false, reason: result.message ?? result.reason };
  }

  async checkNameAvailable(name: string): Promise<boolean> {
    return (await this.nameAvailability(name)).available;
  }

  /**
   * Ensure an HTTPS-only account without public blob access. Given subnets,
   * every other network is denied. Always waits, since the key is read
   * afterwards.
   */
  async createStorageAccount(name: string, options: StorageAccountOptions = {}): Promise<StorageAccountResult> {
    const rg = this.scope.resourceGroup;
    this.scope.logger.info(`Creating storage account ${name}`);
    const result = await this.scope.reconciler.ensure(
      {
        ref: this.ref(name),
        lookup: () => this.getStorageAccount(name),
        desired: async () => ({
          location: await this.scope.location(),
          sku: options.sku ?? "Premium_LRS",
          kind: options.kind ?? "FileStorage",
          accessTier: options.accessTier ?? "Hot",
        }),
        required: ["location"],
        precheck: () => this.nameAvailability(name),
        create: (desired) =>
          this.client.storageAccounts.beginCreate(rg, name, {
            sku: { name: desired.sku },
            kind: desired.kind,
            location: desired.location,
            accessTier: desired.accessTier,
            allowBlobPublicAccess: false,
            enableHttpsTrafficOnly: true,
            networkRuleSet: networkRules(options.subnets ?? []),
          }),
      },
      { forceWait: true },
    );
    const account = resourceOf(result);
    const keys = await this.client.storageAccounts.listKeys(rg, name);
    const accessKey = keys.keys?.[0]?.value;
    if (!accessKey) throw new ConfigurationError(`Storage account ${name} returned no access keys`);
    return { account, state: result.state === "existing" ? "existing" : "created", accessKey };
  }

  async createFileShare(account: string, share: string, quotaGb: number): Promise<FileShare> {
    this.scope.logger.info({ account, share }, `Creating file share ${share}`);
    const created: ArmFileShare = await this.client.fileShares.create(this.scope.resourceGroup, account, share, {
      shareQuota: quotaGb,
    });
    return { id: created.id ?? "", name: created.name ?? share, quotaGb: created.shareQuota };
  }
}

export function createStorageManager(scope: AzureScope): AzureStorageManager {
  return new AzureStorageManager(scope);
}

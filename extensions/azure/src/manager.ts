/**
 * AzureManager
 *
 * Entry point for one resource group: resolves credentials and
 * configuration, builds the shared client registry and reconciler, and
 * hands out the resource managers built on them.
 */

import { randomInt } from "node:crypto";
import { setLogLevel } from "@azure/logger";
import { ConfigurationError, getLogger, type CirrusLogger } from "@cirrus/core";
import { AzureCLIWrapper } from "./cli/index.js";
import { AzureClientRegistry, type ClientFactories } from "./client-pool/index.js";
import { resolveConfig, type CirrusConfig, type DeploymentProfile } from "./config.js";
import { AzureCredentialsManager } from "./credentials/index.js";
import { AzureDnsManager } from "./dns/index.js";
import { AzureKeyVault } from "./keyvault/index.js";
import { AzureNetworkManager } from "./network/index.js";
import { Reconciler, type RemoveOptions, type RemoveOutcome, type ResourceRef } from "./reconcile/index.js";
import { AzureResourceManager, getResourceGroupLocation } from "./resources/index.js";
import { AzureStorageManager } from "./storage/index.js";
import type { AzureScope, ResourceTags } from "./types.js";
import { AzureVMManager, VirtualMachineHost } from "./vms/index.js";

export type AzureManagerOptions = {
  resourceGroup: string;
  /** Loaded from `authPath` (or AZURE_AUTH_LOCATION) when omitted. */
  credentials?: AzureCredentialsManager;
  authPath?: string;
  /** When set, the resource group is created there unless it exists. */
  location?: string;
  tags?: ResourceTags;
  config?: CirrusConfig;
  logger?: CirrusLogger;
  clientFactories?: Partial<ClientFactories>;
  /** Lower the Azure SDK's own logging to warnings. Defaults to true. */
  quietSdkLogs?: boolean;
};

export type HostOptions = {
  profile?: DeploymentProfile;
  spotInstance?: boolean;
  sshDir?: string;
};

const LETTERS = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";
const DIGITS = "0123456789";
const PUNCTUATION = "+$_.;:,<>-[]{}";

export function quietAzureSdkLogs(): void {
  setLogLevel("warning");
}

/** Random password drawn from letters, digits and, optionally, punctuation. */
export function generatePassword(length = 20, punctuation = true): string {
  if (!Number.isInteger(length) || length < 1) {
    throw new ConfigurationError(`Password length must be a positive integer, got ${length}`);
  }
  const chars = LETTERS + DIGITS + (punctuation ? PUNCTUATION : "");
  let password = "";
  for (let i = 0; i < length; i++) password += chars.charAt(randomInt(chars.length));
  return password;
}

// =============================================================================
// AzureManager
// =============================================================================

export class AzureManager {
  readonly scope: AzureScope;
  readonly resources: AzureResourceManager;
  readonly network: AzureNetworkManager;
  readonly vms: AzureVMManager;
  readonly dns: AzureDnsManager;
  readonly storage: AzureStorageManager;
  readonly cli: AzureCLIWrapper;
  private readonly vaults = new Map<string, AzureKeyVault>();

  constructor(scope: AzureScope) {
    this.scope = scope;
    this.resources = new AzureResourceManager(scope);
    this.network = new AzureNetworkManager(scope);
    this.vms = new AzureVMManager(scope);
    this.dns = new AzureDnsManager(scope);
    this.storage = new AzureStorageManager(scope);
    this.cli = new AzureCLIWrapper({ logger: scope.logger.child({ component: "cli" }) });
  }

  static async create(options: AzureManagerOptions): Promise<AzureManager> {
    if (options.quietSdkLogs ?? true) quietAzureSdkLogs();
    const credentials = options.credentials ?? (await AzureCredentialsManager.fromFile(options.authPath));
    const { credential, subscriptionId } = await credentials.getCredential();
    const config = resolveConfig(options.config);
    const logger = (options.logger ?? getLogger("azure")).child({ resourceGroup: options.resourceGroup });
    const clients = new AzureClientRegistry(credential, subscriptionId, options.clientFactories);

    const manager = new AzureManager({
      clients,
      reconciler: new Reconciler({
        asyncMode: config.asyncMode,
        operationTimeoutMs: config.operationTimeoutMs,
        logger: logger.child({ component: "reconcile" }),
      }),
      credentials,
      subscriptionId,
      resourceGroup: options.resourceGroup,
      config,
      logger,
      location: () => getResourceGroupLocation(clients, options.resourceGroup),
    });
    if (options.location) await manager.resources.ensureResourceGroup(options.location, options.tags);
    logger.debug("Azure manager ready");
    return manager;
  }

  get resourceGroup(): string {
    return this.scope.resourceGroup;
  }

  /** In async mode create and delete calls return once Azure accepted them. */
  setAsync(on = true): void {
    this.scope.reconciler.setAsync(on);
  }

  isAsync(): boolean {
    return this.scope.reconciler.isAsync();
  }

  keyVault(name: string): AzureKeyVault {
    let vault = this.vaults.get(name);
    if (!vault) {
      vault = new AzureKeyVault(name, this.scope);
      this.vaults.set(name, vault);
    }
    return vault;
  }

  /** A development VM host; admin credentials come from the profile's key vault. */
  async host(name: string, options: HostOptions = {}): Promise<VirtualMachineHost> {
    const { profile } = options;
    return VirtualMachineHost.open(name, {
      vms: this.vms,
      network: this.network,
      resourceGroup: this.scope.resourceGroup,
      config: this.scope.config,
      logger: this.scope.logger,
      profile,
      secrets: profile ? this.keyVault(profile.keyVault) : undefined,
      spotInstance: options.spotInstance,
      sshDir: options.sshDir,
    });
  }

  async delete(ref: ResourceRef, options?: RemoveOptions): Promise<RemoveOutcome> {
    return this.vms.delete(ref, options);
  }
}

export function createAzureManager(options: AzureManagerOptions): Promise<AzureManager> {
  return AzureManager.create(options);
}

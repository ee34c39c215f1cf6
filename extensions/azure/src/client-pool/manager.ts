/**
 * Azure Client Registry: one lazily built SDK client per service kind.
 */

import type { TokenCredential } from "@azure/identity";
import { ComputeManagementClient } from "@azure/arm-compute";
import { DnsManagementClient } from "@azure/arm-dns";
import { KeyVaultManagementClient } from "@azure/arm-keyvault";
import { NetworkManagementClient } from "@azure/arm-network";
import { PrivateDnsManagementClient } from "@azure/arm-privatedns";
import { ResourceManagementClient } from "@azure/arm-resources";
import { StorageManagementClient } from "@azure/arm-storage";

// =============================================================================
// Types
// =============================================================================

export type AzureClientMap = {
  resources: ResourceManagementClient;
  compute: ComputeManagementClient;
  network: NetworkManagementClient;
  keyvault: KeyVaultManagementClient;
  dns: DnsManagementClient;
  privateDns: PrivateDnsManagementClient;
  storage: StorageManagementClient;
};

export type AzureClientKind = keyof AzureClientMap;

export type ClientRegistryStats = {
  created: AzureClientKind[];
  hits: number;
  misses: number;
};

export type ClientFactories = { [K in AzureClientKind]: (credential: TokenCredential, subscriptionId: string) => AzureClientMap[K] };

const DEFAULT_FACTORIES: ClientFactories = {
  resources: (credential, subscriptionId) => new ResourceManagementClient(credential, subscriptionId),
  compute: (credential, subscriptionId) => new ComputeManagementClient(credential, subscriptionId),
  network: (credential, subscriptionId) => new NetworkManagementClient(credential, subscriptionId),
  keyvault: (credential, subscriptionId) => new KeyVaultManagementClient(credential, subscriptionId),
  dns: (credential, subscriptionId) => new DnsManagementClient(credential, subscriptionId),
  privateDns: (credential, subscriptionId) => new PrivateDnsManagementClient(credential, subscriptionId),
  storage: (credential, subscriptionId) => new StorageManagementClient(credential, subscriptionId),
};

// =============================================================================
// Lazy slot
// =============================================================================

type LazyState<T> = { ready: false } | { ready: true; value: T };

class Lazy<T> {
  private state: LazyState<T> = { ready: false };

  constructor(
    private readonly build: () => T,
    private readonly onHit: () => void,
    private readonly onMiss: () => void,
  ) {}

  get isReady(): boolean {
    return this.state.ready;
  }

  get(): T {
    if (this.state.ready) {
      this.onHit();
      return this.state.value;
    }
    const value = this.build();
    this.state = { ready: true, value };
    this.onMiss();
    return value;
  }

  reset(): void {
    this.state = { ready: false };
  }
}

type Slots = { [K in AzureClientKind]: Lazy<AzureClientMap[K]> };

const KINDS: readonly AzureClientKind[] = ["resources", "compute", "network", "keyvault", "dns", "privateDns", "storage"];

// =============================================================================
// Registry
// =============================================================================

export class AzureClientRegistry {
  private readonly slots: Slots;
  private hits = 0;
  private misses = 0;

  constructor(credential: TokenCredential, subscriptionId: string, factories: Partial<ClientFactories> = {}) {
    const make = { ...DEFAULT_FACTORIES, ...factories };
    const hit = () => {
      this.hits++;
    };
    const miss = () => {
      this.misses++;
    };
    this.slots = {
      resources: new Lazy(() => make.resources(credential, subscriptionId), hit, miss),
      compute: new Lazy(() => make.compute(credential, subscriptionId), hit, miss),
      network: new Lazy(() => make.network(credential, subscriptionId), hit, miss),
      keyvault: new Lazy(() => make.keyvault(credential, subscriptionId), hit, miss),
      dns: new Lazy(() => make.dns(credential, subscriptionId), hit, miss),
      privateDns: new Lazy(() => make.privateDns(credential, subscriptionId), hit, miss),
      storage: new Lazy(() => make.storage(credential, subscriptionId), hit, miss),
    };
  }

  get<K extends AzureClientKind>(kind: K): AzureClientMap[K] {
    return this.slots[kind].get();
  }

  /** Drop every client; the next `get` builds a fresh one. */
  clear(): void {
    for (const kind of KINDS) this.slots[kind].reset();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): ClientRegistryStats {
    return {
      created: KINDS.filter((kind) => this.slots[kind].isReady),
      hits: this.hits,
      misses: this.misses,
    };
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createClientRegistry(
  credential: TokenCredential,
  subscriptionId: string,
  factories?: Partial<ClientFactories>,
): AzureClientRegistry {
  return new AzureClientRegistry(credential, subscriptionId, factories);
}

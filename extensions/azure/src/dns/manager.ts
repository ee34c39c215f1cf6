/**
 * Azure DNS Manager
 *
 * Public zones via @azure/arm-dns and private zones via
 * @azure/arm-privatedns, both kept in the scope's resource group.
 */

import type { RecordSet as PublicRecordSet, Zone } from "@azure/arm-dns";
import type {
  PrivateZone as ArmPrivateZone,
  RecordSet as PrivateRecordSet,
  VirtualNetworkLink as ArmVirtualNetworkLink,
} from "@azure/arm-privatedns";
import {
  completedOperation,
  type EnsureOptions,
  type Reconciled,
  type RemoveOptions,
  type RemoveOutcome,
  type ResourceRef,
  resourceOf,
} from "../reconcile/index.js";
import { virtualNetworkId, type AzureScope } from "../types.js";
import {
  PRIVATE_A_RECORD_TTL,
  PUBLIC_A_RECORD_TTL,
  type ARecordSet,
  type DnsZone,
  type PrivateDnsZone,
  type VirtualNetworkLink,
  type VnetLocator,
} from "./types.js";

function toZone(zone: Zone): DnsZone {
  return {
    id: zone.id ?? "",
    name: zone.name ?? "",
    zoneType: zone.zoneType === "Private" ? "Private" : "Public",
    nameServers: zone.nameServers ?? [],
  };
}

function toPrivateZone(zone: ArmPrivateZone): PrivateDnsZone {
  return {
    id: zone.id ?? "",
    name: zone.name ?? "",
    numberOfVirtualNetworkLinks: zone.numberOfVirtualNetworkLinks,
    provisioningState: zone.provisioningState,
  };
}

function toLink(link: ArmVirtualNetworkLink): VirtualNetworkLink {
  return {
    id: link.id ?? "",
    name: link.name ?? "",
    virtualNetworkId: link.virtualNetwork?.id,
    registrationEnabled: link.registrationEnabled ?? false,
    provisioningState: link.provisioningState,
  };
}

function toARecordSet(name: string, set: PublicRecordSet | PrivateRecordSet): ARecordSet {
  return {
    name: set.name ?? name,
    fqdn: set.fqdn,
    ttl: set.ttl,
    ipv4Addresses: (set.aRecords ?? []).flatMap((record) => (record.ipv4Address ? [record.ipv4Address] : [])),
  };
}

/** Rendered for the operator after creating a public zone. */
export function delegationBanner(zone: string, nameServers: string[]): string {
  const rule = "*".repeat(80);
  return `\n${rule}\nPlease add the following NS records to your DNS record: ${zone}\n${nameServers.join("\n")}\n${rule}\n`;
}

// =============================================================================
// AzureDnsManager
// =============================================================================

export class AzureDnsManager {
  private readonly scope: AzureScope;

  constructor(scope: AzureScope) {
    this.scope = scope;
  }

  private get dns() {
    return this.scope.clients.get("dns");
  }

  private get privateDns() {
    return this.scope.clients.get("privateDns");
  }

  private ref(type: string, name: string, parent?: string): ResourceRef {
    return { provider: "Microsoft.Network", type, resourceGroup: this.scope.resourceGroup, name, parent };
  }

  // ---------------------------------------------------------------------------
  // Public zones
  // ---------------------------------------------------------------------------

  /**
   * Ensure a public zone and log the name servers the parent domain has to
   * delegate to.
   */
  async createZone(zone: string, options?: EnsureOptions): Promise<Reconciled<DnsZone>> {
    const rg = this.scope.resourceGroup;
    const result = await this.scope.reconciler.ensure(
      {
        ref: this.ref("dnsZones", zone),
        lookup: async () => toZone(await this.dns.zones.get(rg, zone)),
        desired: () => ({ location: "global", zoneType: "Public" as const }),
        create: async (desired) => {
          await this.dns.zones.createOrUpdate(rg, zone, desired);
          return completedOperation;
        },
      },
      options,
    );

    const ns = await this.dns.recordSets.get(rg, zone, "@", "NS");
    const nameServers = (ns.nsRecords ?? []).flatMap((record) => (record.nsdname ? [record.nsdname] : []));
    this.scope.logger.warn(delegationBanner(zone, nameServers));
    return result;
  }

  async createARecord(name: string, zone: string, ips: string[]): Promise<ARecordSet> {
    this.scope.logger.info(`Creating DNS record ${name} for ${ips.join(", ")}`);
    const set = await this.dns.recordSets.createOrUpdate(this.scope.resourceGroup, zone, name, "A", {
      ttl: PUBLIC_A_RECORD_TTL,
      aRecords: ips.map((ipv4Address) => ({ ipv4Address })),
    });
    return toARecordSet(name, set);
  }

  async deleteARecord(name: string, zone: string, options?: RemoveOptions): Promise<RemoveOutcome> {
    return this.scope.reconciler.remove(
      this.ref("dnsZones/A", name, zone),
      async () => {
        await this.dns.recordSets.delete(this.scope.resourceGroup, zone, name, "A");
        return completedOperation;
      },
      options,
    );
  }

  // ---------------------------------------------------------------------------
  // Private zones
  // ---------------------------------------------------------------------------

  /** Ensure a private zone and link it to each of `links`. */
  async createPrivateZone(zone: string, links: VnetLocator[] = []): Promise<PrivateDnsZone> {
    const rg = this.scope.resourceGroup;
    this.scope.logger.info(`Creating private DNS zone: ${zone}`);
    const result = await this.scope.reconciler.ensure(
      {
        ref: this.ref("privateDnsZones", zone),
        lookup: async () => toPrivateZone(await this.privateDns.privateZones.get(rg, zone)),
        desired: () => ({ location: "global" }),
        create: (desired) => this.privateDns.privateZones.beginCreateOrUpdate(rg, zone, desired),
      },
      { forceWait: true },
    );
    for (const link of links) await this.linkPrivateZoneToVnet(rg, zone, link.resourceGroup, link.vnet);
    this.scope.logger.info("Private DNS zone created, VNETs linked");
    return resourceOf(result);
  }

  /** Link a private zone to a virtual network; the link is named after the network. */
  async linkPrivateZoneToVnet(
    dnsResourceGroup: string,
    zone: string,
    vnetResourceGroup: string,
    vnet: string,
    options?: EnsureOptions,
  ): Promise<Reconciled<VirtualNetworkLink>> {
    this.scope.logger.info(`Linking private DNS ${zone} to ${vnet}`);
    return this.scope.reconciler.ensure(
      {
        ref: { ...this.ref("privateDnsZones/virtualNetworkLinks", vnet, zone), resourceGroup: dnsResourceGroup },
        lookup: async () => toLink(await this.privateDns.virtualNetworkLinks.get(dnsResourceGroup, zone, vnet)),
        desired: () => ({
          location: "global",
          registrationEnabled: false,
          virtualNetwork: { id: virtualNetworkId(this.scope.subscriptionId, vnetResourceGroup, vnet) },
        }),
        create: (desired) => this.privateDns.virtualNetworkLinks.beginCreateOrUpdate(dnsResourceGroup, zone, vnet, desired),
      },
      options,
    );
  }

  async createPrivateARecord(name: string, ips: string | string[], zone: string): Promise<ARecordSet> {
    const addresses = typeof ips === "string" ? [ips] : ips;
    this.scope.logger.info(`Creating private DNS record ${name}.${zone} for ${addresses.join(", ")}`);
    const set = await this.privateDns.recordSets.createOrUpdate(this.scope.resourceGroup, zone, "A", name, {
      ttl: PRIVATE_A_RECORD_TTL,
      aRecords: addresses.map((ipv4Address) => ({ ipv4Address })),
    });
    return toARecordSet(name, set);
  }

  async deletePrivateARecord(name: string, zone: string, options?: RemoveOptions): Promise<RemoveOutcome> {
    return this.scope.reconciler.remove(
      this.ref("privateDnsZones/A", name, zone),
      async () => {
        await this.privateDns.recordSets.delete(this.scope.resourceGroup, zone, "A", name);
        return completedOperation;
      },
      options,
    );
  }
}

export function createDnsManager(scope: AzureScope): AzureDnsManager {
  return new AzureDnsManager(scope);
}

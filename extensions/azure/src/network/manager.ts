/**
 * Azure Network Manager
 *
 * Get-or-create for network security groups, virtual networks, subnets,
 * public IPs and network interfaces via @azure/arm-network.
 */

import type {
  NetworkInterface as ArmNetworkInterface,
  NetworkSecurityGroup as ArmNetworkSecurityGroup,
  PublicIPAddress as ArmPublicIPAddress,
  SecurityRule as ArmSecurityRule,
  Subnet as ArmSubnet,
  VirtualNetwork as ArmVirtualNetwork,
} from "@azure/arm-network";
import type { EnsureOptions, Reconciled, ResourceRef } from "../reconcile/index.js";
import { virtualNetworkId, type AzureScope } from "../types.js";
import {
  DEVELOPMENT_PORTS,
  REQUIRED_SERVICE_ENDPOINTS,
  type NetworkInterface,
  type NetworkInterfaceOptions,
  type NetworkSecurityGroup,
  type PublicIpAddress,
  type ResourceId,
  type SecurityRuleResult,
  type ServiceEndpointOptions,
  type Subnet,
  type SubnetOptions,
  type VirtualNetwork,
} from "./types.js";

// =============================================================================
// Mapping
// =============================================================================

function toNsg(nsg: ArmNetworkSecurityGroup): NetworkSecurityGroup {
  return {
    id: nsg.id ?? "",
    name: nsg.name ?? "",
    location: nsg.location ?? "",
    securityRules: (nsg.securityRules ?? []).map((rule) => rule.name ?? ""),
    provisioningState: nsg.provisioningState,
  };
}

function toVnet(vnet: ArmVirtualNetwork): VirtualNetwork {
  return {
    id: vnet.id ?? "",
    name: vnet.name ?? "",
    location: vnet.location ?? "",
    addressPrefixes: vnet.addressSpace?.addressPrefixes ?? [],
    provisioningState: vnet.provisioningState,
  };
}

function toSubnet(subnet: ArmSubnet): Subnet {
  return {
    id: subnet.id ?? "",
    name: subnet.name ?? "",
    addressPrefix: subnet.addressPrefix,
    networkSecurityGroupId: subnet.networkSecurityGroup?.id,
    serviceEndpoints: (subnet.serviceEndpoints ?? []).flatMap((endpoint) => (endpoint.service ? [endpoint.service] : [])),
    provisioningState: subnet.provisioningState,
  };
}

function toPublicIp(ip: ArmPublicIPAddress): PublicIpAddress {
  return {
    id: ip.id ?? "",
    name: ip.name ?? "",
    location: ip.location ?? "",
    ipAddress: ip.ipAddress,
    fqdn: ip.dnsSettings?.fqdn,
    provisioningState: ip.provisioningState,
  };
}

function toNic(nic: ArmNetworkInterface): NetworkInterface {
  return {
    id: nic.id ?? "",
    name: nic.name ?? "",
    location: nic.location ?? "",
    privateIpAddress: nic.ipConfigurations?.[0]?.privateIPAddress,
    provisioningState: nic.provisioningState,
  };
}

// =============================================================================
// AzureNetworkManager
// =============================================================================

export class AzureNetworkManager {
  private readonly scope: AzureScope;

  constructor(scope: AzureScope) {
    this.scope = scope;
  }

  private get client() {
    return this.scope.clients.get("network");
  }

  private ref(type: string, name: string, parent?: string): ResourceRef {
    return { provider: "Microsoft.Network", type, resourceGroup: this.scope.resourceGroup, name, parent };
  }

  async networkSecurityGroup(name: string, options?: EnsureOptions): Promise<Reconciled<NetworkSecurityGroup>> {
    const rg = this.scope.resourceGroup;
    return this.scope.reconciler.ensure(
      {
        ref: this.ref("networkSecurityGroups", name),
        lookup: async () => toNsg(await this.client.networkSecurityGroups.get(rg, name)),
        desired: async () => ({ location: await this.scope.location() }),
        required: ["location"],
        create: (desired) => this.client.networkSecurityGroups.beginCreateOrUpdate(rg, name, desired),
      },
      options,
    );
  }

  /** Upsert the `dev_ports` inbound rule (priority 200). */
  async allowDevelopmentPorts(nsg: string, fromIp = "*"): Promise<SecurityRuleResult> {
    return this.upsertRule(nsg, "dev_ports", {
      protocol: "Tcp",
      sourcePortRange: "*",
      destinationPortRanges: [...DEVELOPMENT_PORTS],
      sourceAddressPrefix: fromIp,
      destinationAddressPrefix: "*",
      priority: 200,
      direction: "Inbound",
      access: "Allow",
    });
  }

  /** Upsert the `ping_rule` inbound ICMP rule (priority 100). */
  async allowPing(nsg: string, fromIp = "*"): Promise<SecurityRuleResult> {
    return this.upsertRule(nsg, "ping_rule", {
      protocol: "Icmp",
      sourcePortRange: "*",
      destinationPortRange: "*",
      sourceAddressPrefix: fromIp,
      destinationAddressPrefix: "*",
      priority: 100,
      direction: "Inbound",
      access: "Allow",
    });
  }

  private async upsertRule(nsg: string, rule: string, params: ArmSecurityRule): Promise<SecurityRuleResult> {
    this.scope.logger.info({ nsg, rule }, `Opening ${rule} in network security group ${nsg}`);
    const operation = await this.client.securityRules.beginCreateOrUpdate(this.scope.resourceGroup, nsg, rule, params);
    const settled = await this.scope.reconciler.settle(operation, this.ref("securityRules", rule, nsg));
    return { name: rule, settled };
  }

  async virtualNetwork(
    name: string,
    addressPrefixes?: string[],
    options?: EnsureOptions,
  ): Promise<Reconciled<VirtualNetwork>> {
    const rg = this.scope.resourceGroup;
    return this.scope.reconciler.ensure(
      {
        ref: this.ref("virtualNetworks", name),
        lookup: async () => toVnet(await this.client.virtualNetworks.get(rg, name)),
        desired: async () => ({ location: await this.scope.location(), addressPrefixes }),
        required: ["addressPrefixes"],
        create: ({ location, addressPrefixes: prefixes }) =>
          this.client.virtualNetworks.beginCreateOrUpdate(rg, name, { location, addressSpace: { addressPrefixes: prefixes } }),
      },
      options,
    );
  }

  async subnet(
    name: string,
    vnet: string,
    addressPrefix?: string,
    subnetOptions: SubnetOptions = {},
    options?: EnsureOptions,
  ): Promise<Reconciled<Subnet>> {
    const rg = this.scope.resourceGroup;
    return this.scope.reconciler.ensure(
      {
        ref: this.ref("subnets", name, vnet),
        lookup: async () => toSubnet(await this.client.subnets.get(rg, vnet, name)),
        desired: () => ({ addressPrefix, nsg: subnetOptions.nsg }),
        required: ["addressPrefix"],
        create: (desired) =>
          this.client.subnets.beginCreateOrUpdate(rg, vnet, name, {
            addressPrefix: desired.addressPrefix,
            networkSecurityGroup: desired.nsg ? { id: desired.nsg.id } : undefined,
          }),
      },
      options,
    );
  }

  async getPublicIp(name: string): Promise<PublicIpAddress> {
    return toPublicIp(await this.client.publicIPAddresses.get(this.scope.resourceGroup, name));
  }

  /** Static Standard-SKU public IP with a DNS label (defaults to the IP's name). */
  async publicIp(name: string, dnsName: string = name, options?: EnsureOptions): Promise<Reconciled<PublicIpAddress>> {
    const rg = this.scope.resourceGroup;
    return this.scope.reconciler.ensure(
      {
        ref: this.ref("publicIPAddresses", name),
        lookup: () => this.getPublicIp(name),
        desired: async () => ({ location: await this.scope.location(), dnsName }),
        required: ["location"],
        create: (desired) =>
          this.client.publicIPAddresses.beginCreateOrUpdate(rg, name, {
            location: desired.location,
            publicIPAllocationMethod: "Static",
            sku: { name: "Standard" },
            dnsSettings: desired.dnsName ? { domainNameLabel: desired.dnsName } : undefined,
          }),
      },
      options,
    );
  }

  async networkInterface(
    name: string,
    subnet: ResourceId | undefined,
    nicOptions: NetworkInterfaceOptions = {},
    options?: EnsureOptions,
  ): Promise<Reconciled<NetworkInterface>> {
    const rg = this.scope.resourceGroup;
    return this.scope.reconciler.ensure(
      {
        ref: this.ref("networkInterfaces", name),
        lookup: async () => toNic(await this.client.networkInterfaces.get(rg, name)),
        desired: async () => ({
          location: await this.scope.location(),
          subnet,
          nsg: nicOptions.nsg,
          publicIp: nicOptions.publicIp,
        }),
        required: ["subnet"],
        create: (desired) =>
          this.client.networkInterfaces.beginCreateOrUpdate(rg, name, {
            location: desired.location,
            ipConfigurations: [
              {
                name,
                primary: true,
                subnet: desired.subnet ? { id: desired.subnet.id } : undefined,
                publicIPAddress: desired.publicIp ? { id: desired.publicIp.id } : undefined,
              },
            ],
            networkSecurityGroup: desired.nsg ? { id: desired.nsg.id } : undefined,
          }),
      },
      options,
    );
  }

  /**
   * Add the Storage, Sql and KeyVault service endpoints to a subnet that
   * lacks them. Endpoints already present are kept.
   */
  async enableServiceEndpoints(
    resourceGroup: string,
    vnet: string,
    subnet: string,
    options: ServiceEndpointOptions = {},
  ): Promise<Subnet> {
    this.scope.logger.info({ vnet, subnet }, "Enabling vnet service endpoints");
    const current = await this.client.subnets.get(resourceGroup, vnet, subnet);
    const endpoints = [...(current.serviceEndpoints ?? [])];
    const enabled = new Set(endpoints.map((endpoint) => endpoint.service));
    for (const service of REQUIRED_SERVICE_ENDPOINTS) {
      if (!enabled.has(service)) endpoints.push({ service });
    }

    const updated: ArmSubnet = { ...current, serviceEndpoints: endpoints };
    if (options.disablePrivateEndpointPolicies) updated.privateEndpointNetworkPolicies = "Disabled";

    const operation = await this.client.subnets.beginCreateOrUpdate(resourceGroup, vnet, subnet, updated);
    return toSubnet(await operation.pollUntilDone());
  }

  getVnetId(resourceGroup: string, vnet: string): string {
    return virtualNetworkId(this.scope.subscriptionId, resourceGroup, vnet);
  }

  getSubnetId(resourceGroup: string, vnet: string, subnet: string): string {
    return `${this.getVnetId(resourceGroup, vnet)}/subnets/${subnet}`;
  }
}

export function createNetworkManager(scope: AzureScope): AzureNetworkManager {
  return new AzureNetworkManager(scope);
}

/**
 * Azure DNS — Type Definitions
 */

export type DnsZone = {
  id: string;
  name: string;
  zoneType: "Public" | "Private";
  nameServers: string[];
};

export type PrivateDnsZone = {
  id: string;
  name: string;
  numberOfVirtualNetworkLinks?: number;
  provisioningState?: string;
};

export type VirtualNetworkLink = {
  id: string;
  name: string;
  virtualNetworkId?: string;
  registrationEnabled: boolean;
  provisioningState?: string;
};

export type ARecordSet = {
  name: string;
  fqdn?: string;
  ttl?: number;
  ipv4Addresses: string[];
};

/** A virtual network to link a private zone to, by resource group and name. */
export type VnetLocator = {
  resourceGroup: string;
  vnet: string;
};

export const PUBLIC_A_RECORD_TTL = 300;
export const PRIVATE_A_RECORD_TTL = 3600;

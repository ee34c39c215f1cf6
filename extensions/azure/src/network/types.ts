/**
 * Azure Network — Type Definitions
 */

/** Anything carrying an ARM id, such as a resource returned by a manager. */
export type ResourceId = { id: string };

export type NetworkSecurityGroup = {
  id: string;
  name: string;
  location: string;
  securityRules: string[];
  provisioningState?: string;
};

export type SecurityRuleResult = {
  name: string;
  /** False when the upsert was submitted without waiting (async mode). */
  settled: boolean;
};

export type VirtualNetwork = {
  id: string;
  name: string;
  location: string;
  addressPrefixes: string[];
  provisioningState?: string;
};

export type Subnet = {
  id: string;
  name: string;
  addressPrefix?: string;
  networkSecurityGroupId?: string;
  serviceEndpoints: string[];
  provisioningState?: string;
};

export type PublicIpAddress = {
  id: string;
  name: string;
  location: string;
  ipAddress?: string;
  fqdn?: string;
  provisioningState?: string;
};

export type NetworkInterface = {
  id: string;
  name: string;
  location: string;
  privateIpAddress?: string;
  provisioningState?: string;
};

export type SubnetOptions = {
  nsg?: ResourceId;
};

export type NetworkInterfaceOptions = {
  nsg?: ResourceId;
  publicIp?: ResourceId;
};

export type ServiceEndpointOptions = {
  disablePrivateEndpointPolicies?: boolean;
};

/** Inbound TCP ports opened by the `dev_ports` rule. */
export const DEVELOPMENT_PORTS = ["22", "20022", "6006", "6666", "8888", "8889", "6007", "80", "8080"] as const;

export const REQUIRED_SERVICE_ENDPOINTS = ["Microsoft.Storage", "Microsoft.Sql", "Microsoft.KeyVault"] as const;

export { AzureNetworkManager, createNetworkManager } from "./manager.js";
export { DEVELOPMENT_PORTS, REQUIRED_SERVICE_ENDPOINTS } from "./types.js";
export type {
  NetworkInterface,
  NetworkInterfaceOptions,
  NetworkSecurityGroup,
  PublicIpAddress,
  ResourceId,
  SecurityRuleResult,
  ServiceEndpointOptions,
  Subnet,
  SubnetOptions,
  VirtualNetwork,
} from "./types.js";

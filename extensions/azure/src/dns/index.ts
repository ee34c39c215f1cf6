export { AzureDnsManager, createDnsManager, delegationBanner } from "./manager.js";
export { PRIVATE_A_RECORD_TTL, PUBLIC_A_RECORD_TTL } from "./types.js";
export type { ARecordSet, DnsZone, PrivateDnsZone, VirtualNetworkLink, VnetLocator } from "./types.js";

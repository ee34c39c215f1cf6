/**
 * Azure VMs — Type Definitions
 */

import type { ImageReference, MarketplacePlan } from "../config.js";
import type { ResourceId } from "../network/index.js";

export type VMPowerState = "running" | "deallocated" | "stopped" | "starting" | "deallocating" | "unknown";

export type VMInstance = {
  id: string;
  name: string;
  location: string;
  vmSize: string;
  powerState: VMPowerState;
  provisioningState: string;
  priority?: string;
  adminUsername?: string;
  osDiskSizeGB?: number;
  tags?: Record<string, string>;
  networkInterfaces: string[];
};

export type VMCreateOptions = {
  networkInterface?: ResourceId;
  image?: ImageReference;
  vmSize: string;
  adminUsername?: string;
  adminPassword?: string;
  spotInstance?: boolean;
  /** Spot price cap per hour; -1 caps at the on-demand price. */
  maxPricePerHour?: number;
  diskSizeGB?: number;
  sshPublicKey?: string;
  plan?: MarketplacePlan;
};

export type VMOperationResult = {
  vmName: string;
  operation: "start" | "powerOff" | "restart";
  /** False when the request was submitted without waiting (async mode). */
  settled: boolean;
};

/** Resource types the generic delete knows how to remove. */
export const DELETABLE_TYPES = [
  "virtualMachines",
  "networkInterfaces",
  "publicIPAddresses",
  "networkSecurityGroups",
  "virtualNetworks",
  "subnets",
] as const;

export type DeletableType = (typeof DELETABLE_TYPES)[number];

export const VM_TAGS = { persistent: "0", development: "1" } as const;

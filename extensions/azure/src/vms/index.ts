export { AzureVMManager, asUser, createVMManager } from "./manager.js";
export { VirtualMachineHost, type DeployOverrides, type SecretSource, type VirtualMachineHostOptions } from "./host.js";
export { knownHostName, removeKnownHost, removeSshConfigEntry, renderSshConfigEntry, upsertSshConfigEntry } from "./ssh-config.js";
export { DELETABLE_TYPES, VM_TAGS } from "./types.js";
export type { DeletableType, VMCreateOptions, VMInstance, VMOperationResult, VMPowerState } from "./types.js";

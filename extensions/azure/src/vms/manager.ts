/**
 * Azure VM Manager
 *
 * Virtual machines via @azure/arm-compute: get-or-create, power operations,
 * run-command, and deletion of the VM and its network resources.
 */

import type { VirtualMachine as ArmVirtualMachine, VirtualMachineInstanceView } from "@azure/arm-compute";
import { ConfigurationError, UnsupportedResourceError } from "@cirrus/core";
import {
  describeRef,
  type EnsureOptions,
  type OperationHandle,
  type Reconciled,
  type RemoveOptions,
  type RemoveOutcome,
  type ResourceRef,
} from "../reconcile/index.js";
import type { AzureScope } from "../types.js";
import {
  DELETABLE_TYPES,
  VM_TAGS,
  type DeletableType,
  type VMCreateOptions,
  type VMInstance,
  type VMOperationResult,
  type VMPowerState,
} from "./types.js";

const DEFAULT_MAX_PRICE_PER_HOUR = 2.0;
const DEFAULT_DISK_SIZE_GB = 32;

function parsePowerState(view: VirtualMachineInstanceView | undefined): VMPowerState {
  const code = view?.statuses?.find((status) => status.code?.startsWith("PowerState/"))?.code;
  switch (code?.slice("PowerState/".length)) {
    case "running":
      return "running";
    case "deallocated":
      return "deallocated";
    case "stopped":
      return "stopped";
    case "starting":
      return "starting";
    case "deallocating":
      return "deallocating";
    default:
      return "unknown";
  }
}

function toInstance(vm: ArmVirtualMachine): VMInstance {
  return {
    id: vm.id ?? "",
    name: vm.name ?? "",
    location: vm.location,
    vmSize: vm.hardwareProfile?.vmSize ?? "",
    powerState: parsePowerState(vm.instanceView),
    provisioningState: vm.provisioningState ?? "",
    priority: vm.priority,
    adminUsername: vm.osProfile?.adminUsername,
    osDiskSizeGB: vm.storageProfile?.osDisk?.diskSizeGB,
    tags: vm.tags,
    networkInterfaces: (vm.networkProfile?.networkInterfaces ?? []).map((nic) => nic.id ?? ""),
  };
}

function isDeletable(type: string): type is DeletableType {
  return DELETABLE_TYPES.some((known) => known === type);
}

/** Wrap a command so it runs as `user` through a login shell. */
export function asUser(command: string, user?: string): string {
  return user ? `runuser -l ${user} -c "${command}"` : command;
}

// =============================================================================
// AzureVMManager
// =============================================================================

export class AzureVMManager {
  private readonly scope: AzureScope;

  constructor(scope: AzureScope) {
    this.scope = scope;
  }

  private get compute() {
    return this.scope.clients.get("compute");
  }

  private get network() {
    return this.scope.clients.get("network");
  }

  private ref(name: string): ResourceRef {
    return { provider: "Microsoft.Compute", type: "virtualMachines", resourceGroup: this.scope.resourceGroup, name };
  }

  async getVM(name: string): Promise<VMInstance> {
    return toInstance(await this.compute.virtualMachines.get(this.scope.resourceGroup, name, { expand: "instanceView" }));
  }

  async listVirtualMachines(): Promise<VMInstance[]> {
    const vms: VMInstance[] = [];
    for await (const vm of this.compute.virtualMachines.list(this.scope.resourceGroup)) vms.push(toInstance(vm));
    return vms;
  }

  async virtualMachine(name: string, create: VMCreateOptions, options?: EnsureOptions): Promise<Reconciled<VMInstance>> {
    const rg = this.scope.resourceGroup;
    return this.scope.reconciler.ensure(
      {
        ref: this.ref(name),
        lookup: () => this.getVM(name),
        desired: async () => ({
          location: await this.scope.location(),
          networkInterface: create.networkInterface,
          image: create.image,
          vmSize: create.vmSize,
          adminUsername: create.adminUsername,
          adminPassword: create.adminPassword,
        }),
        required: ["networkInterface", "image", "vmSize", "adminUsername", "adminPassword"],
        create: (desired) => {
          const { networkInterface, image, adminUsername } = desired;
          if (!networkInterface || !image || !adminUsername) {
            throw new ConfigurationError(`Incomplete definition for ${describeRef(this.ref(name))}`);
          }
          const params: ArmVirtualMachine = {
            location: desired.location,
            osProfile: {
              computerName: name,
              adminUsername,
              adminPassword: desired.adminPassword,
            },
            hardwareProfile: { vmSize: desired.vmSize },
            storageProfile: {
              imageReference: image,
              osDisk: { createOption: "FromImage", diskSizeGB: create.diskSizeGB ?? DEFAULT_DISK_SIZE_GB },
            },
            networkProfile: { networkInterfaces: [{ id: networkInterface.id, primary: true }] },
            tags: { ...VM_TAGS },
            plan: create.plan,
          };
          if (create.spotInstance) {
            params.priority = "Spot";
            params.evictionPolicy = "Deallocate";
            params.billingProfile = { maxPrice: create.maxPricePerHour ?? DEFAULT_MAX_PRICE_PER_HOUR };
          }
          if (create.sshPublicKey && params.osProfile) {
            params.osProfile.linuxConfiguration = {
              ssh: {
                publicKeys: [{ path: `/home/${adminUsername}/.ssh/authorized_keys`, keyData: create.sshPublicKey }],
              },
            };
          }
          return this.compute.virtualMachines.beginCreateOrUpdate(rg, name, params);
        },
      },
      options,
    );
  }

  async start(name: string, options?: EnsureOptions): Promise<VMOperationResult> {
    return this.power(name, "start", () => this.compute.virtualMachines.beginStart(this.scope.resourceGroup, name), options);
  }

  async powerOff(name: string, options?: EnsureOptions): Promise<VMOperationResult> {
    return this.power(name, "powerOff", () => this.compute.virtualMachines.beginPowerOff(this.scope.resourceGroup, name), options);
  }

  async restart(name: string, options?: EnsureOptions): Promise<VMOperationResult> {
    return this.power(name, "restart", () => this.compute.virtualMachines.beginRestart(this.scope.resourceGroup, name), options);
  }

  private async power(
    name: string,
    operation: VMOperationResult["operation"],
    begin: () => Promise<OperationHandle>,
    options: EnsureOptions = {},
  ): Promise<VMOperationResult> {
    this.scope.logger.info({ vm: name, operation }, `Requesting ${operation} of ${name}`);
    const handle = await begin();
    const settled = await this.scope.reconciler.settle(handle, this.ref(name), options);
    return { vmName: name, operation, settled };
  }

  /**
   * Run a shell command on the VM through the RunShellScript run-command and
   * return its combined output. Always waits for the result. An empty `user`
   * runs the command as given.
   */
  async runShellScript(name: string, command: string, user = "root"): Promise<string> {
    const poller = await this.compute.virtualMachines.beginRunCommand(this.scope.resourceGroup, name, {
      commandId: "RunShellScript",
      script: [asUser(command, user)],
      parameters: [],
    });
    const result = await poller.pollUntilDone();
    const message = result.value?.[0]?.message ?? "";
    this.scope.logger.debug({ vm: name }, `Run-command output:\n${message}`);
    return message;
  }

  /**
   * Delete a VM or one of its network resources. Subnets need `parent` set to
   * their virtual network.
   */
  async delete(ref: ResourceRef, options: RemoveOptions = {}): Promise<RemoveOutcome> {
    const type = ref.type;
    if (!isDeletable(type)) throw new UnsupportedResourceError(type);
    const rg = ref.resourceGroup;
    const begin = (): Promise<OperationHandle> => {
      switch (type) {
        case "virtualMachines":
          return this.compute.virtualMachines.beginDelete(rg, ref.name);
        case "networkInterfaces":
          return this.network.networkInterfaces.beginDelete(rg, ref.name);
        case "publicIPAddresses":
          return this.network.publicIPAddresses.beginDelete(rg, ref.name);
        case "networkSecurityGroups":
          return this.network.networkSecurityGroups.beginDelete(rg, ref.name);
        case "virtualNetworks":
          return this.network.virtualNetworks.beginDelete(rg, ref.name);
        case "subnets":
          if (!ref.parent) throw new ConfigurationError(`Subnet ${ref.name} needs its virtual network as parent`);
          return this.network.subnets.beginDelete(rg, ref.parent, ref.name);
      }
    };
    return this.scope.reconciler.remove(ref, begin, options);
  }
}

export function createVMManager(scope: AzureScope): AzureVMManager {
  return new AzureVMManager(scope);
}

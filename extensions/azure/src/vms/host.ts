/**
 * VirtualMachineHost
 *
 * One development VM and everything around it: the network chain it is
 * deployed into, reachability checks, and the local ssh client files that
 * point at it.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import {
  CommandFailedError,
  ConfigurationError,
  runCommand,
  unwrapWait,
  waitUntil,
  type CirrusLogger,
} from "@cirrus/core";
import type { DeploymentProfile, ImageReference, MarketplacePlan, ResolvedCirrusConfig } from "../config.js";
import type { AzureNetworkManager } from "../network/index.js";
import { isNotFoundError, resourceOf, type Reconciled } from "../reconcile/index.js";
import type { AzureVMManager } from "./manager.js";
import { removeKnownHost, removeSshConfigEntry, upsertSshConfigEntry } from "./ssh-config.js";
import type { VMInstance, VMOperationResult } from "./types.js";

/** Reads credentials for new machines, typically a key vault. */
export interface SecretSource {
  getSecret(name: string): Promise<string>;
}

export type VirtualMachineHostOptions = {
  vms: AzureVMManager;
  network: AzureNetworkManager;
  resourceGroup: string;
  config: ResolvedCirrusConfig;
  logger: CirrusLogger;
  profile?: DeploymentProfile;
  secrets?: SecretSource;
  /** Defaults to true. */
  spotInstance?: boolean;
  /** Directory holding the ssh `config` and `known_hosts` files. */
  sshDir?: string;
};

export type DeployOverrides = {
  nsg?: string;
  vnet?: string;
  vnetAddresses?: string[];
  subnet?: string;
  subnetAddress?: string;
  publicIpName?: string;
  nicName?: string;
  adminUsername?: string;
  adminPassword?: string;
  image?: ImageReference;
  /** A size alias from the profile's `vmSizes`, or a literal VM size. */
  size?: string;
  sshPublicKey?: string;
  plan?: MarketplacePlan;
};

const DEFAULT_SIZE_ALIAS = "small";
const DEFAULT_SSH_CONFIG_PORT = 20022;
const HOST_MAX_PRICE_PER_HOUR = 1.0;
const HOST_DISK_SIZE_GB = 64;

async function readOptional(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return undefined;
    throw error;
  }
}

export class VirtualMachineHost {
  readonly name: string;
  private readonly options: VirtualMachineHostOptions;
  private readonly logger: CirrusLogger;
  private vm: VMInstance | null;
  private fqdn: string | null = null;

  constructor(name: string, options: VirtualMachineHostOptions, vm: VMInstance | null = null) {
    this.name = name;
    this.options = options;
    this.vm = vm;
    this.logger = options.logger.child({ vm: name });
  }

  /** Attach to `name`, picking up the machine if it is already deployed. */
  static async open(name: string, options: VirtualMachineHostOptions): Promise<VirtualMachineHost> {
    const host = new VirtualMachineHost(name, options);
    host.vm = await host.find();
    return host;
  }

  get defaultPublicIpName(): string {
    return `${this.name}-${this.options.resourceGroup}`;
  }

  get isDeployed(): boolean {
    return this.vm !== null;
  }

  private async find(): Promise<VMInstance | null> {
    try {
      return await this.options.vms.getVM(this.name);
    } catch (error) {
      if (isNotFoundError(error)) return null;
      throw error;
    }
  }

  private required<T>(value: T | undefined, key: string): T {
    if (value === undefined) {
      throw new ConfigurationError(`Cannot deploy ${this.name}: no "${key}" given and no deployment profile provides one`);
    }
    return value;
  }

  private async credential(explicit: string | undefined, secret: "username" | "password"): Promise<string> {
    if (explicit) return explicit;
    const { profile, secrets } = this.options;
    if (!profile || !secrets) {
      throw new ConfigurationError(`Cannot deploy ${this.name}: no admin ${secret} given and no key vault to read it from`);
    }
    return secrets.getSecret(profile.secrets[secret]);
  }

  /**
   * Deploy the VM with its network chain, unless it already exists. Missing
   * settings come from the deployment profile; the admin credentials from the
   * profile's key vault secrets.
   */
  async deploy(overrides: DeployOverrides = {}): Promise<Reconciled<VMInstance> | null> {
    if (this.vm) {
      this.logger.info("VM is already deployed, skipping deployment");
      return null;
    }
    const { network, vms, profile } = this.options;
    const nsgName = this.required(overrides.nsg ?? profile?.nsg, "nsg");
    const vnetName = this.required(overrides.vnet ?? profile?.vnet, "vnet");
    const subnetName = this.required(overrides.subnet ?? profile?.subnet, "subnet");
    const image = this.required(overrides.image ?? profile?.image, "image");
    const adminUsername = await this.credential(overrides.adminUsername, "username");
    const adminPassword = await this.credential(overrides.adminPassword, "password");
    const size = overrides.size ?? DEFAULT_SIZE_ALIAS;
    const vmSize = profile?.vmSizes[size] ?? size;
    const publicIpName = overrides.publicIpName ?? this.defaultPublicIpName;

    // Later links in the chain need the ids of earlier ones, so these always wait.
    const forceWait = { forceWait: true };
    const nsg = resourceOf(await network.networkSecurityGroup(nsgName, forceWait));
    await network.allowDevelopmentPorts(nsgName);
    await network.allowPing(nsgName);
    await network.virtualNetwork(vnetName, overrides.vnetAddresses ?? profile?.vnetAddresses, forceWait);
    const subnet = resourceOf(
      await network.subnet(subnetName, vnetName, overrides.subnetAddress ?? profile?.subnetAddress, { nsg }, forceWait),
    );
    const publicIp = resourceOf(await network.publicIp(publicIpName, publicIpName, forceWait));
    const nic = resourceOf(
      await network.networkInterface(overrides.nicName ?? `${this.name}-nic`, subnet, { nsg, publicIp }, forceWait),
    );

    const result = await vms.virtualMachine(this.name, {
      networkInterface: nic,
      image,
      vmSize,
      adminUsername,
      adminPassword,
      spotInstance: this.options.spotInstance ?? true,
      maxPricePerHour: HOST_MAX_PRICE_PER_HOUR,
      diskSizeGB: HOST_DISK_SIZE_GB,
      sshPublicKey: overrides.sshPublicKey,
      plan: overrides.plan ?? profile?.plan,
    });
    if (result.state !== "pending") this.vm = result.resource;
    return result;
  }

  /** Throws unless the VM exists in Azure. */
  async ensureExists(): Promise<VMInstance> {
    this.vm = this.vm ?? (await this.find());
    if (!this.vm) {
      throw new ConfigurationError(`VM ${this.name} does not exist in resource group ${this.options.resourceGroup}`);
    }
    return this.vm;
  }

  async getFqdn(publicIpName: string = this.defaultPublicIpName): Promise<string> {
    if (this.fqdn) return this.fqdn;
    const ip = await this.options.network.getPublicIp(publicIpName);
    if (!ip.fqdn) throw new ConfigurationError(`Public IP ${publicIpName} has no DNS name`);
    this.fqdn = ip.fqdn;
    return this.fqdn;
  }

  async executeCommand(command: string, user = "root"): Promise<string> {
    await this.ensureExists();
    return this.options.vms.runShellScript(this.name, command, user);
  }

  async start(): Promise<VMOperationResult> {
    await this.ensureExists();
    return this.options.vms.start(this.name);
  }

  async powerOff(): Promise<VMOperationResult> {
    await this.ensureExists();
    return this.options.vms.powerOff(this.name);
  }

  async restart(): Promise<VMOperationResult> {
    await this.ensureExists();
    return this.options.vms.restart(this.name);
  }

  /** Failed checks are expected while the VM boots, so their output is not logged. */
  private async answers(argv: string[]): Promise<boolean> {
    try {
      await runCommand(argv, { logger: this.logger.child({ check: argv[0] }, { level: "silent" }) });
      return true;
    } catch (error) {
      if (error instanceof CommandFailedError) return false;
      throw error;
    }
  }

  /**
   * Wait until the VM answers ping and accepts ssh on `sshPort`. Each check
   * is skipped once it has passed.
   */
  async waitForService(sshPort = 22, signal?: AbortSignal): Promise<void> {
    const fqdn = await this.getFqdn();
    const { servicePollIntervalMs, serviceReadyTimeoutMs } = this.options.config;
    let ping = false;
    let ssh = false;
    const outcome = await waitUntil(
      async () => {
        ping ||= await this.answers(["ping", "-c", "1", fqdn]);
        ssh ||= await this.answers(["ssh", "-p", String(sshPort), "-o", "StrictHostKeyChecking=no", "-t", fqdn, "echo hi"]);
        return ping && ssh;
      },
      {
        intervalMs: servicePollIntervalMs,
        timeoutMs: serviceReadyTimeoutMs,
        signal,
        onPending: () =>
          this.logger.debug(
            `Waiting for service: Ping [${ping ? "OK" : "FAILED"}], SSH on port ${sshPort} [${ssh ? "OK" : "FAILED"}]`,
          ),
      },
    );
    unwrapWait(outcome, `${this.name} to answer ping and ssh`);
  }

  private get sshDir(): string {
    return this.options.sshDir ?? join(homedir(), ".ssh");
  }

  async addSshConfigEntry(alias: string = this.name, port = DEFAULT_SSH_CONFIG_PORT): Promise<void> {
    const fqdn = await this.getFqdn();
    await mkdir(this.sshDir, { recursive: true });
    const path = join(this.sshDir, "config");
    const current = (await readOptional(path)) ?? "";
    await writeFile(path, upsertSshConfigEntry(current, alias, fqdn, port));
    this.logger.info({ alias, fqdn }, `Added ssh config entry ${alias}`);
  }

  async removeSshConfigEntry(alias: string = this.name): Promise<void> {
    const path = join(this.sshDir, "config");
    const current = await readOptional(path);
    if (current === undefined) return;
    await writeFile(path, removeSshConfigEntry(current, alias));
  }

  async deleteFromKnownHosts(): Promise<void> {
    const path = join(this.sshDir, "known_hosts");
    const current = await readOptional(path);
    if (current === undefined) return;
    await writeFile(path, removeKnownHost(current, await this.getFqdn()));
  }
}

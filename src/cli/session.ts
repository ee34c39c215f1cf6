/**
 * Connects the CLI to Azure: logging level, deployment profile and the
 * AzureManager for the chosen resource group.
 */

import {
  AzureManager,
  loadDeploymentProfile,
  type AzureManagerOptions,
  type DeploymentProfile,
  type RemoveOutcome,
} from "@cirrus/azure";
import { configureLogging } from "@cirrus/core";
import type { GlobalOptions, HostRequest, VmSession } from "./program.js";

export class AzureVmSession implements VmSession {
  constructor(
    private readonly manager: AzureManager,
    private readonly profile?: DeploymentProfile,
  ) {}

  host(name: string, request: HostRequest = {}) {
    return this.manager.host(name, { profile: this.profile, spotInstance: request.spotInstance });
  }

  deleteVm(name: string, tolerateMissing: boolean): Promise<RemoveOutcome> {
    return this.manager.delete(
      { provider: "Microsoft.Compute", type: "virtualMachines", resourceGroup: this.manager.resourceGroup, name },
      { tolerateMissing },
    );
  }
}

export async function connect(
  options: GlobalOptions,
  create: (options: AzureManagerOptions) => Promise<AzureManager> = (opts) => AzureManager.create(opts),
): Promise<VmSession> {
  if (options.logLevel) configureLogging({ level: options.logLevel });
  const profile = options.profile ? await loadDeploymentProfile(options.profile) : undefined;
  const manager = await create({
    resourceGroup: options.resourceGroup,
    authPath: options.auth,
    location: options.location ?? profile?.location,
    config: { asyncMode: options.async },
  });
  return new AzureVmSession(manager, profile);
}

/**
 * cirrus-vm — CLI Commands
 *
 * Deploys and operates a single development VM from the terminal. Every
 * command resolves one host through the session and forwards its flags to
 * the library unchanged.
 */

import { readFile } from "node:fs/promises";
import { Command, InvalidArgumentError } from "commander";
import type { DeployOverrides, RemoveOutcome, VirtualMachineHost } from "@cirrus/azure";
import { ConfigurationError, isLogLevel, type LogLevel } from "@cirrus/core";

// =============================================================================
// Types
// =============================================================================

export type GlobalOptions = {
  auth?: string;
  resourceGroup: string;
  location?: string;
  profile?: string;
  async: boolean;
  logLevel?: LogLevel;
};

export type HostRequest = {
  spotInstance?: boolean;
};

/** What the commands need from Azure for one invocation. */
export interface VmSession {
  host(name: string, request?: HostRequest): Promise<VirtualMachineHost>;
  deleteVm(name: string, tolerateMissing: boolean): Promise<RemoveOutcome>;
}

export type CliContext = {
  connect: (options: GlobalOptions) => Promise<VmSession>;
  print: (line: string) => void;
};

// =============================================================================
// Option parsers
// =============================================================================

export function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 1 || port > 65_535 || String(port) !== value.trim()) {
    throw new InvalidArgumentError(`"${value}" is not a TCP port`);
  }
  return port;
}

export function parseLogLevel(value: string): LogLevel {
  const level = value.trim().toLowerCase();
  if (!isLogLevel(level)) throw new InvalidArgumentError(`"${value}" is not a log level`);
  return level;
}

function globalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals<{
    auth?: string;
    resourceGroup?: string;
    location?: string;
    profile?: string;
    async?: boolean;
    logLevel?: LogLevel;
  }>();
  if (!opts.resourceGroup) throw new ConfigurationError("No resource group given");
  return {
    auth: opts.auth,
    resourceGroup: opts.resourceGroup,
    location: opts.location,
    profile: opts.profile,
    async: opts.async ?? false,
    logLevel: opts.logLevel,
  };
}

// =============================================================================
// Program
// =============================================================================

/** Usage and parse errors surface as CommanderError instead of exiting. */
export function buildProgram(ctx: CliContext): Command {
  const program = new Command("cirrus-vm")
    .description("Deploy and operate a development VM on Azure")
    .option("--auth <file>", "Service principal file (default: $AZURE_AUTH_LOCATION)")
    .requiredOption("-g, --resource-group <rg>", "Resource group holding the VM")
    .option("-l, --location <location>", "Create the resource group here if it does not exist")
    .option("--profile <file>", "Deployment profile JSON")
    .option("--async", "Return once Azure accepted a request instead of waiting for it")
    .option("--log-level <level>", "Logging threshold, e.g. debug or warn", parseLogLevel)
    .exitOverride();

  const withSession = async (command: Command) => ctx.connect(globalOptions(command));

  program
    .command("deploy <name>")
    .description("Create the VM and its network unless it already exists")
    .option("--size <size>", "Size alias from the profile, or an Azure VM size")
    .option("--ssh-pubkey <file>", "Public key authorised for the admin user")
    .option("--on-demand", "Use regular instead of spot capacity")
    .action(async (name: string, opts: { size?: string; sshPubkey?: string; onDemand?: boolean }, command: Command) => {
      const session = await withSession(command);
      const host = await session.host(name, { spotInstance: !opts.onDemand });
      const overrides: DeployOverrides = { size: opts.size };
      if (opts.sshPubkey) overrides.sshPublicKey = (await readFile(opts.sshPubkey, "utf8")).trim();
      const result = await host.deploy(overrides);
      ctx.print(result ? `${name}: ${result.state}` : `${name}: already deployed`);
    });

  const power = [
    ["start", "Start the VM", (host: VirtualMachineHost) => host.start()],
    ["stop", "Power the VM off", (host: VirtualMachineHost) => host.powerOff()],
    ["restart", "Restart the VM", (host: VirtualMachineHost) => host.restart()],
  ] as const;
  for (const [verb, description, run] of power) {
    program
      .command(`${verb} <name>`)
      .description(description)
      .action(async (name: string, _opts: unknown, command: Command) => {
        const host = await (await withSession(command)).host(name);
        const result = await run(host);
        ctx.print(`${name}: ${result.operation} ${result.settled ? "done" : "requested"}`);
      });
  }

  program
    .command("delete <name>")
    .description("Delete the VM, leaving its network in place")
    .option("--tolerate-missing", "Succeed when the VM does not exist")
    .action(async (name: string, opts: { tolerateMissing?: boolean }, command: Command) => {
      const outcome = await (await withSession(command)).deleteVm(name, opts.tolerateMissing ?? false);
      ctx.print(`${name}: ${outcome}`);
    });

  program
    .command("exec <name> <command>")
    .description("Run a shell command on the VM")
    .option("--user <user>", "Run as this user", "root")
    .action(async (name: string, shellCommand: string, opts: { user: string }, command: Command) => {
      const host = await (await withSession(command)).host(name);
      ctx.print(await host.executeCommand(shellCommand, opts.user));
    });

  program
    .command("wait <name>")
    .description("Wait until the VM answers ping and ssh")
    .option("--ssh-port <port>", "Port sshd listens on", parsePort, 22)
    .action(async (name: string, opts: { sshPort: number }, command: Command) => {
      const host = await (await withSession(command)).host(name);
      await host.waitForService(opts.sshPort);
      ctx.print(`${name}: reachable`);
    });

  program
    .command("ssh-config <name>")
    .description("Add or remove the VM's entry in ~/.ssh/config")
    .option("--alias <alias>", "Host alias (default: the VM name)")
    .option("--remove", "Remove the entry and the host key instead")
    .action(async (name: string, opts: { alias?: string; remove?: boolean }, command: Command) => {
      const host = await (await withSession(command)).host(name);
      if (opts.remove) {
        await host.removeSshConfigEntry(opts.alias);
        await host.deleteFromKnownHosts();
        ctx.print(`${opts.alias ?? name}: removed`);
      } else {
        await host.addSshConfigEntry(opts.alias);
        ctx.print(`${opts.alias ?? name}: added`);
      }
    });

  return program;
}

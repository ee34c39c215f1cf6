/**
 * Tests for the cirrus-vm CLI commands.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { CommanderError, InvalidArgumentError, type Command } from "commander";
import type { VirtualMachineHost } from "@cirrus/azure";
import { buildProgram, parseLogLevel, parsePort, type CliContext, type VmSession } from "./program.js";

// ── Fakes ───────────────────────────────────────────────────────────────────

function fakeHost() {
  return {
    deploy: vi.fn().mockResolvedValue({ state: "created", ref: {}, resource: {} }),
    start: vi.fn().mockResolvedValue({ vmName: "dev", operation: "start", settled: true }),
    powerOff: vi.fn().mockResolvedValue({ vmName: "dev", operation: "powerOff", settled: false }),
    restart: vi.fn().mockResolvedValue({ vmName: "dev", operation: "restart", settled: true }),
    executeCommand: vi.fn().mockResolvedValue(" 10:00:00 up 3 days"),
    waitForService: vi.fn().mockResolvedValue(undefined),
    addSshConfigEntry: vi.fn().mockResolvedValue(undefined),
    removeSshConfigEntry: vi.fn().mockResolvedValue(undefined),
    deleteFromKnownHosts: vi.fn().mockResolvedValue(undefined),
  };
}

// ── Tests ───────────────────────────────────────────────────────────────────

describe("cirrus-vm", () => {
  let host: ReturnType<typeof fakeHost>;
  let session: { host: ReturnType<typeof vi.fn>; deleteVm: ReturnType<typeof vi.fn> };
  let connect: ReturnType<typeof vi.fn>;
  let printed: string[];
  let program: Command;

  const run = (...args: string[]) => program.parseAsync(args, { from: "user" });

  beforeEach(() => {
    host = fakeHost();
    session = {
      host: vi.fn().mockResolvedValue(host as unknown as VirtualMachineHost),
      deleteVm: vi.fn().mockResolvedValue("deleted"),
    };
    printed = [];
    connect = vi.fn().mockResolvedValue(session as unknown as VmSession);
    const ctx: CliContext = { connect, print: (line) => printed.push(line) };
    program = buildProgram(ctx);
    program.configureOutput({ writeOut: () => {}, writeErr: () => {} });
  });

  it("passes the global options to the session", async () => {
    await run("--auth", "sp.json", "-g", "rg1", "-l", "westeurope", "--profile", "dev.json", "--async", "--log-level", "DEBUG", "start", "dev");

    expect(connect).toHaveBeenCalledWith({
      auth: "sp.json",
      resourceGroup: "rg1",
      location: "westeurope",
      profile: "dev.json",
      async: true,
      logLevel: "debug",
    });
  });

  it("requires a resource group", async () => {
    await expect(run("start", "dev")).rejects.toMatchObject({ code: "commander.missingMandatoryOptionValue" });
    expect(connect).not.toHaveBeenCalled();
  });

  describe("deploy", () => {
    it("deploys a spot VM by default", async () => {
      await run("-g", "rg1", "deploy", "dev", "--size", "large");

      expect(session.host).toHaveBeenCalledWith("dev", { spotInstance: true });
      expect(host.deploy).toHaveBeenCalledWith({ size: "large" });
      expect(printed).toEqual(["dev: created"]);
    });

    it("reports a VM that already exists", async () => {
      host.deploy.mockResolvedValue(null);

      await run("-g", "rg1", "deploy", "dev", "--on-demand");

      expect(session.host).toHaveBeenCalledWith("dev", { spotInstance: false });
      expect(printed).toEqual(["dev: already deployed"]);
    });

    describe("with a public key", () => {
      let dir: string;

      beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "cirrus-cli-"));
      });

      afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
      });

      it("reads the key file", async () => {
        const keyFile = join(dir, "id.pub");
        await writeFile(keyFile, "ssh-ed25519 AAAAtest dev@example\n");

        await run("-g", "rg1", "deploy", "dev", "--ssh-pubkey", keyFile);

        expect(host.deploy).toHaveBeenCalledWith({ size: undefined, sshPublicKey: "ssh-ed25519 AAAAtest dev@example" });
      });
    });
  });

  it("reports whether a power operation finished", async () => {
    await run("-g", "rg1", "start", "dev");
    await run("-g", "rg1", "stop", "dev");
    await run("-g", "rg1", "restart", "dev");

    expect(printed).toEqual(["dev: start done", "dev: powerOff requested", "dev: restart done"]);
  });

  it("deletes the VM, tolerating a missing one on request", async () => {
    session.deleteVm.mockResolvedValue("missing");

    await run("-g", "rg1", "delete", "dev", "--tolerate-missing");

    expect(session.deleteVm).toHaveBeenCalledWith("dev", true);
    expect(printed).toEqual(["dev: missing"]);
  });

  it("runs commands as root unless told otherwise", async () => {
    await run("-g", "rg1", "exec", "dev", "uptime");
    await run("-g", "rg1", "exec", "dev", "uptime", "--user", "alice");

    expect(host.executeCommand.mock.calls).toEqual([
      ["uptime", "root"],
      ["uptime", "alice"],
    ]);
    expect(printed).toEqual([" 10:00:00 up 3 days", " 10:00:00 up 3 days"]);
  });

  it("waits on the given ssh port", async () => {
    await run("-g", "rg1", "wait", "dev");
    await run("-g", "rg1", "wait", "dev", "--ssh-port", "2222");

    expect(host.waitForService.mock.calls).toEqual([[22], [2222]]);
    expect(printed).toEqual(["dev: reachable", "dev: reachable"]);
  });

  describe("ssh-config", () => {
    it("adds an entry under the VM name", async () => {
      await run("-g", "rg1", "ssh-config", "dev");

      expect(host.addSshConfigEntry).toHaveBeenCalledWith(undefined);
      expect(printed).toEqual(["dev: added"]);
    });

    it("removes the entry and the host key", async () => {
      await run("-g", "rg1", "ssh-config", "dev", "--remove", "--alias", "box");

      expect(host.removeSshConfigEntry).toHaveBeenCalledWith("box");
      expect(host.deleteFromKnownHosts).toHaveBeenCalled();
      expect(printed).toEqual(["box: removed"]);
    });
  });

  it("rejects a malformed port", async () => {
    await expect(run("-g", "rg1", "wait", "dev", "--ssh-port", "ssh")).rejects.toBeInstanceOf(CommanderError);
    expect(host.waitForService).not.toHaveBeenCalled();
  });
});

describe("option parsers", () => {
  it("parses ports", () => {
    expect(parsePort("2222")).toBe(2222);
    expect(() => parsePort("0")).toThrow(InvalidArgumentError);
    expect(() => parsePort("22x")).toThrow('"22x" is not a TCP port');
  });

  it("parses log levels", () => {
    expect(parseLogLevel(" Warn ")).toBe("warn");
    expect(() => parseLogLevel("verbose")).toThrow('"verbose" is not a log level');
  });
});

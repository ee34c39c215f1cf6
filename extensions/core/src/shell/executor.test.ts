import { EventEmitter } from "node:events";
import { describe, it, expect, vi, beforeEach } from "vitest";
import { CommandFailedError, ConfigurationError } from "../errors.js";
import { captureLogs } from "../logging/index.js";
import { runCommand, SPAWN_FAILURE_EXIT_CODE } from "./executor.js";

const { mockSpawn } = vi.hoisted(() => ({ mockSpawn: vi.fn() }));

vi.mock("node:child_process", () => ({ spawn: mockSpawn }));

type Script = {
  stdout?: Array<string | Buffer>;
  stderr?: Array<string | Buffer>;
  exitCode?: number;
  error?: Error;
};

class FakeChild extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
}

function fakeProcess(script: Script): FakeChild {
  const child = new FakeChild();
  setImmediate(() => {
    if (script.error) {
      child.emit("error", script.error);
      child.emit("close", null, null);
      return;
    }
    for (const chunk of script.stdout ?? []) child.stdout.emit("data", Buffer.from(chunk));
    for (const chunk of script.stderr ?? []) child.stderr.emit("data", Buffer.from(chunk));
    child.emit("close", script.exitCode ?? 0, null);
  });
  return child;
}

describe("runCommand", () => {
  beforeEach(() => {
    mockSpawn.mockReset();
  });

  it("spawns argv without a shell and returns trimmed output", async () => {
    mockSpawn.mockImplementation(() => fakeProcess({ stdout: ["line one  \nline", " two\n\n"] }));
    const { logger } = captureLogs();

    const result = await runCommand(["helm", "version"], { logger });

    expect(mockSpawn).toHaveBeenCalledWith("helm", ["version"], { shell: false, cwd: undefined, env: undefined });
    expect(result).toEqual({ stdout: "line one\nline two", stderr: "", exitCode: 0 });
  });

  it("passes string commands to the shell", async () => {
    mockSpawn.mockImplementation(() => fakeProcess({ stdout: ["ok\n"] }));
    const { logger } = captureLogs();

    await runCommand("kubectl get secret a | kubectl apply -f -", { shell: true, logger });

    expect(mockSpawn).toHaveBeenCalledWith("kubectl get secret a | kubectl apply -f -", {
      shell: true,
      cwd: undefined,
      env: undefined,
    });
  });

  it("rejects a string command without shell mode", async () => {
    await expect(runCommand("ls -l")).rejects.toThrow(ConfigurationError);
    expect(mockSpawn).not.toHaveBeenCalled();
  });

  it("rejects an empty argv", async () => {
    const result = runCommand([]);
    expect(result).toBeInstanceOf(Promise);
    await expect(result).rejects.toThrow("Cannot run an empty command");
  });

  it("logs each stdout line in stream mode", async () => {
    mockSpawn.mockImplementation(() => fakeProcess({ stdout: ["pulling\n", "done\n"] }));
    const capture = captureLogs();

    const result = await runCommand(["docker", "pull", "x"], { stream: true, showInfo: true, logger: capture.logger });

    expect(result.stdout).toBe("pulling\ndone");
    expect(capture.messages("info")).toEqual(["pulling", "done"]);
  });

  it("logs streamed lines at debug unless showInfo is set", async () => {
    mockSpawn.mockImplementation(() => fakeProcess({ stdout: ["quiet\n"] }));
    const capture = captureLogs();

    await runCommand(["echo", "quiet"], { stream: true, logger: capture.logger });

    expect(capture.messages("info")).toEqual([]);
    expect(capture.messages("debug")).toContain("quiet");
  });

  it("returns identical text in both modes", async () => {
    const chunks = ["a  \n", "b\n", "c"];
    mockSpawn.mockImplementation(() => fakeProcess({ stdout: chunks }));
    const { logger } = captureLogs();

    const streamed = await runCommand(["x"], { stream: true, logger });
    const collected = await runCommand(["x"], { logger });

    expect(streamed.stdout).toBe("a\nb\nc");
    expect(collected.stdout).toBe(streamed.stdout);
  });

  it("drops undecodable lines with a warning", async () => {
    mockSpawn.mockImplementation(() =>
      fakeProcess({ stdout: [Buffer.from([0x67, 0x6f, 0x6f, 0x64, 0x0a, 0xc3, 0x28, 0x0a, 0x65, 0x6e, 0x64])] }),
    );
    const capture = captureLogs();

    const result = await runCommand(["cat", "bin"], { logger: capture.logger });

    expect(result.stdout).toBe("good\nend");
    expect(capture.messages("warn")).toEqual(["Dropped a stdout line that is not valid utf-8"]);
  });

  it("rejects with stderr embedded on a non-zero exit", async () => {
    mockSpawn.mockImplementation(() =>
      fakeProcess({ stdout: ["partial\n"], stderr: ["Error: release not found\n"], exitCode: 1 }),
    );
    const capture = captureLogs();

    const error = await runCommand(["helm", "status", "web"], { logger: capture.logger }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommandFailedError);
    expect(error).toMatchObject({
      exitCode: 1,
      stdout: "partial",
      stderr: "Error: release not found",
      message: 'Command "helm status web" exited with code 1: Error: release not found',
    });
    expect(capture.messages("warn")).toEqual(["partial"]);
    expect(capture.messages("error")).toEqual(["Error: release not found"]);
  });

  it("reports a spawn failure as exit code 127", async () => {
    mockSpawn.mockImplementation(() => fakeProcess({ error: new Error("spawn nope ENOENT") }));
    const { logger } = captureLogs();

    const error = await runCommand(["nope"], { logger }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommandFailedError);
    expect(error).toMatchObject({ exitCode: SPAWN_FAILURE_EXIT_CODE, stderr: "spawn nope ENOENT" });
  });
});

/**
 * Shell executor: runs an external program, decodes its output line by line
 * and fails with a CommandFailedError on a non-zero exit.
 */

import { spawn } from "node:child_process";
import { CommandFailedError, ConfigurationError } from "../errors.js";
import { getLogger, type CirrusLogger } from "../logging/index.js";
import { LineDecoder, decodeLines } from "./decoder.js";

/** Exit code reported when the program could not be started at all. */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/** An argv vector, or a single string interpreted by the shell. */
export type ShellCommand = readonly string[] | string;

export type RunCommandOptions = {
  /** Run through the system shell. Required for string commands. */
  shell?: boolean;
  /** Log stdout line by line while the program runs. */
  stream?: boolean;
  /** Streamed lines are logged at info instead of debug. */
  showInfo?: boolean;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: CirrusLogger;
};

export type ShellResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export function describeCommand(command: ShellCommand): string {
  return typeof command === "string" ? command : command.join(" ");
}

function startProcess(command: ShellCommand, options: RunCommandOptions) {
  const spawnOptions = { shell: options.shell ?? false, cwd: options.cwd, env: options.env };
  if (typeof command === "string") {
    if (!options.shell) throw new ConfigurationError("A command string can only run with shell mode on");
    return spawn(command, spawnOptions);
  }
  const [file, ...args] = command;
  if (file === undefined) throw new ConfigurationError("Cannot run an empty command");
  return spawn(file, args, spawnOptions);
}

/**
 * Run a command to completion.
 *
 * In stream mode each stdout line is logged as it arrives; otherwise output is
 * collected and decoded once the program exits. Both modes return the same
 * trimmed, newline-joined text. Lines that are not valid UTF-8 are dropped
 * with a warning.
 */
export function runCommand(command: ShellCommand, options: RunCommandOptions = {}): Promise<ShellResult> {
  const log = options.logger ?? getLogger("shell");
  const display = describeCommand(command);
  let child: ReturnType<typeof startProcess>;
  try {
    child = startProcess(command, options);
  } catch (error) {
    return Promise.reject(error);
  }
  log.debug({ command: display, stream: options.stream ?? false }, "Running command");

  const undecodable = (stream: "stdout" | "stderr") => (raw: Buffer) =>
    log.warn({ command: display, stream, bytes: raw.length }, `Dropped a ${stream} line that is not valid utf-8`);

  const stdoutLines: string[] = [];
  const stderrLines: string[] = [];
  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];

  const logLine = (line: string) => {
    if (options.showInfo) log.info(line);
    else log.debug(line);
  };
  const liveStdout = new LineDecoder((line) => {
    stdoutLines.push(line);
    logLine(line);
  }, undecodable("stdout"));

  child.stdout.on("data", (chunk: Buffer) => {
    if (options.stream) liveStdout.push(chunk);
    else stdoutChunks.push(chunk);
  });
  child.stderr.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

  return new Promise<ShellResult>((resolve, reject) => {
    let settled = false;

    child.once("error", (error) => {
      if (settled) return;
      settled = true;
      log.error({ command: display, err: error }, "Command could not be started");
      reject(new CommandFailedError(display, SPAWN_FAILURE_EXIT_CODE, "", error.message, { cause: error }));
    });

    child.once("close", (code, signal) => {
      if (settled) return;
      settled = true;

      if (options.stream) liveStdout.end();
      else stdoutLines.push(...decodeLines(Buffer.concat(stdoutChunks), undecodable("stdout")));
      stderrLines.push(...decodeLines(Buffer.concat(stderrChunks), undecodable("stderr")));

      const result: ShellResult = {
        stdout: stdoutLines.join("\n").trimEnd(),
        stderr: stderrLines.join("\n").trimEnd(),
        exitCode: code ?? 1,
      };
      if (result.exitCode === 0) {
        resolve(result);
        return;
      }
      if (result.stdout) log.warn({ command: display }, result.stdout);
      log.error({ command: display, exitCode: result.exitCode, signal }, result.stderr || "Command failed");
      reject(new CommandFailedError(display, result.exitCode, result.stdout, result.stderr));
    });
  });
}

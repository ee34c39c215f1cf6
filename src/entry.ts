import { CommanderError } from "commander";
import { formatErrorMessage } from "@cirrus/core";
import { buildProgram } from "./cli/program.js";
import { connect } from "./cli/session.js";

export async function runCli(argv: string[] = process.argv): Promise<number> {
  const program = buildProgram({
    connect: (options) => connect(options),
    print: (line) => process.stdout.write(`${line}\n`),
  });
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    process.stderr.write(`cirrus-vm: ${formatErrorMessage(error)}\n`);
    return 1;
  }
}

process.exitCode = await runCli();

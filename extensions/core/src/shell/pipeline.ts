import { ConfigurationError } from "../errors.js";

const SAFE_ARG = /^[A-Za-z0-9_\-.,:/@%+=]+$/;

/** POSIX single-quote an argument unless it is made only of safe characters. */
export function quoteShellArg(arg: string): string {
  if (SAFE_ARG.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Join argv stages into one shell command string connected by pipes.
 * Each argument is quoted, so stages never need hand-escaping.
 */
export function pipeline(stages: ReadonlyArray<readonly string[]>): string {
  if (stages.length === 0) throw new ConfigurationError("A pipeline needs at least one stage");
  return stages
    .map((stage) => {
      if (stage.length === 0) throw new ConfigurationError("A pipeline stage cannot be empty");
      return stage.map(quoteShellArg).join(" ");
    })
    .join(" | ");
}

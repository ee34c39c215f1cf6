export { LineDecoder, decodeLines, type LineSink, type UndecodableSink } from "./decoder.js";
export {
  SPAWN_FAILURE_EXIT_CODE,
  describeCommand,
  runCommand,
  type RunCommandOptions,
  type ShellCommand,
  type ShellResult,
} from "./executor.js";
export { pipeline, quoteShellArg } from "./pipeline.js";

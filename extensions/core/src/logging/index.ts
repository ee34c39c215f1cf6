export {
  captureLogs,
  configureLogging,
  createLogger,
  getLogger,
  isLogLevel,
  levelFromEnv,
  type CapturedLogEntry,
  type CirrusLogger,
  type LogCapture,
  type LoggingOptions,
  type LogLevel,
} from "./logger.js";

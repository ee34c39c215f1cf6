/**
 * Cirrus error taxonomy.
 *
 * Every failure raised by the Cirrus packages is a CirrusError carrying a
 * stable `code`, so callers can branch without matching on messages.
 */

export type CirrusErrorCode =
  | "CONFIGURATION"
  | "AUTHENTICATION"
  | "NAME_UNAVAILABLE"
  | "UNSUPPORTED_RESOURCE"
  | "COMMAND_FAILED"
  | "WAIT_TIMEOUT"
  | "WAIT_ABORTED"
  | "OPERATION_TIMEOUT"
  | "PROVISIONING";

export class CirrusError extends Error {
  readonly code: CirrusErrorCode;

  constructor(message: string, code: CirrusErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing or malformed input: required fields, credential files, profiles. */
export class ConfigurationError extends CirrusError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIGURATION", options);
  }
}

export class AuthenticationError extends CirrusError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "AUTHENTICATION", options);
  }
}

export class NameUnavailableError extends CirrusError {
  readonly resourceName: string;
  readonly reason?: string;

  constructor(resourceName: string, reason?: string) {
    super(
      reason
        ? `Name "${resourceName}" is not available: ${reason}`
        : `Name "${resourceName}" is not available`,
      "NAME_UNAVAILABLE",
    );
    this.resourceName = resourceName;
    this.reason = reason;
  }
}

export class UnsupportedResourceError extends CirrusError {
  readonly resourceType: string;

  constructor(resourceType: string) {
    super(`Resource type "${resourceType}" is not supported here`, "UNSUPPORTED_RESOURCE");
    this.resourceType = resourceType;
  }
}

export class CommandFailedError extends CirrusError {
  readonly command: string;
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stdout: string, stderr: string, options?: ErrorOptions) {
    const head = `Command "${command}" exited with code ${exitCode}`;
    super(stderr ? `${head}: ${stderr}` : head, "COMMAND_FAILED", options);
    this.command = command;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

export class WaitTimeoutError extends CirrusError {
  readonly elapsedMs: number;

  constructor(what: string, elapsedMs: number) {
    super(`Timed out after ${elapsedMs}ms waiting for ${what}`, "WAIT_TIMEOUT");
    this.elapsedMs = elapsedMs;
  }
}

export class WaitAbortedError extends CirrusError {
  constructor(what: string) {
    super(`Stopped waiting for ${what}`, "WAIT_ABORTED");
  }
}

export class OperationTimeoutError extends CirrusError {
  readonly timeoutMs: number;

  constructor(what: string, timeoutMs: number, options?: ErrorOptions) {
    super(`Operation on ${what} did not finish within ${timeoutMs}ms`, "OPERATION_TIMEOUT", options);
    this.timeoutMs = timeoutMs;
  }
}

/** A resource reached a terminal state other than success. */
export class ProvisioningError extends CirrusError {
  readonly state: string;

  constructor(what: string, state: string) {
    super(`${what} ended in provisioning state "${state}"`, "PROVISIONING");
    this.state = state;
  }
}

export function isCirrusError(error: unknown): error is CirrusError {
  return error instanceof CirrusError;
}

/**
 * One-line description of an unknown thrown value, including the HTTP status
 * and service code when the error carries them.
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const details: string[] = [];
    if ("statusCode" in error && typeof error.statusCode === "number") details.push(`status ${error.statusCode}`);
    if ("code" in error && typeof error.code === "string") details.push(error.code);
    return details.length > 0 ? `${error.message} (${details.join(", ")})` : error.message;
  }
  return String(error);
}

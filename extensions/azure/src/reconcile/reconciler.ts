/**
 * Reconciler
 *
 * Get-or-create for ARM resources: look the resource up, create it when the
 * lookup misses, then wait for the provider operation unless running in
 * async mode. Existing resources are returned untouched.
 */

import {
  ConfigurationError,
  NameUnavailableError,
  OperationTimeoutError,
  getLogger,
  type CirrusLogger,
} from "@cirrus/core";
import { isNotFoundError } from "./errors.js";
import {
  describeRef,
  type DesiredState,
  type EnsureOptions,
  type OperationHandle,
  type Reconciled,
  type ReconcileSpec,
  type RemoveOptions,
  type RemoveOutcome,
  type ResourceRef,
  type SettleOptions,
} from "./types.js";

export type ReconcilerOptions = {
  asyncMode?: boolean;
  /** Abort provider waits after this many milliseconds. */
  operationTimeoutMs?: number;
  logger?: CirrusLogger;
};

function isMissingValue(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === "string") return value.length === 0;
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

/** Handle for a provider call that completes synchronously, such as a plain DELETE. */
export const completedOperation: OperationHandle = {
  pollUntilDone: async () => undefined,
  isDone: () => true,
};

export class Reconciler {
  private asyncMode: boolean;
  private readonly operationTimeoutMs?: number;
  private readonly logger: CirrusLogger;

  constructor(options: ReconcilerOptions = {}) {
    this.asyncMode = options.asyncMode ?? false;
    this.operationTimeoutMs = options.operationTimeoutMs;
    this.logger = options.logger ?? getLogger("azure/reconcile");
  }

  setAsync(on: boolean): void {
    this.asyncMode = on;
  }

  isAsync(): boolean {
    return this.asyncMode;
  }

  async ensure<T, D extends DesiredState>(spec: ReconcileSpec<T, D>, options: EnsureOptions = {}): Promise<Reconciled<T>> {
    const { ref } = spec;
    const found = await this.tryLookup(spec.lookup);
    if (found.hit) {
      this.logger.debug({ resource: describeRef(ref) }, "Resource exists");
      return { state: "existing", ref, resource: found.value };
    }

    const desired = await spec.desired();
    for (const field of spec.required ?? []) {
      if (isMissingValue(desired[field])) {
        throw new ConfigurationError(`Cannot create ${describeRef(ref)}: "${field}" is required`);
      }
    }

    if (spec.precheck) {
      const availability = await spec.precheck();
      if (!availability.available) throw new NameUnavailableError(ref.name, availability.reason);
    }

    this.logger.info({ resource: describeRef(ref) }, `Creating ${ref.type} ${ref.name}`);
    const operation = await spec.create(desired);

    if (!this.shouldWait(options)) {
      this.logger.debug({ resource: describeRef(ref) }, "Not waiting for creation");
      return { state: "pending", ref, operation };
    }

    await this.waitForOperation(operation, ref);
    return { state: "created", ref, resource: await spec.lookup() };
  }

  /**
   * Wait for an upsert or delete that is not a get-or-create, following the
   * same async-mode rule. Returns whether the operation was waited for.
   */
  async settle(operation: OperationHandle, ref: ResourceRef, options: SettleOptions = {}): Promise<boolean> {
    if (!this.shouldWait(options)) return false;
    await this.waitForOperation(operation, ref);
    return true;
  }

  async remove(
    ref: ResourceRef,
    begin: () => Promise<OperationHandle>,
    options: RemoveOptions = {},
  ): Promise<RemoveOutcome> {
    this.logger.info({ resource: describeRef(ref) }, `Deleting ${ref.type} ${ref.name}`);
    try {
      const operation = await begin();
      return (await this.settle(operation, ref, options)) ? "deleted" : "pending";
    } catch (error) {
      if (options.tolerateMissing && isNotFoundError(error)) {
        this.logger.warn({ resource: describeRef(ref) }, `${ref.type} ${ref.name} does not exist, nothing to delete`);
        return "missing";
      }
      throw error;
    }
  }

  private shouldWait(options: EnsureOptions): boolean {
    if (options.forceWait) return true;
    return options.wait ?? !this.asyncMode;
  }

  private async tryLookup<T>(lookup: () => Promise<T>): Promise<{ hit: true; value: T } | { hit: false }> {
    try {
      return { hit: true, value: await lookup() };
    } catch (error) {
      if (isNotFoundError(error)) return { hit: false };
      throw error;
    }
  }

  private async waitForOperation(operation: OperationHandle, ref: ResourceRef): Promise<void> {
    const timeoutMs = this.operationTimeoutMs;
    if (timeoutMs === undefined) {
      await operation.pollUntilDone();
      return;
    }
    const abortSignal = AbortSignal.timeout(timeoutMs);
    try {
      await operation.pollUntilDone({ abortSignal });
    } catch (error) {
      if (abortSignal.aborted) throw new OperationTimeoutError(describeRef(ref), timeoutMs, { cause: error });
      throw error;
    }
  }
}

/** The resource of a reconciled result, for callers that waited for it. */
export function resourceOf<T>(result: Reconciled<T>): T {
  if (result.state === "pending") {
    throw new ConfigurationError(`${describeRef(result.ref)} is still being provisioned`);
  }
  return result.resource;
}

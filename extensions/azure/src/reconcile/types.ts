/**
 * Reconciler types.
 */

/** Identity of an ARM resource. `parent` names the owner of a child resource. */
export type ResourceRef = Readonly<{
  provider: string;
  type: string;
  resourceGroup: string;
  name: string;
  parent?: string;
}>;

/** Configuration values a create request is built from. */
export type DesiredState = Record<string, unknown>;

/**
 * In-flight provider operation. ARM long-running-operation pollers satisfy
 * this structurally.
 */
export interface OperationHandle<T = unknown> {
  pollUntilDone(options?: { abortSignal?: AbortSignal }): Promise<T>;
  isDone(): boolean;
}

export type NameAvailability = {
  available: boolean;
  reason?: string;
};

export type ReconcileSpec<T, D extends DesiredState> = {
  ref: ResourceRef;
  lookup: () => Promise<T>;
  /** Built only when the resource has to be created. */
  desired: () => D | Promise<D>;
  required?: ReadonlyArray<keyof D & string>;
  precheck?: () => Promise<NameAvailability>;
  create: (desired: D) => Promise<OperationHandle>;
};

export type EnsureOptions = {
  /** Overrides the reconciler's mode for this call. */
  wait?: boolean;
  /** Wait even in async mode, for resources later steps depend on. */
  forceWait?: boolean;
};

export type Reconciled<T> =
  | { state: "existing"; ref: ResourceRef; resource: T }
  | { state: "created"; ref: ResourceRef; resource: T }
  | { state: "pending"; ref: ResourceRef; operation: OperationHandle };

export type SettleOptions = {
  forceWait?: boolean;
};

export type RemoveOptions = SettleOptions & {
  tolerateMissing?: boolean;
};

export type RemoveOutcome = "deleted" | "pending" | "missing";

/** `subnets/web` under `virtualNetworks/app` renders as `Microsoft.Network/subnets app/web (rg)`. */
export function describeRef(ref: ResourceRef): string {
  const name = ref.parent ? `${ref.parent}/${ref.name}` : ref.name;
  return `${ref.provider}/${ref.type} ${name} (${ref.resourceGroup})`;
}

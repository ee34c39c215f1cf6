export { isNotFoundError } from "./errors.js";
export { Reconciler, completedOperation, resourceOf, type ReconcilerOptions } from "./reconciler.js";
export {
  describeRef,
  type DesiredState,
  type EnsureOptions,
  type NameAvailability,
  type OperationHandle,
  type Reconciled,
  type ReconcileSpec,
  type RemoveOptions,
  type RemoveOutcome,
  type ResourceRef,
  type SettleOptions,
} from "./types.js";

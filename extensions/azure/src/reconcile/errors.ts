import { isRestError } from "@azure/core-rest-pipeline";

const NOT_FOUND_CODES: ReadonlySet<string> = new Set([
  "ResourceNotFound",
  "ResourceGroupNotFound",
  "NotFound",
  "ParentResourceNotFound",
  "VaultNotFound",
  "SecretNotFound",
]);

/** A lookup miss: HTTP 404 or one of the ARM "not found" codes. */
export function isNotFoundError(error: unknown): boolean {
  if (isRestError(error)) {
    return error.statusCode === 404 || (error.code !== undefined && NOT_FOUND_CODES.has(error.code));
  }
  if (error instanceof Error && "statusCode" in error && error.statusCode === 404) return true;
  return error instanceof Error && "code" in error && typeof error.code === "string" && NOT_FOUND_CODES.has(error.code);
}

/**
 * Azure — Credentials Manager
 *
 * Service principal authentication from a JSON credential file, using
 * @azure/identity.
 */

import { readFile } from "node:fs/promises";
import { ClientSecretCredential, type TokenCredential } from "@azure/identity";
import { AuthenticationError } from "@cirrus/core";

// =============================================================================
// Types
// =============================================================================

export type ServicePrincipal = {
  tenantId: string;
  clientId: string;
  clientSecret: string;
  subscriptionId: string;
};

export type CredentialResolutionResult = {
  credential: TokenCredential;
  subscriptionId: string;
  tenantId: string;
};

/** Scope of tokens used to read the principal's object id. */
export const ARM_SCOPE = "https://management.azure.com/.default";

/** Environment variable naming the credential file. */
export const AUTH_LOCATION_ENV = "AZURE_AUTH_LOCATION";

// Primary key first; the second name is the one `az ad sp create-for-rbac` prints.
const FIELD_KEYS: ReadonlyArray<readonly [keyof ServicePrincipal, readonly string[]]> = [
  ["tenantId", ["tenantId", "tenant"]],
  ["clientId", ["clientId", "appId"]],
  ["clientSecret", ["clientSecret", "password"]],
  ["subscriptionId", ["subscriptionId"]],
];

// =============================================================================
// Credential file
// =============================================================================

function pick(record: Record<string, unknown>, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.length > 0) return value;
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse credential file contents. Accepts both `tenantId`/`clientId`/
 * `clientSecret` and `tenant`/`appId`/`password`; the first spelling wins when
 * both are present.
 */
export function parseCredentialFile(text: string, source = "credential file"): ServicePrincipal {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new AuthenticationError(`${source} is not valid JSON`, { cause: error });
  }
  if (!isRecord(parsed)) throw new AuthenticationError(`${source} must contain a JSON object`);

  const missing: string[] = [];
  const values: Partial<ServicePrincipal> = {};
  for (const [field, keys] of FIELD_KEYS) {
    const value = pick(parsed, keys);
    if (value === undefined) missing.push(keys.join("|"));
    else values[field] = value;
  }
  const { tenantId, clientId, clientSecret, subscriptionId } = values;
  if (!tenantId || !clientId || !clientSecret || !subscriptionId) {
    throw new AuthenticationError(`${source} is missing ${missing.join(", ")}`);
  }
  return { tenantId, clientId, clientSecret, subscriptionId };
}

export async function loadCredentialFile(path: string): Promise<ServicePrincipal> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new AuthenticationError(`Cannot read credential file ${path}`, { cause: error });
  }
  return parseCredentialFile(text, `Credential file ${path}`);
}

export function defaultCredentialPath(env: NodeJS.ProcessEnv = process.env): string {
  const path = env[AUTH_LOCATION_ENV];
  if (!path) throw new AuthenticationError(`No credential file given and ${AUTH_LOCATION_ENV} is not set`);
  return path;
}

/** Read the `oid` claim from a JWT access token. */
export function objectIdFromToken(token: string): string {
  const payload = token.split(".")[1];
  if (!payload) throw new AuthenticationError("Access token is not a JWT");
  let claims: unknown;
  try {
    claims = JSON.parse(Buffer.from(payload, "base64url").toString("utf8"));
  } catch (error) {
    throw new AuthenticationError("Access token payload is not valid JSON", { cause: error });
  }
  if (!isRecord(claims) || typeof claims.oid !== "string") {
    throw new AuthenticationError("Access token carries no oid claim");
  }
  return claims.oid;
}

// =============================================================================
// Credentials Manager
// =============================================================================

export class AzureCredentialsManager {
  private readonly principal: ServicePrincipal;
  private credential: TokenCredential | null = null;
  private objectId: string | null = null;

  constructor(principal: ServicePrincipal) {
    this.principal = principal;
  }

  static async fromFile(path: string = defaultCredentialPath()): Promise<AzureCredentialsManager> {
    return new AzureCredentialsManager(await loadCredentialFile(path));
  }

  async getCredential(): Promise<CredentialResolutionResult> {
    this.credential ??= new ClientSecretCredential(
      this.principal.tenantId,
      this.principal.clientId,
      this.principal.clientSecret,
    );
    return {
      credential: this.credential,
      subscriptionId: this.principal.subscriptionId,
      tenantId: this.principal.tenantId,
    };
  }

  getSubscriptionId(): string {
    return this.principal.subscriptionId;
  }

  getTenantId(): string {
    return this.principal.tenantId;
  }

  getClientId(): string {
    return this.principal.clientId;
  }

  /**
   * Directory object id of the service principal, used in key vault access
   * policies.
   */
  async getObjectId(): Promise<string> {
    if (this.objectId) return this.objectId;
    const { credential } = await this.getCredential();
    const token = await credential.getToken(ARM_SCOPE);
    if (!token) throw new AuthenticationError("Could not obtain an ARM access token");
    this.objectId = objectIdFromToken(token.token);
    return this.objectId;
  }

  clearCache(): void {
    this.credential = null;
    this.objectId = null;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCredentialsManager(principal: ServicePrincipal): AzureCredentialsManager {
  return new AzureCredentialsManager(principal);
}

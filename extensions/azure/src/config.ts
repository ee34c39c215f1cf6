/**
 * Cirrus configuration schema (TypeBox) and default config, plus the VM
 * deployment profile loader.
 */

import { readFile } from "node:fs/promises";
import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError } from "@cirrus/core";

// =============================================================================
// Runtime configuration
// =============================================================================

export const configSchema = Type.Object({
  asyncMode: Type.Optional(Type.Boolean({ description: "Return without waiting for provider operations" })),
  operationTimeoutMs: Type.Optional(
    Type.Number({ minimum: 1, description: "Abort a provider operation wait after this long" }),
  ),
  resourceGroupPollIntervalMs: Type.Optional(Type.Number({ minimum: 1 })),
  resourceGroupTimeoutMs: Type.Optional(Type.Number({ minimum: 1 })),
  keyVaultPollIntervalMs: Type.Optional(Type.Number({ minimum: 1 })),
  keyVaultReadyTimeoutMs: Type.Optional(Type.Number({ minimum: 1 })),
  servicePollIntervalMs: Type.Optional(Type.Number({ minimum: 1 })),
  serviceReadyTimeoutMs: Type.Optional(
    Type.Number({ minimum: 1, description: "How long to wait for a VM to answer ping and ssh" }),
  ),
});

export type CirrusConfig = Static<typeof configSchema>;

export type ResolvedCirrusConfig = Required<Omit<CirrusConfig, "operationTimeoutMs">> &
  Pick<CirrusConfig, "operationTimeoutMs">;

export function getDefaultConfig(): ResolvedCirrusConfig {
  return {
    asyncMode: false,
    resourceGroupPollIntervalMs: 500,
    resourceGroupTimeoutMs: 300_000,
    keyVaultPollIntervalMs: 2_000,
    keyVaultReadyTimeoutMs: 300_000,
    servicePollIntervalMs: 1_000,
    serviceReadyTimeoutMs: 900_000,
  };
}

export function resolveConfig(overrides: CirrusConfig = {}): ResolvedCirrusConfig {
  const checked = validate(configSchema, overrides, "configuration");
  return { ...getDefaultConfig(), ...stripUndefined(checked) };
}

function stripUndefined(config: CirrusConfig): CirrusConfig {
  const result: CirrusConfig = {};
  for (const [key, value] of Object.entries(config)) {
    if (value !== undefined) Object.assign(result, { [key]: value });
  }
  return result;
}

// =============================================================================
// Deployment profile
// =============================================================================

const imageReferenceSchema = Type.Object({
  publisher: Type.String({ minLength: 1 }),
  offer: Type.String({ minLength: 1 }),
  sku: Type.String({ minLength: 1 }),
  version: Type.String({ minLength: 1 }),
});

const planSchema = Type.Object({
  name: Type.String(),
  publisher: Type.String(),
  product: Type.String(),
});

export const deploymentProfileSchema = Type.Object({
  location: Type.Optional(Type.String()),
  nsg: Type.String({ minLength: 1 }),
  vnet: Type.String({ minLength: 1 }),
  vnetAddresses: Type.Array(Type.String(), { minItems: 1 }),
  subnet: Type.String({ minLength: 1 }),
  subnetAddress: Type.String({ minLength: 1 }),
  image: imageReferenceSchema,
  vmSizes: Type.Record(Type.String(), Type.String()),
  secrets: Type.Object({
    username: Type.String({ minLength: 1, description: "Key vault secret holding the admin user name" }),
    password: Type.String({ minLength: 1, description: "Key vault secret holding the admin password" }),
  }),
  keyVault: Type.String({ minLength: 1 }),
  plan: Type.Optional(planSchema),
});

export type ImageReference = Static<typeof imageReferenceSchema>;
export type MarketplacePlan = Static<typeof planSchema>;
export type DeploymentProfile = Static<typeof deploymentProfileSchema>;

export function parseDeploymentProfile(value: unknown, source = "deployment profile"): DeploymentProfile {
  return validate(deploymentProfileSchema, value, source);
}

export async function loadDeploymentProfile(path: string): Promise<DeploymentProfile> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read deployment profile ${path}`, { cause: error });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Deployment profile ${path} is not valid JSON`, { cause: error });
  }
  return parseDeploymentProfile(parsed, `Deployment profile ${path}`);
}

// =============================================================================
// Validation
// =============================================================================

function validate<S extends TSchema>(schema: S, value: unknown, source: string): Static<S> {
  if (Value.Check(schema, value)) return value;
  const first = Value.Errors(schema, value).First();
  const where = first?.path ? first.path : "/";
  throw new ConfigurationError(`Invalid ${source} at ${where}: ${first?.message ?? "does not match schema"}`);
}

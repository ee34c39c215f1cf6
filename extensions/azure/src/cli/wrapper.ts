/**
 * Azure CLI Wrapper
 *
 * Wraps the `az` CLI for the operations the SDK does not cover: writing
 * kubeconfig credentials and listing AKS versions.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import * as semver from "semver";
import { ConfigurationError, getLogger, runCommand, type CirrusLogger } from "@cirrus/core";

// =============================================================================
// Types
// =============================================================================

export type AzureCLIOptions = {
  /** Path to az CLI binary. */
  azPath?: string;
  logger?: CirrusLogger;
};

const previewFlag = Type.Optional(Type.Union([Type.Boolean(), Type.Null()]));

/** `az aks get-versions` output of older CLI releases. */
const orchestratorsSchema = Type.Object({
  orchestrators: Type.Array(Type.Object({ orchestratorVersion: Type.String(), isPreview: previewFlag })),
});

/** `az aks get-versions` output of current CLI releases: minors with their patches. */
const valuesSchema = Type.Object({
  values: Type.Array(
    Type.Object({
      version: Type.String(),
      isPreview: previewFlag,
      patchVersions: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
    }),
  ),
});

type VersionValues = Static<typeof valuesSchema>["values"];

// =============================================================================
// AKS versions
// =============================================================================

function patchesOf(values: VersionValues): string[] {
  return values
    .filter((entry) => !entry.isPreview)
    .flatMap((entry) => (entry.patchVersions ? Object.keys(entry.patchVersions) : [entry.version]));
}

/** Non-preview Kubernetes versions listed by `az aks get-versions -o json`. */
export function parseAksVersions(output: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch (error) {
    throw new ConfigurationError("az aks get-versions returned invalid JSON", { cause: error });
  }
  if (Value.Check(orchestratorsSchema, parsed)) {
    return parsed.orchestrators.filter((entry) => !entry.isPreview).map((entry) => entry.orchestratorVersion);
  }
  if (Value.Check(valuesSchema, parsed)) return patchesOf(parsed.values);
  throw new ConfigurationError("az aks get-versions returned an unrecognised document");
}

/** Highest version by semantic comparison; `1.9.0` sorts below `1.10.0`. */
export function latestVersion(versions: string[]): string | undefined {
  let best: { raw: string; parsed: semver.SemVer } | undefined;
  for (const raw of versions) {
    const parsed = semver.coerce(raw);
    if (parsed && (!best || semver.gt(parsed, best.parsed))) best = { raw, parsed };
  }
  return best?.raw;
}

// =============================================================================
// AzureCLIWrapper
// =============================================================================

export class AzureCLIWrapper {
  private readonly azPath: string;
  private readonly logger: CirrusLogger;

  constructor(options: AzureCLIOptions = {}) {
    this.azPath = options.azPath ?? "az";
    this.logger = options.logger ?? getLogger("azure/cli");
  }

  /** Run `az <args>` and return its stdout. */
  async execute(args: string[]): Promise<string> {
    const { stdout } = await runCommand([this.azPath, ...args], { logger: this.logger });
    return stdout;
  }

  /** Merge the cluster's credentials into the local kubeconfig. */
  async getAksCredentials(resourceGroup: string, cluster: string): Promise<void> {
    this.logger.info(`Logging kubectl in to AKS cluster ${cluster}`);
    await this.execute(["aks", "get-credentials", "--resource-group", resourceGroup, "--name", cluster, "--overwrite-existing"]);
  }

  async latestStableAksVersion(location: string): Promise<string> {
    const output = await this.execute(["aks", "get-versions", "-l", location, "-o", "json"]);
    const latest = latestVersion(parseAksVersions(output));
    if (!latest) throw new ConfigurationError(`No stable AKS version is available in ${location}`);
    return latest;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCLIWrapper(options?: AzureCLIOptions): AzureCLIWrapper {
  return new AzureCLIWrapper(options);
}

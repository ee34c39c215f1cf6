/**
 * Helm CLI wrapper: installs, upgrades and removes releases in one
 * namespace and registers the chart repositories they come from.
 */

import { CommandFailedError, getLogger, runCommand, type CirrusLogger } from "@cirrus/core";
import {
  INGRESS_NGINX_CHART,
  INGRESS_NGINX_REPO,
  type HelmClientOptions,
  type HelmInstallOptions,
  type HelmRepoOptions,
  type HelmUninstallOptions,
  type HelmValues,
  type IngressControllerOptions,
} from "./helm-types.js";

const DEFAULT_TIMEOUT = "900s";
const DEFAULT_UPDATE_RETRIES = 10;

// ---------------------------------------------------------------------------
// Repository registry
// ---------------------------------------------------------------------------

/**
 * Repository URLs already added through any client sharing this registry,
 * so each is added and updated once.
 */
export class HelmRepositoryRegistry {
  private readonly urls = new Set<string>();

  has(url: string): boolean {
    return this.urls.has(url);
  }

  add(url: string): void {
    this.urls.add(url);
  }

  list(): string[] {
    return [...this.urls];
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function setValueArgs(values: HelmValues): string[] {
  return Object.entries(values).flatMap(([key, value]) => ["--set", `${key}=${String(value)}`]);
}

export function ingressControllerName(release: string): string {
  return `${release}-ingress-nginx-controller`;
}

// ---------------------------------------------------------------------------
// HelmClient
// ---------------------------------------------------------------------------

export class HelmClient {
  readonly namespace: string;
  readonly repositories: HelmRepositoryRegistry;
  private readonly helmPath: string;
  private readonly logger: CirrusLogger;

  constructor(namespace: string, options: HelmClientOptions = {}) {
    this.namespace = namespace;
    this.repositories = options.repositories ?? new HelmRepositoryRegistry();
    this.helmPath = options.helmPath ?? "helm";
    this.logger = options.logger ?? getLogger("helm", { namespace });
  }

  private get namespaceArgs(): string[] {
    return ["--namespace", this.namespace];
  }

  private async run(args: string[]): Promise<string> {
    const { stdout } = await runCommand([this.helmPath, ...args], { stream: true, logger: this.logger });
    return stdout;
  }

  /**
   * Install `chart` as release `name`. With `reinstall` (the default) any
   * existing release is removed first; otherwise an existing release is
   * upgraded in place.
   */
  async install(name: string, chart: string, options: HelmInstallOptions = {}): Promise<string> {
    const reinstall = options.reinstall ?? true;
    if (reinstall) await this.uninstall(name, { tolerateError: true });

    const args = setValueArgs(options.values ?? {});
    if (options.atomic ?? true) args.push("--atomic");
    args.push(`--timeout=${options.timeout ?? DEFAULT_TIMEOUT}`, "--debug");

    const verb = !reinstall && (await this.exists(name)) ? "upgrade" : "install";
    this.logger.info({ release: name, chart }, `Running helm ${verb} ${name}`);
    return this.run([verb, name, chart, ...this.namespaceArgs, ...args, ...(options.extraArgs ?? [])]);
  }

  /** Returns false when the release could not be removed and errors are tolerated. */
  async uninstall(name: string, options: HelmUninstallOptions = {}): Promise<boolean> {
    try {
      await this.run(["uninstall", name, ...this.namespaceArgs]);
      return true;
    } catch (error) {
      if (options.tolerateError && error instanceof CommandFailedError) {
        this.logger.debug({ release: name }, "Nothing to uninstall");
        return false;
      }
      throw error;
    }
  }

  async exists(name: string): Promise<boolean> {
    try {
      // A missing release is an answer, not a failure worth logging.
      const quiet = this.logger.child({ release: name }, { level: "silent" });
      await runCommand([this.helmPath, "status", name, ...this.namespaceArgs], { logger: quiet });
      return true;
    } catch (error) {
      if (error instanceof CommandFailedError) return false;
      throw error;
    }
  }

  /**
   * Add a chart repository and refresh the index. Returns false when the URL
   * was already registered.
   */
  async addRepo(alias: string, url: string, options: HelmRepoOptions = {}): Promise<boolean> {
    if (this.repositories.has(url)) return false;
    await this.run(["repo", "add", alias, url]);
    this.repositories.add(url);

    const retries = options.updateRetries ?? DEFAULT_UPDATE_RETRIES;
    for (let attempt = 1; ; attempt++) {
      try {
        await this.run(["repo", "update"]);
        return true;
      } catch (error) {
        if (!(error instanceof CommandFailedError) || attempt >= retries) throw error;
        this.logger.error({ attempt, retries }, "Could not update Helm repositories");
      }
    }
  }

  /** Deploy the ingress-nginx controller on Linux nodes. */
  async deployIngressController(name: string, options: IngressControllerOptions = {}): Promise<string> {
    await this.addRepo(INGRESS_NGINX_REPO.alias, INGRESS_NGINX_REPO.url);
    const values: HelmValues = {
      "controller.replicaCount": options.replicas ?? 2,
      "controller.nodeSelector.kubernetes\\.io/os": "linux",
      "defaultBackend.nodeSelector.kubernetes\\.io/os": "linux",
      "controller.admissionWebhooks.enabled": "false",
    };
    return this.install(name, INGRESS_NGINX_CHART, {
      values,
      reinstall: true,
      atomic: true,
      extraArgs: options.controllerDefinition ? ["-f", options.controllerDefinition] : [],
    });
  }

  ingressControllerName(name: string): string {
    return ingressControllerName(name);
  }
}

export function createHelmClient(namespace: string, options?: HelmClientOptions): HelmClient {
  return new HelmClient(namespace, options);
}

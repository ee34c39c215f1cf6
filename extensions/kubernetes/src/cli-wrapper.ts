/**
 * kubectl CLI wrapper: namespace-scoped resource management through the
 * `kubectl` binary.
 */

import {
  CommandFailedError,
  ProvisioningError,
  getLogger,
  pipeline,
  runCommand,
  unwrapWait,
  waitFor,
  type CirrusLogger,
} from "@cirrus/core";
import {
  parseDeploymentList,
  parseJobList,
  parseSecretList,
  parseServiceList,
  type K8sDeployment,
  type K8sJob,
  type K8sSecret,
  type K8sService,
} from "./types.js";

/** Verbs that take no `--wait` flag. */
const NO_WAIT_VERBS: ReadonlySet<string> = new Set(["create", "get", "rollout", "label", "scale", "logs"]);

export interface KubeControlOptions {
  /** Add `--wait` to verbs that accept it. Defaults to true. */
  wait?: boolean;
  kubectlPath?: string;
  logger?: CirrusLogger;
  /** Poll interval for the wait helpers. Defaults to 1000. */
  pollIntervalMs?: number;
  /** Deadline for the wait helpers; unbounded when omitted. */
  waitTimeoutMs?: number;
}

export interface TolerantOptions {
  tolerateError?: boolean;
}

export interface DockerRegistryCredentials {
  server: string;
  username: string;
  password: string;
}

/* ---------- Job state ---------- */

/** True or false once the job finished, undefined while it runs. */
export function jobOutcome(job: K8sJob): boolean | undefined {
  const status = job.status;
  if (!status) return undefined;
  if (status.completionTime) return status.succeeded === 1;
  const failed = status.conditions?.some((condition) => condition.type === "Failed" && condition.status === "True");
  return failed ? false : undefined;
}

/* ---------- KubeControl ---------- */

export class KubeControl {
  readonly namespace: string;
  private readonly wait: boolean;
  private readonly kubectlPath: string;
  private readonly logger: CirrusLogger;
  private readonly pollIntervalMs: number;
  private readonly waitTimeoutMs?: number;

  constructor(namespace: string, options: KubeControlOptions = {}) {
    this.namespace = namespace;
    this.wait = options.wait ?? true;
    this.kubectlPath = options.kubectlPath ?? "kubectl";
    this.logger = options.logger ?? getLogger("kubectl", { namespace });
    this.pollIntervalMs = options.pollIntervalMs ?? 1_000;
    this.waitTimeoutMs = options.waitTimeoutMs;
  }

  /** The full argv `kubeCmd` runs for `args`. */
  commandFor(args: string[], namespaced = true): string[] {
    const namespaceArgs = namespaced ? ["--namespace", this.namespace] : [];
    const verb = args[0] ?? "";
    const waitArgs = this.wait && !NO_WAIT_VERBS.has(verb) ? ["--wait"] : [];
    return [this.kubectlPath, ...args, ...namespaceArgs, ...waitArgs];
  }

  /** Run kubectl and return its stdout. */
  async kubeCmd(args: string[], namespaced = true): Promise<string> {
    const { stdout } = await runCommand(this.commandFor(args, namespaced), { logger: this.logger });
    return stdout;
  }

  private async tolerant(args: string[], namespaced: boolean, message: string, options: TolerantOptions): Promise<boolean> {
    try {
      await this.kubeCmd(args, namespaced);
      return true;
    } catch (error) {
      if (!(error instanceof CommandFailedError)) throw error;
      this.logger.warn(message);
      if (!options.tolerateError) throw error;
      return false;
    }
  }

  async createNamespace(): Promise<void> {
    this.logger.info(`Creating namespace: ${this.namespace}`);
    try {
      await this.kubeCmd(["create", "namespace", this.namespace], false);
    } catch (error) {
      this.logger.warn("Could not create namespace");
      throw error;
    }
  }

  async deleteNamespace(options: TolerantOptions = {}): Promise<boolean> {
    this.logger.info(`Deleting namespace: ${this.namespace}`);
    return this.tolerant(["delete", "namespace", this.namespace], false, "Namespace did not exist, not deleted.", options);
  }

  async deleteResource(
    type: string,
    name: string,
    options: TolerantOptions & { namespaced?: boolean } = {},
  ): Promise<boolean> {
    return this.tolerant(["delete", type, name], options.namespaced ?? false, "Resource did not exist, not deleted.", options);
  }

  /** Delete whatever the manifest file or directory at `path` describes. */
  async deletePath(path: string, options: TolerantOptions = {}): Promise<boolean> {
    return this.tolerant(["delete", "-f", path], false, "Resource did not exist, not deleted.", options);
  }

  async label(type: string, name: string, labels: Record<string, string>, options: { namespaced?: boolean } = {}): Promise<void> {
    for (const [key, value] of Object.entries(labels)) {
      await this.kubeCmd(["label", `${type}/${name}`, `${key}=${value}`], options.namespaced ?? false);
    }
  }

  async createSecretFromLiterals(name: string, literals: Record<string, string>): Promise<void> {
    const args = Object.entries(literals).map(([key, value]) => `--from-literal=${key}=${value}`);
    await this.kubeCmd(["create", "secret", "generic", name, ...args]);
  }

  async createSecretFromFile(name: string, path: string): Promise<void> {
    await this.kubeCmd(["create", "secret", "generic", name, "--from-file", path]);
  }

  async createTlsSecret(name: string, keyPath: string, certificatePath: string): Promise<string> {
    return this.kubeCmd(["create", "secret", "tls", name, "--key", keyPath, "--cert", certificatePath]);
  }

  async createDockerSecret(name: string, credentials: DockerRegistryCredentials): Promise<void> {
    await this.kubeCmd([
      "create",
      "secret",
      "docker-registry",
      name,
      "--docker-server",
      credentials.server,
      "--docker-username",
      credentials.username,
      "--docker-password",
      credentials.password,
    ]);
  }

  /** Shell pipeline that re-applies secret `name` from `fromNamespace` into this namespace. */
  copySecretCommand(name: string, fromNamespace: string): string {
    const to = this.namespace;
    return pipeline([
      [this.kubectlPath, "get", "secret", name, `--namespace=${fromNamespace}`, "-oyaml"],
      ["sed", "-e", `s@namespaces/${fromNamespace}@namespaces/${to}@`],
      ["sed", "-e", `s@namespace: ${fromNamespace}@namespace: "${to}"@`],
      [this.kubectlPath, "apply", `--namespace=${to}`, "-f", "-"],
    ]);
  }

  async copySecret(name: string, fromNamespace: string): Promise<void> {
    await runCommand(this.copySecretCommand(name, fromNamespace), { shell: true, logger: this.logger });
  }

  async getSecrets(): Promise<K8sSecret[]> {
    return parseSecretList(await this.kubeCmd(["get", "secrets", "-o", "json"]));
  }

  async getServices(): Promise<K8sService[]> {
    return parseServiceList(await this.kubeCmd(["get", "svc", "-o", "json"]));
  }

  async getDeployments(): Promise<K8sDeployment[]> {
    return parseDeploymentList(await this.kubeCmd(["get", "deployments.apps", "-o", "json"]));
  }

  async getJobs(): Promise<K8sJob[]> {
    return parseJobList(await this.kubeCmd(["get", "jobs.batch", "-o", "json"]));
  }

  /** Poll the services until `name` has a load balancer ingress and return its IPs. */
  async waitForIngressPublicIps(name: string, signal?: AbortSignal): Promise<string[]> {
    const outcome = await waitFor(
      async () => {
        const service = (await this.getServices()).find((svc) => svc.metadata.name === name);
        const ingress = service?.status?.loadBalancer?.ingress;
        if (!ingress || ingress.length === 0) return undefined;
        const ips = ingress.flatMap((entry) => (entry.ip ? [entry.ip] : []));
        if (ips.length === 0) throw new ProvisioningError(`Load balancer of service ${name}`, "no public IP");
        return ips;
      },
      { intervalMs: this.pollIntervalMs, timeoutMs: this.waitTimeoutMs, signal },
    );
    return unwrapWait(outcome, `a public IP on service ${name}`);
  }

  /** Poll until job `name` finishes; true when it succeeded. */
  async waitForJobToFinish(name: string, signal?: AbortSignal): Promise<boolean> {
    const outcome = await waitFor(
      async () => {
        const job = (await this.getJobs()).find((candidate) => candidate.metadata.name === name);
        return job ? jobOutcome(job) : undefined;
      },
      { intervalMs: this.pollIntervalMs, timeoutMs: this.waitTimeoutMs, signal },
    );
    return unwrapWait(outcome, `job ${name} to finish`);
  }

  async apply(path: string, namespaced = true): Promise<string> {
    return this.kubeCmd(["apply", "-f", path], namespaced);
  }

  async uploadFileAsConfigMap(name: string, path: string): Promise<void> {
    await this.kubeCmd(["create", "configmap", name, "--from-file", path]);
  }

  /** Pod logs, optionally limited to a relative window such as "15m". */
  async getLogs(pod: string, since?: string): Promise<string> {
    return this.kubeCmd(["logs", pod, ...(since ? [`--since=${since}`] : [])]);
  }
}

export function createKubeControl(namespace: string, options?: KubeControlOptions): KubeControl {
  return new KubeControl(namespace, options);
}

/**
 * kubectl CLI wrapper — Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { CommandFailedError, ProvisioningError, WaitTimeoutError, captureLogs } from "@cirrus/core";

const { mockRun } = vi.hoisted(() => ({ mockRun: vi.fn() }));

vi.mock("@cirrus/core", async (importOriginal) => ({
  ...(await importOriginal<typeof import("@cirrus/core")>()),
  runCommand: mockRun,
}));

import { KubeControl, jobOutcome } from "./cli-wrapper.js";

/* ---------- helpers ---------- */

function stdout(text: string) {
  return { stdout: text, stderr: "", exitCode: 0 };
}

function list(items: unknown[]): string {
  return JSON.stringify({ items });
}

function argvs(): unknown[] {
  return mockRun.mock.calls.map((call) => call[0]);
}

const notFound = () => new CommandFailedError("kubectl delete", 1, "", "NotFound");

/* ---------- tests ---------- */

describe("KubeControl", () => {
  let kubectl: KubeControl;
  let logs: ReturnType<typeof captureLogs>;

  beforeEach(() => {
    mockRun.mockReset();
    mockRun.mockResolvedValue(stdout(""));
    logs = captureLogs("kubectl");
    kubectl = new KubeControl("apps", { logger: logs.logger, pollIntervalMs: 1, waitTimeoutMs: 50 });
  });

  describe("commandFor", () => {
    it("adds the namespace and --wait", () => {
      expect(kubectl.commandFor(["apply", "-f", "app.yaml"])).toEqual([
        "kubectl",
        "apply",
        "-f",
        "app.yaml",
        "--namespace",
        "apps",
        "--wait",
      ]);
    });

    it("leaves --wait off verbs that do not take it", () => {
      expect(kubectl.commandFor(["get", "pods"])).toEqual(["kubectl", "get", "pods", "--namespace", "apps"]);
      expect(kubectl.commandFor(["logs", "web-0"], false)).toEqual(["kubectl", "logs", "web-0"]);
    });

    it("never waits when disabled", () => {
      const noWait = new KubeControl("apps", { wait: false, kubectlPath: "/usr/bin/kubectl", logger: logs.logger });
      expect(noWait.commandFor(["delete", "pod", "web-0"])).toEqual([
        "/usr/bin/kubectl",
        "delete",
        "pod",
        "web-0",
        "--namespace",
        "apps",
      ]);
    });
  });

  it("returns kubectl's stdout", async () => {
    mockRun.mockResolvedValue(stdout("deployment.apps/web configured\n"));

    await expect(kubectl.apply("app.yaml")).resolves.toBe("deployment.apps/web configured\n");
  });

  describe("namespaces", () => {
    it("creates the namespace cluster-wide", async () => {
      await kubectl.createNamespace();
      expect(argvs()).toEqual([["kubectl", "create", "namespace", "apps"]]);
    });

    it("warns and rethrows when creation fails", async () => {
      const failure = new CommandFailedError("kubectl create namespace apps", 1, "", "AlreadyExists");
      mockRun.mockRejectedValue(failure);

      await expect(kubectl.createNamespace()).rejects.toBe(failure);
      expect(logs.messages("warn")).toEqual(["Could not create namespace"]);
    });

    it("tolerates deleting a missing namespace on request", async () => {
      mockRun.mockRejectedValue(notFound());

      await expect(kubectl.deleteNamespace({ tolerateError: true })).resolves.toBe(false);
      expect(argvs()).toEqual([["kubectl", "delete", "namespace", "apps", "--wait"]]);
      expect(logs.messages("warn")).toEqual(["Namespace did not exist, not deleted."]);
    });

    it("rethrows a failed delete by default", async () => {
      mockRun.mockRejectedValue(notFound());

      await expect(kubectl.deleteNamespace()).rejects.toBeInstanceOf(CommandFailedError);
    });
  });

  it("deletes resources and manifest paths", async () => {
    await kubectl.deleteResource("clusterrole", "reader");
    await kubectl.deleteResource("configmap", "settings", { namespaced: true });
    await kubectl.deletePath("manifests/");

    expect(argvs()).toEqual([
      ["kubectl", "delete", "clusterrole", "reader", "--wait"],
      ["kubectl", "delete", "configmap", "settings", "--namespace", "apps", "--wait"],
      ["kubectl", "delete", "-f", "manifests/", "--wait"],
    ]);
  });

  it("labels one key at a time", async () => {
    await kubectl.label("node", "pool-1", { role: "gpu", tier: "batch" });

    expect(argvs()).toEqual([
      ["kubectl", "label", "node/pool-1", "role=gpu"],
      ["kubectl", "label", "node/pool-1", "tier=batch"],
    ]);
  });

  describe("secrets", () => {
    it("creates generic secrets from literals and files", async () => {
      await kubectl.createSecretFromLiterals("db", { user: "app", password: "test-secret" });
      await kubectl.createSecretFromFile("config", "settings.json");

      expect(argvs()).toEqual([
        [
          "kubectl",
          "create",
          "secret",
          "generic",
          "db",
          "--from-literal=user=app",
          "--from-literal=password=test-secret",
          "--namespace",
          "apps",
        ],
        ["kubectl", "create", "secret", "generic", "config", "--from-file", "settings.json", "--namespace", "apps"],
      ]);
    });

    it("creates TLS and registry secrets", async () => {
      await kubectl.createTlsSecret("tls", "tls.key", "tls.crt");
      await kubectl.createDockerSecret("pull", { server: "registry.example.test", username: "ci", password: "test-secret" });

      expect(argvs()).toEqual([
        ["kubectl", "create", "secret", "tls", "tls", "--key", "tls.key", "--cert", "tls.crt", "--namespace", "apps"],
        [
          "kubectl",
          "create",
          "secret",
          "docker-registry",
          "pull",
          "--docker-server",
          "registry.example.test",
          "--docker-username",
          "ci",
          "--docker-password",
          "test-secret",
          "--namespace",
          "apps",
        ],
      ]);
    });

    it("copies a secret between namespaces through a shell pipeline", async () => {
      await kubectl.copySecret("tls", "ingress");

      expect(mockRun).toHaveBeenCalledWith(
        "kubectl get secret tls --namespace=ingress -oyaml" +
          " | sed -e s@namespaces/ingress@namespaces/apps@" +
          " | sed -e 's@namespace: ingress@namespace: \"apps\"@'" +
          " | kubectl apply --namespace=apps -f -",
        expect.objectContaining({ shell: true }),
      );
    });

    it("parses the secret list", async () => {
      mockRun.mockResolvedValue(stdout(list([{ metadata: { name: "db" }, type: "Opaque", data: { user: "YXBw" } }])));

      const secrets = await kubectl.getSecrets();

      expect(secrets.map((secret) => secret.metadata.name)).toEqual(["db"]);
      expect(argvs()).toEqual([["kubectl", "get", "secrets", "-o", "json", "--namespace", "apps"]]);
    });
  });

  it("reads deployments and jobs through their API groups", async () => {
    mockRun.mockResolvedValue(stdout(list([])));

    await kubectl.getDeployments();
    await kubectl.getJobs();

    expect(argvs()).toEqual([
      ["kubectl", "get", "deployments.apps", "-o", "json", "--namespace", "apps"],
      ["kubectl", "get", "jobs.batch", "-o", "json", "--namespace", "apps"],
    ]);
  });

  describe("waitForIngressPublicIps", () => {
    it("polls until the load balancer has an address", async () => {
      mockRun
        .mockResolvedValueOnce(stdout(list([{ metadata: { name: "edge" }, status: { loadBalancer: {} } }])))
        .mockResolvedValueOnce(
          stdout(list([{ metadata: { name: "edge" }, status: { loadBalancer: { ingress: [{ ip: "20.0.0.1" }] } } }])),
        );

      await expect(kubectl.waitForIngressPublicIps("edge")).resolves.toEqual(["20.0.0.1"]);
      expect(mockRun).toHaveBeenCalledTimes(2);
    });

    it("fails when the ingress carries no IP", async () => {
      mockRun.mockResolvedValue(
        stdout(list([{ metadata: { name: "edge" }, status: { loadBalancer: { ingress: [{ hostname: "edge.example.test" }] } } }])),
      );

      await expect(kubectl.waitForIngressPublicIps("edge")).rejects.toBeInstanceOf(ProvisioningError);
    });

    it("times out when the service never appears", async () => {
      mockRun.mockResolvedValue(stdout(list([])));

      await expect(kubectl.waitForIngressPublicIps("edge")).rejects.toBeInstanceOf(WaitTimeoutError);
    });
  });

  describe("waitForJobToFinish", () => {
    it("reports success once the job completes", async () => {
      mockRun
        .mockResolvedValueOnce(stdout(list([{ metadata: { name: "migrate" }, status: { active: 1 } }])))
        .mockResolvedValueOnce(
          stdout(list([{ metadata: { name: "migrate" }, status: { succeeded: 1, completionTime: "2026-01-01T00:00:00Z" } }])),
        );

      await expect(kubectl.waitForJobToFinish("migrate")).resolves.toBe(true);
    });

    it("reports failure from the Failed condition", async () => {
      mockRun.mockResolvedValue(
        stdout(list([{ metadata: { name: "migrate" }, status: { failed: 6, conditions: [{ type: "Failed", status: "True" }] } }])),
      );

      await expect(kubectl.waitForJobToFinish("migrate")).resolves.toBe(false);
    });
  });

  it("uploads config maps and reads logs", async () => {
    await kubectl.uploadFileAsConfigMap("settings", "settings.json");
    await kubectl.getLogs("web-0", "15m");
    await kubectl.getLogs("web-0");

    expect(argvs()).toEqual([
      ["kubectl", "create", "configmap", "settings", "--from-file", "settings.json", "--namespace", "apps"],
      ["kubectl", "logs", "web-0", "--since=15m", "--namespace", "apps"],
      ["kubectl", "logs", "web-0", "--namespace", "apps"],
    ]);
  });
});

describe("jobOutcome", () => {
  it("is pending without status", () => {
    expect(jobOutcome({ metadata: { name: "j" } })).toBeUndefined();
  });

  it("counts a completed job without a success as failed", () => {
    expect(jobOutcome({ metadata: { name: "j" }, status: { completionTime: "2026-01-01T00:00:00Z", succeeded: 0 } })).toBe(false);
  });
});

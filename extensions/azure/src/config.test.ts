import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect } from "vitest";
import { ConfigurationError } from "@cirrus/core";
import { getDefaultConfig, loadDeploymentProfile, parseDeploymentProfile, resolveConfig } from "./config.js";

const profile = {
  nsg: "dev-nsg",
  vnet: "dev-vnet",
  vnetAddresses: ["10.10.0.0/16"],
  subnet: "dev-subnet",
  subnetAddress: "10.10.1.0/24",
  image: { publisher: "Canonical", offer: "0001-com-ubuntu-server-jammy", sku: "22_04-lts-gen2", version: "latest" },
  vmSizes: { small: "Standard_B2s", gpu: "Standard_NC6s_v3" },
  secrets: { username: "vm-user", password: "vm-password" },
  keyVault: "dev-kv",
};

describe("resolveConfig", () => {
  it("fills defaults", () => {
    expect(resolveConfig()).toEqual(getDefaultConfig());
    expect(getDefaultConfig().resourceGroupPollIntervalMs).toBe(500);
  });

  it("applies overrides and ignores undefined values", () => {
    const config = resolveConfig({ asyncMode: true, serviceReadyTimeoutMs: undefined, operationTimeoutMs: 60_000 });
    expect(config.asyncMode).toBe(true);
    expect(config.serviceReadyTimeoutMs).toBe(900_000);
    expect(config.operationTimeoutMs).toBe(60_000);
  });

  it("rejects values outside the schema", () => {
    expect(() => resolveConfig({ resourceGroupTimeoutMs: 0 })).toThrow(ConfigurationError);
    expect(() => resolveConfig({ resourceGroupTimeoutMs: 0 })).toThrow("Invalid configuration at /resourceGroupTimeoutMs");
  });
});

describe("deployment profile", () => {
  it("accepts a complete profile", () => {
    expect(parseDeploymentProfile(profile)).toEqual(profile);
  });

  it("reports the first failing path", () => {
    const { secrets: _secrets, ...incomplete } = profile;
    expect(() => parseDeploymentProfile(incomplete)).toThrow("Invalid deployment profile at /secrets");
  });

  it("loads a profile file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "cirrus-profile-"));
    const path = join(dir, "profile.json");
    await writeFile(path, JSON.stringify({ ...profile, plan: { name: "p", publisher: "q", product: "r" } }));

    const loaded = await loadDeploymentProfile(path);

    expect(loaded.plan).toEqual({ name: "p", publisher: "q", product: "r" });
    expect(loaded.vmSizes.small).toBe("Standard_B2s");
  });

  it("wraps unreadable and malformed files", async () => {
    const dir = await mkdtemp(join(tmpdir(), "cirrus-profile-"));
    const path = join(dir, "broken.json");
    await writeFile(path, "{");

    await expect(loadDeploymentProfile(path)).rejects.toThrow(`Deployment profile ${path} is not valid JSON`);
    await expect(loadDeploymentProfile(join(dir, "absent.json"))).rejects.toThrow(ConfigurationError);
  });
});

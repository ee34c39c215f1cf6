/**
 * Azure Key Vault — Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { NameUnavailableError } from "@cirrus/core";
import { fakePoller, fakeScope, notFound, paged } from "../testing/fakes.js";
import { AzureKeyVault } from "./manager.js";

const { secretClient } = vi.hoisted(() => ({
  secretClient: {
    getSecret: vi.fn(),
    setSecret: vi.fn(),
    beginDeleteSecret: vi.fn(),
    purgeDeletedSecret: vi.fn(),
  },
}));

vi.mock("@azure/keyvault-secrets", () => ({
  SecretClient: vi.fn().mockImplementation(function () {
    return secretClient;
  }),
}));

const armVault = {
  id: "/subscriptions/sub-1/resourceGroups/rg1/providers/Microsoft.KeyVault/vaults/kv1",
  name: "kv1",
  location: "westeurope",
  properties: {
    tenantId: "tenant-1",
    sku: { family: "A", name: "standard" },
    vaultUri: "https://kv1.vault.azure.net/",
    enableSoftDelete: true,
    accessPolicies: [{ tenantId: "tenant-1", objectId: "object-1", permissions: { secrets: ["all"] } }],
  },
};

describe("AzureKeyVault", () => {
  const vaults = {
    get: vi.fn(),
    listDeleted: vi.fn(),
    checkNameAvailability: vi.fn(),
    beginCreateOrUpdate: vi.fn(),
    delete: vi.fn(),
    beginPurgeDeleted: vi.fn(),
  };
  let scope = fakeScope({ keyvault: { vaults } });
  let vault: AzureKeyVault;

  beforeEach(() => {
    vi.clearAllMocks();
    for (const fn of Object.values(vaults)) fn.mockReset();
    scope = fakeScope({ keyvault: { vaults } });
    vault = new AzureKeyVault("kv1", scope);
    vaults.listDeleted.mockReturnValue(paged([]));
    vaults.checkNameAvailability.mockResolvedValue({ nameAvailable: true });
    secretClient.setSecret.mockResolvedValue({ name: "test", value: "x", properties: { id: "https://kv1/secrets/test" } });
    secretClient.beginDeleteSecret.mockResolvedValue(fakePoller());
    secretClient.purgeDeletedSecret.mockResolvedValue(undefined);
  });

  it("derives the data plane URI from the name", () => {
    expect(vault.uri).toBe("https://kv1.vault.azure.net");
  });

  describe("exists", () => {
    it("is false for a missing vault", async () => {
      vaults.get.mockRejectedValue(notFound());
      expect(await vault.exists()).toBe(false);
    });

    it("is true for a vault in the resource group", async () => {
      vaults.get.mockResolvedValue(armVault);
      expect(await vault.exists()).toBe(true);
      expect(vaults.get).toHaveBeenCalledWith("rg1", "kv1");
    });
  });

  describe("checkNameAvailable", () => {
    it("rejects a name held by a soft-deleted vault", async () => {
      vaults.listDeleted.mockReturnValue(paged([{ name: "other" }, { name: "kv1" }]));
      expect(await vault.checkNameAvailable()).toBe(false);
      expect(vaults.checkNameAvailability).not.toHaveBeenCalled();
    });

    it("asks ARM otherwise", async () => {
      vaults.checkNameAvailability.mockResolvedValue({ nameAvailable: false, reason: "AlreadyExists" });
      expect(await vault.checkNameAvailable()).toBe(false);
      expect(vaults.checkNameAvailability).toHaveBeenCalledWith({ name: "kv1", type: "Microsoft.KeyVault/vaults" });
    });
  });

  describe("create", () => {
    it("fails before creation when a deleted vault holds the name", async () => {
      vaults.get.mockRejectedValue(notFound());
      vaults.listDeleted.mockReturnValue(paged([{ name: "kv1" }]));

      const error = await vault.create().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(NameUnavailableError);
      expect(error).toHaveProperty("message", 'Name "kv1" is not available: taken by a soft-deleted key vault');
      expect(vaults.beginCreateOrUpdate).not.toHaveBeenCalled();
    });

    it("creates the vault and waits for a secret round trip", async () => {
      vaults.get.mockRejectedValueOnce(notFound()).mockResolvedValue(armVault);
      vaults.beginCreateOrUpdate.mockResolvedValue(fakePoller(armVault));
      secretClient.setSecret
        .mockRejectedValueOnce(new Error("connection refused"))
        .mockResolvedValue({ name: "test", value: "x", properties: {} });

      const result = await vault.create({ softDelete: false, subnetIds: ["/subnet/a"] });

      expect(result.state).toBe("created");
      expect(vaults.beginCreateOrUpdate).toHaveBeenCalledWith("rg1", "kv1", {
        location: "westeurope",
        properties: {
          sku: { family: "A", name: "standard" },
          tenantId: "tenant-1",
          enableSoftDelete: false,
          accessPolicies: [
            { tenantId: "tenant-1", objectId: "object-1", permissions: { keys: ["all"], secrets: ["all", "purge"] } },
          ],
          networkAcls: { defaultAction: "Deny", ipRules: [], virtualNetworkRules: [{ id: "/subnet/a" }] },
        },
      });
      expect(secretClient.setSecret).toHaveBeenCalledTimes(2);
      expect(secretClient.beginDeleteSecret).toHaveBeenCalledWith("test");
      expect(secretClient.purgeDeletedSecret).toHaveBeenCalledWith("test");
      expect(scope.logs.messages("warn")).toEqual([
        "Waiting for key vault to come up. Please check connection to the VNET.",
      ]);
    });

    it("leaves an existing vault alone", async () => {
      vaults.get.mockResolvedValue(armVault);
      const result = await vault.create();
      expect(result.state).toBe("existing");
      expect(vaults.listDeleted).not.toHaveBeenCalled();
      expect(secretClient.setSecret).not.toHaveBeenCalled();
    });
  });

  describe("grantAccess", () => {
    it("does nothing when the principal's tenant already has a policy", async () => {
      vaults.get.mockResolvedValue(structuredClone(armVault));
      expect(await vault.grantAccess()).toBe(false);
      expect(vaults.beginCreateOrUpdate).not.toHaveBeenCalled();
    });

    it("adds network rules for subnets", async () => {
      vaults.get.mockResolvedValue(structuredClone(armVault));
      vaults.beginCreateOrUpdate.mockResolvedValue(fakePoller());
      expect(await vault.grantAccess(["/subnet/a"])).toBe(true);
      const [, , params] = vaults.beginCreateOrUpdate.mock.calls[0] ?? [];
      expect(params.location).toBe("westeurope");
      expect(params.properties.networkAcls.virtualNetworkRules).toEqual([{ id: "/subnet/a" }]);
      expect(params.properties.accessPolicies).toHaveLength(1);
    });

    it("adds a policy for a new tenant", async () => {
      const foreign = structuredClone(armVault);
      foreign.properties.tenantId = "tenant-2";
      foreign.properties.accessPolicies = [{ tenantId: "tenant-2", objectId: "object-2", permissions: { secrets: ["all"] } }];
      vaults.get.mockResolvedValue(foreign);
      vaults.beginCreateOrUpdate.mockResolvedValue(fakePoller());

      expect(await vault.grantAccess()).toBe(true);
      const [, , params] = vaults.beginCreateOrUpdate.mock.calls[0] ?? [];
      expect(params.properties.tenantId).toBe("tenant-1");
      expect(params.properties.accessPolicies[1]).toEqual({
        tenantId: "tenant-1",
        objectId: "object-1",
        permissions: { secrets: ["all"] },
      });
    });
  });

  describe("secrets", () => {
    it("reads a secret value", async () => {
      secretClient.getSecret.mockResolvedValue({ name: "vm-password", value: "test-secret", properties: {} });
      expect(await vault.getSecret("vm-password")).toBe("test-secret");
    });

    it("logs and rethrows a failed read", async () => {
      secretClient.getSecret.mockRejectedValue(notFound("SecretNotFound"));
      await expect(vault.getSecret("missing")).rejects.toThrow("SecretNotFound");
      expect(scope.logs.messages("error")).toEqual(["Could not get secret: missing"]);
    });

    it("soft-deletes without purging when asked", async () => {
      await vault.deleteSecret("old", false);
      expect(secretClient.beginDeleteSecret).toHaveBeenCalledWith("old");
      expect(secretClient.purgeDeletedSecret).not.toHaveBeenCalled();
    });
  });

  describe("delete", () => {
    it("deletes and purges the vault", async () => {
      vaults.get.mockResolvedValue(armVault);
      vaults.delete.mockResolvedValue(undefined);
      vaults.beginPurgeDeleted.mockResolvedValue(fakePoller());

      expect(await vault.delete()).toBe("deleted");
      expect(vaults.delete).toHaveBeenCalledWith("rg1", "kv1");
      expect(vaults.beginPurgeDeleted).toHaveBeenCalledWith("kv1", "westeurope");
    });

    it("tolerates a missing vault by default", async () => {
      vaults.get.mockRejectedValue(notFound("VaultNotFound"));
      expect(await vault.delete()).toBe("missing");
      expect(vaults.beginPurgeDeleted).not.toHaveBeenCalled();
    });

    it("fails on a missing vault when asked to", async () => {
      vaults.get.mockRejectedValue(notFound("VaultNotFound"));
      await expect(vault.delete({ tolerateMissing: false })).rejects.toThrow("VaultNotFound");
    });
  });
});

/**
 * Azure Key Vault — Type Definitions
 */

export type KeyVault = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  vaultUri: string;
  tenantId?: string;
  enableSoftDelete?: boolean;
  /** Object ids holding an access policy on the vault. */
  accessPolicyObjectIds: string[];
  /** "Deny" once network ACLs restrict the vault to subnets. */
  networkDefaultAction?: string;
  provisioningState?: string;
};

export type KeyVaultCreateOptions = {
  /** Defaults to true. */
  softDelete?: boolean;
  /** Restrict access to these subnets. */
  subnetIds?: string[];
};

export type KeyVaultDeleteOptions = {
  /** Purge the soft-deleted vault. Defaults to true. */
  purge?: boolean;
  /** Defaults to true. */
  tolerateMissing?: boolean;
};

/** Secret written and removed to tell whether the data plane is reachable. */
export const READINESS_SECRET = "test";

/**
 * Azure Storage — Type Definitions
 */

export type StorageAccount = {
  id: string;
  name: string;
  location: string;
  kind?: string;
  sku?: string;
  accessTier?: string;
  httpsOnly?: boolean;
  allowBlobPublicAccess?: boolean;
  /** "Deny" when access is restricted to subnets. */
  networkDefaultAction?: string;
  allowedSubnets: string[];
  provisioningState?: string;
};

export type StorageAccountOptions = {
  /** Subnet ids allowed through; all networks are allowed when empty. */
  subnets?: string[];
  /** Defaults to "Premium_LRS". */
  sku?: string;
  /** Defaults to "FileStorage". */
  kind?: string;
  /** Defaults to "Hot". */
  accessTier?: "Hot" | "Cool";
};

export type StorageAccountResult = {
  account: StorageAccount;
  state: "existing" | "created";
  /** First access key of the account. */
  accessKey: string;
};

export type FileShare = {
  id: string;
  name: string;
  quotaGb?: number;
};

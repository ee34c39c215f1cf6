/**
 * Helm integration types.
 */

import type { CirrusLogger } from "@cirrus/core";
import type { HelmRepositoryRegistry } from "./helm-wrapper.js";

/* ---------- Values ---------- */

/** `--set key=value` pairs; dots in a key segment are escaped with a backslash. */
export type HelmValues = Record<string, string | number | boolean>;

/* ---------- Options ---------- */

export interface HelmClientOptions {
  /** Registry shared with other clients; a private one is created when omitted. */
  repositories?: HelmRepositoryRegistry;
  helmPath?: string;
  logger?: CirrusLogger;
}

export interface HelmInstallOptions {
  values?: HelmValues;
  /** Uninstall any existing release first. Defaults to true. */
  reinstall?: boolean;
  /** Defaults to true. */
  atomic?: boolean;
  /** Helm duration, defaults to "900s". */
  timeout?: string;
  extraArgs?: string[];
}

export interface HelmUninstallOptions {
  tolerateError?: boolean;
}

export interface HelmRepoOptions {
  /** Attempts at `helm repo update`, defaults to 10. */
  updateRetries?: number;
}

export interface IngressControllerOptions {
  /** Defaults to 2. */
  replicas?: number;
  /** Values file passed with `-f`. */
  controllerDefinition?: string;
}

/* ---------- Constants ---------- */

export const INGRESS_NGINX_REPO = { alias: "ingress-nginx", url: "https://kubernetes.github.io/ingress-nginx" } as const;
export const INGRESS_NGINX_CHART = "ingress-nginx/ingress-nginx";

export {
  ARM_SCOPE,
  AUTH_LOCATION_ENV,
  AzureCredentialsManager,
  createCredentialsManager,
  defaultCredentialPath,
  loadCredentialFile,
  objectIdFromToken,
  parseCredentialFile,
} from "./manager.js";

export type { CredentialResolutionResult, ServicePrincipal } from "./manager.js";

export { AzureCLIWrapper, createCLIWrapper, latestVersion, parseAksVersions } from "./wrapper.js";

export type { AzureCLIOptions } from "./wrapper.js";

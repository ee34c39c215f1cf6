/**
 * Shared building blocks for the Cirrus packages.
 */

export * from "./src/errors.js";
export * from "./src/logging/index.js";
export * from "./src/shell/index.js";
export * from "./src/wait/index.js";

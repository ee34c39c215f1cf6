/**
 * Azure resource management for development VMs and their surroundings.
 */

export * from "./src/index.js";

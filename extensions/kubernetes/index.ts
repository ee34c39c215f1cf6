/**
 * @cirrus/kubernetes: kubectl and Helm, one namespace at a time.
 */

export * from "./src/index.js";

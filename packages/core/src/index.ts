// Constants
export * from "./constants";
// Provisioning model (schemas, plan, descriptor, manifest, verification)
export * from "./provision";

// Shared schemas (names, versions, paths, origins)
export * from "./schemas";
// Utilities
export * from "./utils";

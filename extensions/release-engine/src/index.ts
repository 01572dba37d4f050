export * from "./types.js";
export * from "./schemas.js";
export * from "./errors.js";
export * from "./accessor.js";
export * from "./manifest.js";
export * from "./client.js";
export * from "./hooks.js";
export * from "./dependency-graph.js";
export * from "./scheduler.js";
export * from "./renderer.js";
export * from "./storage.js";
export * from "./deployer.js";
export * from "./kubectl-client.js";
export * from "./bundle.js";
export * from "./config.js";
export * from "./duration.js";
export * from "./logger.js";
export { createReleaseCli, formatInstallPlan, formatReleaseStatus } from "./cli.js";

export * from "./config/index.js";
export * from "./errors/catalog.js";
export * from "./lifecycle/index.js";
export * from "./logger/index.js";
export * from "./prune/index.js";
export * from "./retention/index.js";
export * from "./schemas/prune-config.js";

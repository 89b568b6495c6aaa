// Export all types
export * from "./types";

// Errors
export * from "./errors";

// Configuration
export * from "./config/paths";

// Utilities
export * from "./utils/logging";
export * from "./utils/validation";
export * from "./utils/nginxConfig";
export * from "./utils/configInspector";
export * from "./utils/command";

// Store, capabilities and lifecycle
export * from "./store/siteStore";
export * from "./server/nginxCapabilities";
export * from "./lifecycle/siteLifecycle";

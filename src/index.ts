// Snapshot engine
export * from "./core";

// Utilities
export * from "./utils";

// Types
export * from "./types";

// CLI commands (for programmatic use)
export { store, diff, config } from "./commands";

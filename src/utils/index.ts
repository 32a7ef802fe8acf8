// File system utilities
export * from "./fs";

// Content digests
export * from "./digest";

// Tag serialization
export * from "./tags";

// Logging
export * from "./logger";

// Task groups
export * from "./concurrency";

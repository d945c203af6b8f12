/**
 * Shared Infrastructure Exports
 */

// Executor (LLM execution)
export * from "./executor/index.js";

// Store (data persistence)
export * from "./store/index.js";

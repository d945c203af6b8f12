/**
 * Configuration Management
 * Loads and validates base configuration from environment variables
 */

import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "./errors.js";

// Base environment schema - shared across all packages
const baseEnvSchema = z.object({
  // Anthropic (only the agent-backed workers need it)
  ANTHROPIC_API_KEY: z.string().min(1).optional(),

  // General
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  DATA_DIR: z.string().default("./data"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type BaseEnv = z.infer<typeof baseEnvSchema>;

/**
 * Base configuration - shared across all packages
 */
export interface BaseConfig {
  anthropic?: {
    apiKey: string;
  };

  env: {
    logLevel: "debug" | "info" | "warn" | "error";
    dataDir: string;
    nodeEnv: "development" | "production" | "test";
  };
}

let baseConfigInstance: BaseConfig | null = null;

/**
 * Load and validate base configuration
 */
export function loadBaseConfig(source: NodeJS.ProcessEnv = process.env): BaseConfig {
  const parseResult = baseEnvSchema.safeParse(source);

  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Configuration validation failed:\n${errors}`);
  }

  const env = parseResult.data;

  return {
    anthropic: env.ANTHROPIC_API_KEY
      ? { apiKey: env.ANTHROPIC_API_KEY }
      : undefined,

    env: {
      logLevel: env.LOG_LEVEL,
      dataDir: env.DATA_DIR,
      nodeEnv: env.NODE_ENV,
    },
  };
}

/**
 * Get base configuration (lazy-loaded singleton)
 */
export function getBaseConfig(): BaseConfig {
  if (!baseConfigInstance) {
    baseConfigInstance = loadBaseConfig();
  }
  return baseConfigInstance;
}

/**
 * Reset config (for testing)
 */
export function resetBaseConfig(): void {
  baseConfigInstance = null;
}

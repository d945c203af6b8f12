/**
 * @deepresearch/core
 * Core utilities shared by the deep research services
 */

// Config
export {
  loadBaseConfig,
  getBaseConfig,
  resetBaseConfig,
  type BaseConfig,
  type BaseEnv,
} from "./config.js";

// Logger
export {
  logger,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LogHandler,
  type ChildLogger,
} from "./logger.js";

// Errors
export {
  DeepResearchError,
  ConfigError,
  AgentError,
  ValidationError,
  isDeepResearchError,
} from "./errors.js";

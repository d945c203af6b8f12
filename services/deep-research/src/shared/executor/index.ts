/**
 * Executor Exports
 */

export type {
  IExecutor,
  ExecutorRequest,
  ExecutorResponse,
  ExecutorOptions,
  AgentProfile,
} from "./types.js";
export { ClaudeExecutor, createClaudeExecutor } from "./claude.js";

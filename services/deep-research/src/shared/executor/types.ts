/**
 * Executor Types
 * Interface for LLM execution layer
 */

// ============================================
// AGENT PROFILE
// ============================================

/**
 * Model, tool and limit settings for one kind of agent run
 */
export interface AgentProfile {
  /** Model to use */
  model: "haiku" | "sonnet" | "opus";

  /** Maximum turns */
  maxTurns: number;

  /** Cost ceiling in USD, checked against the reported run cost */
  maxBudgetUsd: number;

  /** Available tools */
  tools: string[];
}

// ============================================
// EXECUTOR INTERFACE
// ============================================

/**
 * Executor interface - abstracts LLM execution
 */
export interface IExecutor {
  /**
   * Execute a prompt with given profile
   */
  execute(request: ExecutorRequest): Promise<ExecutorResponse>;

  /**
   * Check if executor is ready
   */
  isReady(): boolean;
}

// ============================================
// REQUEST / RESPONSE
// ============================================

/**
 * Request to executor
 */
export interface ExecutorRequest {
  /** The prompt to send */
  prompt: string;

  /** Optional system prompt */
  systemPrompt?: string;

  /** Agent profile with model, tools, limits */
  profile: AgentProfile;

  /** Aborts the run (time budget exceeded) */
  signal?: AbortSignal;

  /** Additional context for logging */
  context?: Record<string, unknown>;
}

/**
 * Response from executor
 */
export interface ExecutorResponse {
  /** Whether execution succeeded */
  success: boolean;

  /** Raw output from the model */
  output: string;

  /** Session ID from the SDK */
  sessionId?: string;

  /** Cost in USD */
  costUsd: number;

  /** Duration in ms */
  durationMs: number;

  /** Tools that were used */
  toolsUsed: string[];

  /** Number of turns */
  turns: number;

  /** Error if failed */
  error?: {
    code: string;
    message: string;
  };
}

// ============================================
// EXECUTOR OPTIONS
// ============================================

/**
 * Options for creating an executor
 */
export interface ExecutorOptions {
  /** Working directory for tools */
  cwd?: string;

  /** Permission mode */
  permissionMode?: "bypassPermissions" | "default";
}

/**
 * Custom Error Types
 * Structured errors shared by every deep research package
 */

/**
 * Base error class for all deep research errors
 */
export class DeepResearchError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "DeepResearchError";
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
      stack: this.stack,
    };
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends DeepResearchError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context, retryable: false });
    this.name = "ConfigError";
  }
}

/**
 * Agent execution errors
 */
export class AgentError extends DeepResearchError {
  public readonly agentType: string;
  public readonly sessionId?: string;

  constructor(
    message: string,
    agentType: string,
    options?: {
      cause?: Error;
      sessionId?: string;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message, "AGENT_ERROR", options);
    this.name = "AgentError";
    this.agentType = agentType;
    this.sessionId = options?.sessionId;
  }
}

/**
 * Validation errors (schemas, inputs)
 */
export class ValidationError extends DeepResearchError {
  public readonly field?: string;
  public readonly issues: string[];

  constructor(
    message: string,
    options?: {
      field?: string;
      issues?: string[];
      context?: Record<string, unknown>;
    }
  ) {
    super(message, "VALIDATION_ERROR", { context: options?.context, retryable: false });
    this.name = "ValidationError";
    this.field = options?.field;
    this.issues = options?.issues ?? [];
  }
}

/**
 * Type guard to check if error is a deep research error
 */
export function isDeepResearchError(error: unknown): error is DeepResearchError {
  return error instanceof DeepResearchError;
}

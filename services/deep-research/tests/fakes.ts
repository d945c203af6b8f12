/**
 * In-process stand-ins for the executor and store
 */

import type {
  ExecutorRequest,
  ExecutorResponse,
  IExecutor,
} from "../src/shared/executor/types.js";
import type { IStore } from "../src/shared/store/types.js";

export function executorResponse(overrides: Partial<ExecutorResponse> = {}): ExecutorResponse {
  return {
    success: true,
    output: "",
    costUsd: 0.01,
    durationMs: 5,
    toolsUsed: [],
    turns: 1,
    ...overrides,
  };
}

/**
 * Executor answering every request through `respond`, recording requests
 */
export class FakeExecutor implements IExecutor {
  readonly requests: ExecutorRequest[] = [];

  constructor(
    private readonly respond: (request: ExecutorRequest) => ExecutorResponse | Promise<ExecutorResponse>
  ) {}

  async execute(request: ExecutorRequest): Promise<ExecutorResponse> {
    this.requests.push(request);
    return this.respond(request);
  }

  isReady(): boolean {
    return true;
  }
}

export class MemoryStore implements IStore {
  readonly data = new Map<string, unknown>();
  readonly texts = new Map<string, string>();

  async read<T>(key: string): Promise<T | null> {
    const value = this.data.get(key);
    return value === undefined ? null : structuredClone(value as T);
  }

  async write<T>(key: string, data: T): Promise<void> {
    this.data.set(key, structuredClone(data));
  }

  async writeText(key: string, content: string): Promise<void> {
    this.texts.set(key, content);
  }

  getPath(key: string): string {
    return `memory://${key}`;
  }
}

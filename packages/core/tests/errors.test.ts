import { describe, it, expect } from "vitest";
import {
  AgentError,
  ConfigError,
  DeepResearchError,
  ValidationError,
  isDeepResearchError,
} from "../src/errors.js";

describe("DeepResearchError", () => {
  it("carries code, context and retryable flag", () => {
    const error = new DeepResearchError("boom", "TEST_CODE", {
      context: { step: 2 },
      retryable: true,
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("DeepResearchError");
    expect(error.code).toBe("TEST_CODE");
    expect(error.context).toEqual({ step: 2 });
    expect(error.retryable).toBe(true);
  });

  it("serializes to JSON", () => {
    const json = new DeepResearchError("boom", "TEST_CODE").toJSON();

    expect(json.name).toBe("DeepResearchError");
    expect(json.code).toBe("TEST_CODE");
    expect(json.message).toBe("boom");
    expect(json.retryable).toBe(false);
  });

  it("is recognized by the type guard", () => {
    expect(isDeepResearchError(new ValidationError("v"))).toBe(true);
    expect(isDeepResearchError(new Error("plain"))).toBe(false);
  });

  it("keeps the cause", () => {
    const cause = new Error("root");
    const error = new DeepResearchError("wrapped", "X", { cause });
    expect(error.cause).toBe(cause);
  });
});

describe("subclasses", () => {
  it("assign codes and names", () => {
    expect(new ConfigError("c").code).toBe("CONFIG_ERROR");
    expect(new ConfigError("c").retryable).toBe(false);

    const agent = new AgentError("a", "researcher", { sessionId: "s-1" });
    expect(agent.code).toBe("AGENT_ERROR");
    expect(agent.agentType).toBe("researcher");
    expect(agent.sessionId).toBe("s-1");

    const validation = new ValidationError("v", { field: "depth", issues: ["bad"] });
    expect(validation.name).toBe("ValidationError");
    expect(validation.field).toBe("depth");
    expect(validation.issues).toEqual(["bad"]);
    expect(new ValidationError("v").issues).toEqual([]);
  });
});

import { describe, it, expect } from "vitest";
import { loadBaseConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("loadBaseConfig", () => {
  it("applies defaults", () => {
    const config = loadBaseConfig({});

    expect(config.anthropic).toBeUndefined();
    expect(config.env).toEqual({
      logLevel: "info",
      dataDir: "./data",
      nodeEnv: "development",
    });
  });

  it("reads values from the given source", () => {
    const config = loadBaseConfig({
      ANTHROPIC_API_KEY: "test-key",
      LOG_LEVEL: "debug",
      DATA_DIR: "/tmp/research",
      NODE_ENV: "test",
    });

    expect(config.anthropic).toEqual({ apiKey: "test-key" });
    expect(config.env.logLevel).toBe("debug");
    expect(config.env.dataDir).toBe("/tmp/research");
    expect(config.env.nodeEnv).toBe("test");
  });

  it("throws ConfigError on invalid values", () => {
    expect(() => loadBaseConfig({ LOG_LEVEL: "verbose" })).toThrow(ConfigError);
  });
});

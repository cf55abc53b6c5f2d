import { afterEach, describe, expect, it, vi } from "vitest";
import { loadConfig, resolveModelCandidate } from "./env.js";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("loadConfig", () => {
  it("never keeps more messages than the trim threshold", () => {
    vi.stubEnv("HISTORY_TRIM_THRESHOLD", "50");
    vi.stubEnv("HISTORY_TRIM_KEEP", "70");

    const config = loadConfig();

    expect(config.historyTrimThreshold).toBe(50);
    expect(config.historyTrimKeep).toBe(50);
  });

  it("falls back on invalid numbers", () => {
    vi.stubEnv("AGENT_MAX_ITERATIONS", "abc");
    vi.stubEnv("MAX_CONVERSATION_TOKENS", "-3");

    const config = loadConfig();

    expect(config.maxIterations).toBe(10);
    expect(config.maxConversationTokens).toBe(150_000);
  });

  it("reads the store driver, log level and debug flag", () => {
    vi.stubEnv("STORE_DRIVER", "file");
    vi.stubEnv("LOG_LEVEL", "DEBUG");
    vi.stubEnv("DEBUG_LLM_REQUESTS", "yes");

    const config = loadConfig();

    expect(config.storeDriver).toBe("file");
    expect(config.logLevel).toBe("debug");
    expect(config.debugLlmRequests).toBe(true);
  });
});

describe("resolveModelCandidate", () => {
  it("requires an API key", () => {
    vi.stubEnv("ANTHROPIC_API_KEY", "");
    expect(() => resolveModelCandidate(loadConfig())).toThrow("Missing required env var: ANTHROPIC_API_KEY");
  });

  it("builds an anthropic candidate from the environment", () => {
    vi.stubEnv("ANTHROPIC_API_KEY", "test-key");
    vi.stubEnv("ANTHROPIC_MODEL", "claude-test");
    vi.stubEnv("MODEL_TIMEOUT_MS", "5000");

    expect(resolveModelCandidate(loadConfig())).toMatchObject({
      provider: "anthropic",
      apiKey: "test-key",
      model: "claude-test",
      timeoutMs: 5000,
    });
  });
});

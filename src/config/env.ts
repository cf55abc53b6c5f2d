import { config as loadDotenv } from "dotenv";
import type { LogLevel } from "../runtime/logger.js";
import type { ResolvedModelCandidate } from "../types/model.js";

loadDotenv();

function getNumberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw || !raw.trim()) {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function getBooleanEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (!raw || !raw.trim()) {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  return fallback;
}

function getLogLevelEnv(name: string, fallback: LogLevel): LogLevel {
  const normalized = process.env[name]?.trim().toLowerCase();
  switch (normalized) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return normalized;
    default:
      return fallback;
  }
}

export type StoreDriver = "backend" | "file";

export interface AppConfig {
  anthropicApiKey?: string;
  anthropicBaseUrl?: string;
  anthropicModel: string;
  maxResponseTokens: number;
  summaryMaxTokens: number;
  maxConversationTokens: number;
  maxIterations: number;
  historyTrimThreshold: number;
  historyTrimKeep: number;
  modelTimeoutMs: number;
  storeDriver: StoreDriver;
  sessionDir: string;
  backendApiUrl?: string;
  backendApiToken?: string;
  backendTimeoutMs: number;
  systemPromptPath: string;
  toolCatalogPath: string;
  debugLlmRequests: boolean;
  logLevel: LogLevel;
}

export function loadConfig(): AppConfig {
  const historyTrimThreshold = Math.floor(getNumberEnv("HISTORY_TRIM_THRESHOLD", 100));
  const historyTrimKeep = Math.floor(getNumberEnv("HISTORY_TRIM_KEEP", 80));

  return {
    anthropicApiKey: process.env.ANTHROPIC_API_KEY?.trim() || undefined,
    anthropicBaseUrl: process.env.ANTHROPIC_BASE_URL?.trim() || undefined,
    anthropicModel: process.env.ANTHROPIC_MODEL?.trim() || "claude-sonnet-4-20250514",
    maxResponseTokens: Math.floor(getNumberEnv("AGENT_MAX_RESPONSE_TOKENS", 2048)),
    summaryMaxTokens: Math.floor(getNumberEnv("SUMMARY_MAX_TOKENS", 1024)),
    maxConversationTokens: Math.floor(getNumberEnv("MAX_CONVERSATION_TOKENS", 150_000)),
    maxIterations: Math.floor(getNumberEnv("AGENT_MAX_ITERATIONS", 10)),
    historyTrimThreshold,
    // keep가 threshold를 넘으면 trim 이후에도 다시 threshold를 넘는다.
    historyTrimKeep: Math.min(historyTrimKeep, historyTrimThreshold),
    modelTimeoutMs: getNumberEnv("MODEL_TIMEOUT_MS", 120_000),
    storeDriver: process.env.STORE_DRIVER?.trim() === "file" ? "file" : "backend",
    sessionDir: process.env.SESSION_DIR?.trim() || "./data/sessions",
    backendApiUrl: process.env.BACKEND_API_URL?.trim() || undefined,
    backendApiToken: process.env.BACKEND_API_TOKEN?.trim() || undefined,
    backendTimeoutMs: getNumberEnv("BACKEND_TIMEOUT_MS", 60_000),
    systemPromptPath: process.env.SYSTEM_PROMPT_PATH?.trim() || "./data/agent/SYSTEM.md",
    toolCatalogPath: process.env.TOOL_CATALOG_PATH?.trim() || "./data/tools/catalog.json",
    debugLlmRequests: getBooleanEnv("DEBUG_LLM_REQUESTS", false),
    logLevel: getLogLevelEnv("LOG_LEVEL", "info"),
  };
}

export function resolveModelCandidate(config: AppConfig): ResolvedModelCandidate {
  if (!config.anthropicApiKey) {
    throw new Error("Missing required env var: ANTHROPIC_API_KEY");
  }
  return {
    id: "anthropic-env",
    provider: "anthropic",
    apiKey: config.anthropicApiKey,
    baseUrl: config.anthropicBaseUrl,
    model: config.anthropicModel,
    timeoutMs: config.modelTimeoutMs,
    description: "Model candidate from ANTHROPIC_* env",
  };
}

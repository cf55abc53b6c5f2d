import type { ChatMessage, ContentBlock, JsonObject } from "./chat.js";

export type ProviderType = "anthropic";

export type StopReason = "end_turn" | "max_tokens" | "stop_sequence" | "tool_use" | "unknown";

export interface ResolvedModelCandidate {
  id: string;
  provider: ProviderType;
  apiKey: string;
  baseUrl?: string;
  model: string;
  timeoutMs: number;
  maxRetries?: number;
  description?: string;
}

export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: JsonObject & { type: "object" };
}

export interface ModelRequest {
  model: string;
  maxTokens: number;
  system: string;
  tools?: ToolDefinition[];
  messages: ChatMessage[];
  debugEnabled?: boolean;
  debugTag?: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ModelResponse {
  stopReason: StopReason;
  content: ContentBlock[];
  usage: TokenUsage;
}

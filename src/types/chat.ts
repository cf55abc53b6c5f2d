export type ChatRole = "user" | "assistant";

export type JsonObject = Record<string, unknown>;

export interface TextBlock {
  type: "text";
  text: string;
}

export interface ToolUseBlock {
  type: "tool_use";
  id: string;
  name: string;
  input: JsonObject;
}

export interface ToolResultBlock {
  type: "tool_result";
  tool_use_id: string;
  content: string;
}

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock;

export type MessageContent = string | ContentBlock[];

export interface ChatMessage {
  role: ChatRole;
  content: MessageContent;
  tokenCount?: number;
}

export interface ChatSession {
  userId: string;
  messages: ChatMessage[];
  loaded: boolean;
}

export interface SessionInfo {
  userId: string;
  messageCount: number;
  active: boolean;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

import Anthropic from "@anthropic-ai/sdk";
import type { MessagesAdapter, MessagesApi } from "../../core/api/messages-api.js";
import type { ChatMessage, ContentBlock } from "../../types/chat.js";
import { isJsonObject } from "../../types/chat.js";
import type { ModelRequest, ModelResponse, ResolvedModelCandidate, StopReason } from "../../types/model.js";

/**
 * 파일 목적:
 * - Anthropic Messages API 호출과 SDK 콘텐츠 블록 <-> 내부 tagged union 변환을 담당한다.
 *
 * 주요 의존성:
 * - @anthropic-ai/sdk: messages.create
 *
 * 역의존성:
 * - adapter/api/index.ts (provider 해석)
 */

const DEBUG_LLM_REQUESTS = (() => {
  const raw = process.env.DEBUG_LLM_REQUESTS?.trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes" || raw === "on";
})();

/**
 * 응답에서 만날 수 있는 SDK 블록 형태.
 * text/tool_use 외의 블록은 원문 JSON 텍스트로 보존한다.
 */
export type SdkContentBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: unknown }
  | { type: "thinking"; thinking: string; signature: string }
  | { type: "redacted_thinking"; data: string };

export function fromSdkContentBlock(block: SdkContentBlock): ContentBlock {
  switch (block.type) {
    case "text":
      return { type: "text", text: block.text };
    case "tool_use":
      return {
        type: "tool_use",
        id: block.id,
        name: block.name,
        input: isJsonObject(block.input) ? block.input : {},
      };
    case "thinking":
    case "redacted_thinking":
      return { type: "text", text: JSON.stringify(block) };
  }
}

export function toSdkContentBlock(block: ContentBlock): Anthropic.ContentBlockParam {
  switch (block.type) {
    case "text":
      return { type: "text", text: block.text };
    case "tool_use":
      return { type: "tool_use", id: block.id, name: block.name, input: block.input };
    case "tool_result":
      return { type: "tool_result", tool_use_id: block.tool_use_id, content: block.content };
  }
}

export function toSdkMessages(messages: ChatMessage[]): Anthropic.MessageParam[] {
  return messages.map((message) => ({
    role: message.role,
    content: typeof message.content === "string" ? message.content : message.content.map(toSdkContentBlock),
  }));
}

export function toStopReason(raw: string | null): StopReason {
  switch (raw) {
    case "end_turn":
    case "max_tokens":
    case "stop_sequence":
    case "tool_use":
      return raw;
    default:
      return "unknown";
  }
}

function toOneLine(value: string, maxLen = 80): string {
  const compact = value.replace(/\s+/g, " ").trim();
  if (compact.length <= maxLen) {
    return compact;
  }
  return `${compact.slice(0, maxLen)}...`;
}

function previewContent(message: ChatMessage): string {
  if (typeof message.content === "string") {
    return toOneLine(message.content);
  }
  return message.content.map((block) => block.type).join(",");
}

function debugLogRequest(candidate: ResolvedModelCandidate, request: ModelRequest): void {
  if (request.debugEnabled !== true && !DEBUG_LLM_REQUESTS) {
    return;
  }

  const roleSeq = request.messages.map((m) => m.role).join(">");
  const preview = request.messages
    .slice(-3)
    .map((m, i) => `${i}:${m.role}:${previewContent(m)}`)
    .join(" | ");

  process.stderr.write(
    [
      "[llm-debug]",
      `tag=${request.debugTag ?? "unknown"}`,
      `provider=${candidate.provider}`,
      `model=${request.model}`,
      `max_tokens=${request.maxTokens}`,
      `tools=${request.tools?.length ?? 0}`,
      `messages=${request.messages.length}`,
      `roleSeq=${roleSeq}`,
      `preview=${preview}`,
    ].join(" ") + "\n",
  );
}

class AnthropicMessagesApi implements MessagesApi {
  private readonly client: Anthropic;

  constructor(private readonly candidate: ResolvedModelCandidate) {
    this.client = new Anthropic({
      apiKey: candidate.apiKey,
      ...(candidate.baseUrl ? { baseURL: candidate.baseUrl } : {}),
      timeout: candidate.timeoutMs,
      maxRetries: candidate.maxRetries ?? 2,
    });
  }

  async create(request: ModelRequest): Promise<ModelResponse> {
    debugLogRequest(this.candidate, request);
    const response = await this.client.messages.create({
      model: request.model,
      max_tokens: request.maxTokens,
      system: request.system,
      messages: toSdkMessages(request.messages),
      ...(request.tools && request.tools.length > 0
        ? {
            tools: request.tools.map((tool) => ({
              name: tool.name,
              description: tool.description,
              input_schema: tool.input_schema,
            })),
          }
        : {}),
    });

    return {
      stopReason: toStopReason(response.stop_reason),
      content: response.content.map(fromSdkContentBlock),
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }
}

export class AnthropicAdapter implements MessagesAdapter {
  readonly provider = "anthropic" as const;

  create(candidate: ResolvedModelCandidate): MessagesApi {
    return new AnthropicMessagesApi(candidate);
  }
}

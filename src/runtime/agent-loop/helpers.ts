import type { ChatMessage, ContentBlock, MessageContent, ToolUseBlock } from "../../types/chat.js";

/**
 * 한국어 ~2 chars/token, 영어/코드 ~4 chars/token 을 섞은 보수적 근사치.
 * 실제 토크나이저가 아니라 compaction 트리거 용도로만 쓴다.
 */
export const CHARS_PER_TOKEN = 2.5;

export function contentCharCount(content: MessageContent): number {
  if (typeof content === "string") {
    return content.length;
  }
  // JSON.stringify는 비 ASCII 문자를 이스케이프하지 않는다.
  return JSON.stringify(content).length;
}

export function estimateHistoryTokens(messages: ChatMessage[]): number {
  const totalChars = messages.reduce((sum, message) => sum + contentCharCount(message.content), 0);
  return Math.floor(totalChars / CHARS_PER_TOKEN);
}

export function estimateTextTokens(text: string): number {
  return Math.floor(text.length / CHARS_PER_TOKEN);
}

export function isEmptyContent(content: MessageContent): boolean {
  if (typeof content === "string") {
    return content.trim().length === 0;
  }
  return content.length === 0;
}

export function hasToolResult(message: ChatMessage): boolean {
  return typeof message.content !== "string" && message.content.some((block) => block.type === "tool_result");
}

export function toolUseBlocks(content: ContentBlock[]): ToolUseBlock[] {
  return content.filter((block): block is ToolUseBlock => block.type === "tool_use");
}

/**
 * 블록 목록에서 사람이 읽는 텍스트만 이어 붙인다.
 */
export function joinText(content: MessageContent, separator = "\n"): string {
  if (typeof content === "string") {
    return content;
  }
  const parts: string[] = [];
  for (const block of content) {
    switch (block.type) {
      case "text":
        parts.push(block.text);
        break;
      case "tool_use":
      case "tool_result":
        break;
    }
  }
  return parts.join(separator);
}

export function firstText(content: MessageContent): string | undefined {
  if (typeof content === "string") {
    return content;
  }
  for (const block of content) {
    if (block.type === "text") {
      return block.text;
    }
  }
  return undefined;
}

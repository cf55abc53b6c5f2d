import type { ChatMessage, ContentBlock } from "../../types/chat.js";
import { hasToolResult, isEmptyContent } from "./helpers.js";

/**
 * 파일 목적:
 * - 잘려 나간 대화 창을 모델 프로토콜이 받아들이는 형태로 복구한다.
 * - compaction 분할 지점이 tool_use/tool_result 쌍을 가르지 않도록 고른다.
 *
 * 역의존성:
 * - run-loop.ts (턴 종료 trim), context-guard.ts (분할), session-cache.ts (hydration)
 */

export interface TrimPolicy {
  /** 이 길이를 넘으면 trim 한다. */
  threshold: number;
  keep: number;
}

export const DEFAULT_TRIM_POLICY: TrimPolicy = { threshold: 100, keep: 80 };

function collectToolUseIds(messages: ChatMessage[]): Set<string> {
  const ids = new Set<string>();
  for (const message of messages) {
    if (message.role !== "assistant" || typeof message.content === "string") {
      continue;
    }
    for (const block of message.content) {
      if (block.type === "tool_use") {
        ids.add(block.id);
      }
    }
  }
  return ids;
}

function keepBlock(block: ContentBlock, toolUseIds: Set<string>): boolean {
  switch (block.type) {
    case "tool_result":
      return toolUseIds.has(block.tool_use_id);
    case "text":
    case "tool_use":
      return true;
  }
}

function repairPass(messages: ChatMessage[]): ChatMessage[] {
  const toolUseIds = collectToolUseIds(messages);
  const cleaned: ChatMessage[] = [];

  for (const message of messages) {
    if (message.role === "user" && typeof message.content !== "string") {
      const filtered = message.content.filter((block) => keepBlock(block, toolUseIds));
      if (filtered.length === 0) {
        continue;
      }
      cleaned.push(filtered.length === message.content.length ? message : { ...message, content: filtered });
      continue;
    }
    if (isEmptyContent(message.content)) {
      continue;
    }
    cleaned.push(message);
  }

  const firstUser = cleaned.findIndex((message) => message.role === "user");
  return firstUser < 0 ? [] : cleaned.slice(firstUser);
}

/**
 * 1) 짝을 잃은 tool_result 블록 제거 (비면 메시지째 제거)
 * 2) 빈 메시지 제거
 * 3) 첫 메시지가 user가 될 때까지 앞부분 제거
 *
 * 3)에서 버린 assistant의 tool_use가 뒤쪽 tool_result의 짝이었을 수 있으므로
 * 메시지 수가 더 줄지 않을 때까지 반복한다.
 */
export function ensureValidHistory(messages: ChatMessage[]): ChatMessage[] {
  let current = messages;
  for (;;) {
    const next = repairPass(current);
    if (next.length === current.length) {
      return next;
    }
    current = next;
  }
}

export function trimHistory(messages: ChatMessage[], policy: TrimPolicy = DEFAULT_TRIM_POLICY): ChatMessage[] {
  if (messages.length <= policy.threshold) {
    return messages;
  }
  return ensureValidHistory(messages.slice(-policy.keep));
}

/**
 * 도구 왕복의 연속이 아닌, 사용자가 직접 쓴 user 턴인지.
 */
export function isSafeSplitIndex(messages: ChatMessage[], index: number): boolean {
  const message = messages[index];
  return message !== undefined && message.role === "user" && !hasToolResult(message);
}

/**
 * target에서 뒤로 걸어가며 안전한 분할 지점을 찾는다. 없으면 target을 그대로 돌려준다.
 */
export function findSafeSplit(messages: ChatMessage[], target: number): number {
  for (let index = Math.min(target, messages.length - 1); index > 0; index -= 1) {
    if (isSafeSplitIndex(messages, index)) {
      return index;
    }
  }
  return target;
}

import type { MessagesApi } from "../../core/api/messages-api.js";
import type { ChatMessage, ChatSession, ContentBlock } from "../../types/chat.js";
import type { ModelResponse, StopReason, TokenUsage } from "../../types/model.js";
import type { Logger } from "../logger.js";
import { errorMessage } from "../logger.js";
import type { MessageStore } from "../session-store.js";
import type { ToolCallRecord, ToolRegistry } from "../tools/registry.js";
import { toToolCallRecord, toToolResultBlock } from "../tools/registry.js";
import type { Compactor } from "./context-guard.js";
import { isEmptyContent, joinText, toolUseBlocks } from "./helpers.js";
import { trimHistory } from "./history.js";
import type { AgentTurnResult, AgentTurnSettings, ChatTurnEventHandler } from "./types.js";

/**
 * 파일 목적:
 * - 사용자 한 턴(user 메시지 -> 모델 <-> 도구 왕복 -> 최종 답변)을 실행한다.
 *
 * 주요 의존성:
 * - core/api/messages-api: 모델 호출
 * - tools/registry: 도구 fan-out/fan-in
 * - history.trimHistory: 턴 종료 trim + 불변식 복구
 * - context-guard.Compactor: 예산 초과 시 요약
 * - session-store: 이번 턴에 새로 생긴 메시지만 append 저장
 *
 * 역의존성:
 * - runtime/chat-service.ts (사용자 락 안에서 호출)
 *
 * 모듈 흐름:
 * 1) user 메시지 append
 * 2) 모델 호출 -> assistant 메시지 append
 * 3) stop_reason이 tool_use면 도구 실행 결과를 user 메시지 하나로 append 후 반복 (최대 maxIterations)
 * 4) 모델 호출 실패 시 이번 턴에 붙인 메시지를 모두 되돌리고 실패 반환
 * 5) trim -> 저장 -> compaction (저장/compaction 실패는 로그만 남김)
 */
export interface AgentTurnDependencies {
  api: MessagesApi;
  store: MessageStore;
  tools: ToolRegistry;
  compactor: Compactor;
  settings: AgentTurnSettings;
  logger: Logger;
  onEvent?: ChatTurnEventHandler;
}

function addUsage(total: TokenUsage, usage: TokenUsage): TokenUsage {
  return {
    inputTokens: total.inputTokens + usage.inputTokens,
    outputTokens: total.outputTokens + usage.outputTokens,
  };
}

/**
 * 세션과 저장 대기 버퍼에 같은 메시지를 함께 붙인다.
 */
function appendTurnMessage(session: ChatSession, pending: ChatMessage[], message: ChatMessage): void {
  session.messages.push(message);
  pending.push(message);
}

async function persistTurn(deps: AgentTurnDependencies, session: ChatSession, pending: ChatMessage[]): Promise<void> {
  try {
    const saved = await deps.store.saveMessages(session.userId, pending);
    if (!saved) {
      deps.logger.warn("turn messages were not persisted", { userId: session.userId, messages: pending.length });
      deps.onEvent?.({ type: "persist-failed", userId: session.userId, messageCount: pending.length });
    }
  } catch (error) {
    deps.logger.error("failed to persist turn messages", { userId: session.userId, error: errorMessage(error) });
    deps.onEvent?.({ type: "persist-failed", userId: session.userId, messageCount: pending.length });
  }
}

async function compactAfterTurn(deps: AgentTurnDependencies, session: ChatSession): Promise<void> {
  try {
    await deps.compactor.maybeCompact(session);
  } catch (error) {
    deps.logger.error("compaction failed", { userId: session.userId, error: errorMessage(error) });
    deps.onEvent?.({ type: "compaction-failed", userId: session.userId, error: errorMessage(error) });
  }
}

async function finishTurn(deps: AgentTurnDependencies, session: ChatSession, pending: ChatMessage[]): Promise<void> {
  const before = session.messages.length;
  session.messages = trimHistory(session.messages, {
    threshold: deps.settings.historyTrimThreshold,
    keep: deps.settings.historyTrimKeep,
  });
  if (session.messages.length !== before) {
    deps.onEvent?.({ type: "history-trimmed", userId: session.userId, before, after: session.messages.length });
  }

  await persistTurn(deps, session, pending);
  await compactAfterTurn(deps, session);
}

/**
 * 호출자는 사용자 락을 잡은 상태여야 한다(SessionCache.withSession).
 */
export async function runAgentTurn(
  deps: AgentTurnDependencies,
  session: ChatSession,
  userMessage: string,
  systemPrompt: string,
): Promise<AgentTurnResult> {
  const { settings } = deps;
  const startLength = session.messages.length;
  const pending: ChatMessage[] = [];
  const toolCalls: ToolCallRecord[] = [];
  const catalog = deps.tools.catalog();
  let usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };
  let lastContent: ContentBlock[] = [];
  let lastStopReason: StopReason = "unknown";
  let iterations = 0;

  deps.onEvent?.({ type: "turn-start", userId: session.userId, historyLength: startLength });
  appendTurnMessage(session, pending, { role: "user", content: userMessage });

  while (iterations < settings.maxIterations) {
    iterations += 1;
    deps.onEvent?.({
      type: "model-call",
      userId: session.userId,
      iteration: iterations,
      messageCount: session.messages.length,
    });

    let response: ModelResponse;
    try {
      response = await deps.api.create({
        model: settings.model,
        maxTokens: settings.maxResponseTokens,
        system: systemPrompt,
        tools: catalog,
        messages: [...session.messages],
        debugEnabled: settings.debugLlmRequests,
        debugTag: `turn-${session.userId}-iteration-${iterations}`,
      });
    } catch (error) {
      const message = errorMessage(error);
      // 캐시를 실제로 모델에 보냈던 상태로 되돌린다. 이번 턴은 아무것도 저장하지 않는다.
      session.messages.splice(startLength);
      deps.logger.error("model call failed", { userId: session.userId, iteration: iterations, error: message });
      deps.onEvent?.({ type: "model-error", userId: session.userId, iteration: iterations, error: message });
      return { ok: false, error: message, usage };
    }

    usage = addUsage(usage, response.usage);
    lastContent = response.content;
    lastStopReason = response.stopReason;

    // tool_use가 아닌 종료(max_tokens 등)라면 tool_result로 짝지을 수 없으므로 tool_use 블록은 남기지 않는다.
    const assistantContent =
      response.stopReason === "tool_use"
        ? response.content
        : response.content.filter((block) => block.type !== "tool_use");
    if (!isEmptyContent(assistantContent)) {
      appendTurnMessage(session, pending, {
        role: "assistant",
        content: assistantContent,
        tokenCount: response.usage.outputTokens,
      });
    }

    if (response.stopReason !== "tool_use") {
      break;
    }

    const calls = toolUseBlocks(response.content);
    if (calls.length === 0) {
      break;
    }

    for (const call of calls) {
      deps.onEvent?.({
        type: "tool-start",
        userId: session.userId,
        iteration: iterations,
        name: call.name,
        toolUseId: call.id,
      });
    }
    const outcomes = await deps.tools.executeAll(calls, session.userId);
    for (const outcome of outcomes) {
      if (outcome.status === "error") {
        deps.logger.error("tool failed", { userId: session.userId, tool: outcome.call.name, error: outcome.error });
      }
      deps.onEvent?.({
        type: "tool-result",
        userId: session.userId,
        iteration: iterations,
        name: outcome.call.name,
        toolUseId: outcome.call.id,
        status: outcome.status,
      });
      toolCalls.push(toToolCallRecord(outcome));
    }

    appendTurnMessage(session, pending, { role: "user", content: outcomes.map(toToolResultBlock) });
  }

  if (lastStopReason === "tool_use" && iterations >= settings.maxIterations) {
    deps.logger.warn("iteration cap reached", { userId: session.userId, iterations });
    deps.onEvent?.({ type: "iteration-cap", userId: session.userId, iterations });
  }

  await finishTurn(deps, session, pending);

  deps.onEvent?.({ type: "turn-complete", userId: session.userId, iterations, usage });
  return { ok: true, text: joinText(lastContent), toolCalls, usage, iterations };
}

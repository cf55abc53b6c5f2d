import type { MessagesApi } from "../../core/api/messages-api.js";
import type { ChatMessage, ChatSession } from "../../types/chat.js";
import type { Logger } from "../logger.js";
import { errorMessage } from "../logger.js";
import type { MessageStore } from "../session-store.js";
import { estimateHistoryTokens, estimateTextTokens, firstText, joinText } from "./helpers.js";
import { findSafeSplit, isSafeSplitIndex } from "./history.js";
import type { ChatTurnEventHandler } from "./types.js";

/**
 * 파일 목적:
 * - 토큰 예산 가드와 대화 이력 compaction(요약 + 최근 대화 유지)을 제공한다.
 *
 * 주요 의존성:
 * - helpers.estimateHistoryTokens: 토큰 근사 계산
 * - history.findSafeSplit: tool_use/tool_result 쌍을 가르지 않는 분할 지점
 * - session-store.replaceHistory: 압축 결과로 저장소 통째 교체
 *
 * 역의존성:
 * - run-loop.ts (턴 종료 시 호출)
 *
 * 모듈 흐름:
 * 1) 예산의 80% 이상 + 메시지 6개 이상이면 compaction 계획
 * 2) 중간 지점에서 뒤로 안전한 user 턴을 찾아 오래된 구간/최근 구간으로 분할
 * 3) 오래된 구간을 모델로 요약
 * 4) [요약 user, 확인 assistant, ...최근 구간]으로 저장소를 먼저 교체하고, 성공하면 캐시도 교체
 */
export const COMPACTION_TRIGGER_RATIO = 0.8;
export const COMPACTION_MIN_MESSAGES = 6;
export const SUMMARY_CLIP_CHARS = 500;
export const SUMMARY_MARKER = "[시스템: 이전 대화 요약]";
export const SUMMARY_ACKNOWLEDGEMENT = "네, 이전 대화 내용을 기억하고 있어요. 이어서 도와드릴게요.";

const SUMMARIZER_SYSTEM_PROMPT =
  "당신은 코칭 대화 이력을 요약하는 도우미입니다. 사실만 간결하게 정리하고 추측은 덧붙이지 마세요.";
const SUMMARY_REQUEST_HEADER =
  "아래 대화 이력을 간결하게 요약해 주세요. " +
  "운동 기록, 루틴 변경, 피드백, 사용자가 밝힌 선호는 빠짐없이 남겨 주세요.\n\n";

export interface CompactionSettings {
  model: string;
  summaryMaxTokens: number;
  maxConversationTokens: number;
  debugLlmRequests?: boolean;
}

export interface CompactionPlan {
  shouldCompact: boolean;
  estimatedTokens: number;
  triggerTokens: number;
  reason?: "under-budget" | "too-few-messages";
}

export type CompactionOutcome =
  | { status: "skipped"; reason: "under-budget" | "too-few-messages" | "no-safe-split"; estimatedTokens: number }
  | {
      status: "failed";
      reason: "summary-failed" | "empty-summary" | "replace-failed";
      estimatedTokens: number;
      error: string;
    }
  | {
      status: "compacted";
      splitIndex: number;
      beforeMessages: number;
      afterMessages: number;
      beforeTokens: number;
      afterTokens: number;
    };

export function computeCompactionPlan(messages: ChatMessage[], maxConversationTokens: number): CompactionPlan {
  const estimatedTokens = estimateHistoryTokens(messages);
  const triggerTokens = maxConversationTokens * COMPACTION_TRIGGER_RATIO;

  if (estimatedTokens < triggerTokens) {
    return { shouldCompact: false, estimatedTokens, triggerTokens, reason: "under-budget" };
  }
  // 몇 개 안 되는 메시지를 요약하는 건 왕복 비용만큼의 값어치가 없다.
  if (messages.length < COMPACTION_MIN_MESSAGES) {
    return { shouldCompact: false, estimatedTokens, triggerTokens, reason: "too-few-messages" };
  }
  return { shouldCompact: true, estimatedTokens, triggerTokens };
}

export function buildSummaryPrompt(messages: ChatMessage[]): string {
  let prompt = SUMMARY_REQUEST_HEADER;
  for (const message of messages) {
    const text = firstText(message.content);
    if (text === undefined) {
      continue;
    }
    prompt += `[${message.role}]: ${text.slice(0, SUMMARY_CLIP_CHARS)}\n`;
  }
  return prompt;
}

export function buildCompactedHistory(summary: string, recent: ChatMessage[]): ChatMessage[] {
  return [
    { role: "user", content: `${SUMMARY_MARKER}\n${summary}`, tokenCount: estimateTextTokens(summary) },
    { role: "assistant", content: SUMMARY_ACKNOWLEDGEMENT },
    ...recent,
  ];
}

export class Compactor {
  constructor(
    private readonly api: MessagesApi,
    private readonly store: MessageStore,
    private readonly settings: CompactionSettings,
    private readonly logger: Logger,
    private readonly onEvent?: ChatTurnEventHandler,
  ) {}

  private async summarize(messages: ChatMessage[]): Promise<string> {
    const response = await this.api.create({
      model: this.settings.model,
      maxTokens: this.settings.summaryMaxTokens,
      system: SUMMARIZER_SYSTEM_PROMPT,
      messages: [{ role: "user", content: buildSummaryPrompt(messages) }],
      debugEnabled: this.settings.debugLlmRequests,
      debugTag: "compaction-summary",
    });
    return joinText(response.content).trim();
  }

  private fail(
    session: ChatSession,
    reason: "summary-failed" | "empty-summary" | "replace-failed",
    estimatedTokens: number,
    error: string,
  ): CompactionOutcome {
    this.logger.error("compaction abandoned", { userId: session.userId, reason, error });
    this.onEvent?.({ type: "compaction-failed", userId: session.userId, error: `${reason}: ${error}` });
    return { status: "failed", reason, estimatedTokens, error };
  }

  /**
   * 예산을 넘었을 때만 compaction 한다.
   * 어떤 단계가 실패해도 세션 이력은 호출 전과 똑같이 남고, 다음 턴에서 다시 시도된다.
   */
  async maybeCompact(session: ChatSession): Promise<CompactionOutcome> {
    const messages = session.messages;
    const plan = computeCompactionPlan(messages, this.settings.maxConversationTokens);
    if (!plan.shouldCompact) {
      return { status: "skipped", reason: plan.reason ?? "under-budget", estimatedTokens: plan.estimatedTokens };
    }

    const splitIndex = findSafeSplit(messages, Math.floor(messages.length / 2));
    if (!isSafeSplitIndex(messages, splitIndex)) {
      this.logger.warn("compaction skipped: no safe split point", {
        userId: session.userId,
        messages: messages.length,
      });
      return { status: "skipped", reason: "no-safe-split", estimatedTokens: plan.estimatedTokens };
    }

    this.logger.info("compacting conversation", {
      userId: session.userId,
      estimatedTokens: plan.estimatedTokens,
      messages: messages.length,
    });
    this.onEvent?.({
      type: "compaction-start",
      userId: session.userId,
      estimatedTokens: plan.estimatedTokens,
      triggerTokens: plan.triggerTokens,
      messageCount: messages.length,
      splitIndex,
    });

    const older = messages.slice(0, splitIndex);
    const recent = messages.slice(splitIndex);

    let summary: string;
    try {
      summary = await this.summarize(older);
    } catch (error) {
      return this.fail(session, "summary-failed", plan.estimatedTokens, errorMessage(error));
    }
    if (!summary) {
      return this.fail(session, "empty-summary", plan.estimatedTokens, "summary response contained no text");
    }

    const compacted = buildCompactedHistory(summary, recent);
    let replaced: boolean;
    try {
      replaced = await this.store.replaceHistory(session.userId, compacted);
    } catch (error) {
      return this.fail(session, "replace-failed", plan.estimatedTokens, errorMessage(error));
    }
    if (!replaced) {
      return this.fail(session, "replace-failed", plan.estimatedTokens, "store rejected the compacted history");
    }

    session.messages = compacted;
    const afterTokens = estimateHistoryTokens(compacted);

    this.logger.info("compacted conversation", {
      userId: session.userId,
      summarized: older.length,
      kept: recent.length,
      afterTokens,
    });
    this.onEvent?.({
      type: "compaction-complete",
      userId: session.userId,
      beforeTokens: plan.estimatedTokens,
      afterTokens,
      beforeMessages: messages.length,
      afterMessages: compacted.length,
    });

    return {
      status: "compacted",
      splitIndex,
      beforeMessages: messages.length,
      afterMessages: compacted.length,
      beforeTokens: plan.estimatedTokens,
      afterTokens,
    };
  }
}

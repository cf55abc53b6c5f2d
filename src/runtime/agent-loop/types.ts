import type { TokenUsage } from "../../types/model.js";
import type { ToolCallRecord } from "../tools/registry.js";

/**
 * 턴 진행 이벤트 스트림 계약.
 * CLI는 이 유니온만 구독하면 턴 진행 상황을 그대로 보여줄 수 있다.
 */
export type ChatTurnEvent =
  | { type: "turn-start"; userId: string; historyLength: number }
  | { type: "model-call"; userId: string; iteration: number; messageCount: number }
  | { type: "model-error"; userId: string; iteration: number; error: string }
  | { type: "tool-start"; userId: string; iteration: number; name: string; toolUseId: string }
  | {
      type: "tool-result";
      userId: string;
      iteration: number;
      name: string;
      toolUseId: string;
      status: "ok" | "unknown-tool" | "error";
    }
  | { type: "iteration-cap"; userId: string; iterations: number }
  | { type: "history-trimmed"; userId: string; before: number; after: number }
  | { type: "persist-failed"; userId: string; messageCount: number }
  | {
      type: "compaction-start";
      userId: string;
      estimatedTokens: number;
      triggerTokens: number;
      messageCount: number;
      splitIndex: number;
    }
  | {
      type: "compaction-complete";
      userId: string;
      beforeTokens: number;
      afterTokens: number;
      beforeMessages: number;
      afterMessages: number;
    }
  | { type: "compaction-failed"; userId: string; error: string }
  | { type: "turn-complete"; userId: string; iterations: number; usage: TokenUsage };

export type ChatTurnEventHandler = (event: ChatTurnEvent) => void;

export interface AgentTurnSettings {
  model: string;
  maxResponseTokens: number;
  maxIterations: number;
  historyTrimThreshold: number;
  historyTrimKeep: number;
  debugLlmRequests?: boolean;
}

export type AgentTurnResult =
  | {
      ok: true;
      text: string;
      toolCalls: ToolCallRecord[];
      usage: TokenUsage;
      iterations: number;
    }
  | { ok: false; error: string; usage: TokenUsage };

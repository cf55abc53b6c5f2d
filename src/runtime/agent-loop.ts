/**
 * 에이전트 루프 공개 진입점.
 * 외부 코드는 agent-loop/ 하위 파일 대신 이 모듈에서 가져다 쓴다.
 */
export { runAgentTurn, type AgentTurnDependencies } from "./agent-loop/run-loop.js";
export {
  Compactor,
  buildCompactedHistory,
  computeCompactionPlan,
  SUMMARY_MARKER,
  type CompactionOutcome,
  type CompactionSettings,
} from "./agent-loop/context-guard.js";
export { ensureValidHistory, findSafeSplit, trimHistory, type TrimPolicy } from "./agent-loop/history.js";
export { estimateHistoryTokens } from "./agent-loop/helpers.js";
export type { AgentTurnResult, AgentTurnSettings, ChatTurnEvent, ChatTurnEventHandler } from "./agent-loop/types.js";

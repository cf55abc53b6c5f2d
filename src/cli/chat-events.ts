import type { ChatTurnEvent } from "../runtime/agent-loop.js";

/**
 * 파일 목적:
 * - 턴 이벤트를 CLI 한 줄 출력으로 투영한다.
 *
 * 역의존성:
 * - src/cli/chat.ts, src/cli/chat-turn.ts
 */
export function formatChatTurnEvent(event: ChatTurnEvent): string | undefined {
  switch (event.type) {
    case "tool-start":
      return `tool(start)> ${event.name} id=${event.toolUseId}`;
    case "tool-result":
      return `tool(${event.status})> ${event.name} id=${event.toolUseId}`;
    case "model-error":
      return `model(error)> iteration=${event.iteration} ${event.error}`;
    case "iteration-cap":
      return `turn(cap)> iterations=${event.iterations}`;
    case "history-trimmed":
      return `history(trim)> messages=${event.before}->${event.after}`;
    case "persist-failed":
      return `persist(failed)> messages=${event.messageCount}`;
    case "compaction-start":
      return `context-compaction(start)> tokens=${event.estimatedTokens} trigger=${event.triggerTokens} messages=${event.messageCount} split=${event.splitIndex}`;
    case "compaction-complete":
      return `context-compaction(done)> tokens=${event.beforeTokens}->${event.afterTokens} messages=${event.beforeMessages}->${event.afterMessages}`;
    case "compaction-failed":
      return `context-compaction(failed)> ${event.error}`;
    case "turn-start":
    case "model-call":
    case "turn-complete":
      return undefined;
  }
}

export function createEventPrinter(write: (line: string) => void): (event: ChatTurnEvent) => void {
  return (event) => {
    const line = formatChatTurnEvent(event);
    if (line !== undefined) {
      write(`${line}\n`);
    }
  };
}

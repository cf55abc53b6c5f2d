import type { JsonObject, ToolResultBlock, ToolUseBlock } from "../../types/chat.js";
import { isJsonObject } from "../../types/chat.js";
import type { ToolDefinition } from "../../types/model.js";
import { errorMessage } from "../logger.js";

export type ToolOutput = JsonObject | string;

export type ToolHandler = (toolName: string, input: JsonObject, userId: string) => Promise<ToolOutput>;

export type ToolCallOutcome =
  | { status: "ok"; call: ToolUseBlock; output: ToolOutput }
  | { status: "unknown-tool"; call: ToolUseBlock; output: string }
  | { status: "error"; call: ToolUseBlock; output: string; error: string };

export interface ToolCallRecord {
  name: string;
  input: JsonObject;
  result: ToolOutput;
}

export class ToolRegistry {
  private readonly tools = new Map<string, { definition: ToolDefinition; handler: ToolHandler }>();

  register(definition: ToolDefinition, handler: ToolHandler): void {
    if (this.tools.has(definition.name)) {
      throw new Error(`tool already registered: ${definition.name}`);
    }
    this.tools.set(definition.name, { definition, handler });
  }

  catalog(): ToolDefinition[] {
    return [...this.tools.values()].map((entry) => entry.definition);
  }

  async execute(call: ToolUseBlock, userId: string): Promise<ToolCallOutcome> {
    const entry = this.tools.get(call.name);
    if (!entry) {
      return { status: "unknown-tool", call, output: `Unknown tool: ${call.name}` };
    }
    try {
      const output = await entry.handler(call.name, call.input, userId);
      return { status: "ok", call, output };
    } catch (error) {
      const message = errorMessage(error);
      return { status: "error", call, output: `Tool error: ${message}`, error: message };
    }
  }

  /**
   * 한 라운드의 도구 호출을 동시에 실행한다.
   * execute는 실패를 결과로 바꿔 돌려주므로 하나가 실패해도 나머지는 그대로 끝난다.
   * 결과 순서는 모델이 요청한 순서를 따른다.
   */
  async executeAll(calls: ToolUseBlock[], userId: string): Promise<ToolCallOutcome[]> {
    return Promise.all(calls.map((call) => this.execute(call, userId)));
  }
}

export function toToolResultBlock(outcome: ToolCallOutcome): ToolResultBlock {
  return {
    type: "tool_result",
    tool_use_id: outcome.call.id,
    content: typeof outcome.output === "string" ? outcome.output : JSON.stringify(outcome.output),
  };
}

function parseJsonObject(value: string): JsonObject | undefined {
  try {
    const parsed: unknown = JSON.parse(value);
    return isJsonObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export function toToolCallRecord(outcome: ToolCallOutcome): ToolCallRecord {
  const result = typeof outcome.output === "string" ? parseJsonObject(outcome.output) ?? outcome.output : outcome.output;
  return { name: outcome.call.name, input: { ...outcome.call.input }, result };
}

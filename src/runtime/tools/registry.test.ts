import { describe, expect, it } from "vitest";
import { delay } from "../../testing/fakes.js";
import type { ToolUseBlock } from "../../types/chat.js";
import { ToolRegistry, toToolCallRecord, toToolResultBlock } from "./registry.js";

const schema = { type: "object" as const };

function call(id: string, name: string): ToolUseBlock {
  return { type: "tool_use", id, name, input: {} };
}

describe("ToolRegistry", () => {
  it("rejects duplicate registrations", () => {
    const registry = new ToolRegistry();
    registry.register({ name: "read_memory", description: "memory", input_schema: schema }, async () => "ok");
    expect(() =>
      registry.register({ name: "read_memory", description: "memory", input_schema: schema }, async () => "ok"),
    ).toThrow("tool already registered: read_memory");
  });

  it("turns unknown tools and handler errors into outcomes", async () => {
    const registry = new ToolRegistry();
    registry.register({ name: "check_condition", description: "condition", input_schema: schema }, async () => {
      throw new Error("backend down");
    });

    await expect(registry.execute(call("t1", "nope"), "u1")).resolves.toEqual({
      status: "unknown-tool",
      call: call("t1", "nope"),
      output: "Unknown tool: nope",
    });
    await expect(registry.execute(call("t2", "check_condition"), "u1")).resolves.toEqual({
      status: "error",
      call: call("t2", "check_condition"),
      output: "Tool error: backend down",
      error: "backend down",
    });
  });

  it("passes the user id to handlers and keeps request order", async () => {
    const registry = new ToolRegistry();
    const seen: string[] = [];
    registry.register({ name: "slow", description: "slow", input_schema: schema }, async (_name, _input, userId) => {
      await delay(20);
      seen.push(`slow:${userId}`);
      return "slow-done";
    });
    registry.register({ name: "fast", description: "fast", input_schema: schema }, async (_name, _input, userId) => {
      seen.push(`fast:${userId}`);
      return { done: true };
    });

    const outcomes = await registry.executeAll([call("t1", "slow"), call("t2", "fast")], "u7");

    expect(outcomes.map((outcome) => outcome.call.id)).toEqual(["t1", "t2"]);
    expect(seen).toEqual(["fast:u7", "slow:u7"]);
    expect(registry.catalog().map((tool) => tool.name)).toEqual(["slow", "fast"]);
  });
});

describe("tool result conversion", () => {
  it("serializes object output for the model", () => {
    expect(toToolResultBlock({ status: "ok", call: call("t1", "fast"), output: { done: true } })).toEqual({
      type: "tool_result",
      tool_use_id: "t1",
      content: "{\"done\":true}",
    });
  });

  it("parses JSON object strings in call records and keeps other strings", () => {
    expect(toToolCallRecord({ status: "ok", call: call("t1", "a"), output: "{\"a\":1}" }).result).toEqual({ a: 1 });
    expect(toToolCallRecord({ status: "ok", call: call("t1", "a"), output: "[1]" }).result).toBe("[1]");
    expect(toToolCallRecord({ status: "ok", call: call("t1", "a"), output: "plain" }).result).toBe("plain");
  });

  it("copies the tool input into call records", () => {
    const block: ToolUseBlock = { type: "tool_use", id: "t1", name: "record_exercise", input: { sets: 5 } };
    const record = toToolCallRecord({ status: "ok", call: block, output: "ok" });

    record.input.sets = 1;

    expect(block.input).toEqual({ sets: 5 });
  });
});

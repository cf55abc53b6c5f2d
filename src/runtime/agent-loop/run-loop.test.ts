import { describe, expect, it } from "vitest";
import {
  MemoryMessageStore,
  ScriptedMessagesApi,
  createMemoryLogger,
  delay,
  textResponse,
  toolUseResponse,
} from "../../testing/fakes.js";
import type { ChatMessage, ChatSession } from "../../types/chat.js";
import type { ModelResponse } from "../../types/model.js";
import { ToolRegistry } from "../tools/registry.js";
import { Compactor } from "./context-guard.js";
import { runAgentTurn } from "./run-loop.js";
import type { AgentTurnSettings, ChatTurnEvent } from "./types.js";

const objectSchema = { type: "object" as const, properties: {} };

function buildTools(): ToolRegistry {
  const tools = new ToolRegistry();
  tools.register({ name: "get_user_profile", description: "profile", input_schema: objectSchema }, async () => {
    await delay(20);
    return { name: "민수" };
  });
  tools.register({ name: "read_memory", description: "memory", input_schema: objectSchema }, async () => "no memory yet");
  tools.register({ name: "record_exercise", description: "record", input_schema: objectSchema }, async () => {
    throw new Error("boom");
  });
  return tools;
}

function setup(steps: Array<ModelResponse | Error>, history: ChatMessage[] = [], overrides: Partial<AgentTurnSettings> = {}) {
  const api = new ScriptedMessagesApi(steps);
  const store = new MemoryMessageStore();
  const { logger, lines } = createMemoryLogger();
  const events: ChatTurnEvent[] = [];
  const onEvent = (event: ChatTurnEvent): void => {
    events.push(event);
  };
  const settings: AgentTurnSettings = {
    model: "test-model",
    maxResponseTokens: 512,
    maxIterations: 10,
    historyTrimThreshold: 100,
    historyTrimKeep: 80,
    ...overrides,
  };
  const compactor = new Compactor(
    api,
    store,
    { model: "test-model", summaryMaxTokens: 256, maxConversationTokens: 150_000 },
    logger,
    onEvent,
  );
  const session: ChatSession = { userId: "u1", messages: [...history], loaded: true };
  const deps = { api, store, tools: buildTools(), compactor, settings, logger, onEvent };
  return { api, store, lines, events, session, deps };
}

describe("runAgentTurn", () => {
  it("appends the user message and the final answer", async () => {
    const { api, store, session, deps } = setup([textResponse("안녕하세요!")]);

    const result = await runAgentTurn(deps, session, "안녕", "system");

    expect(result).toEqual({
      ok: true,
      text: "안녕하세요!",
      toolCalls: [],
      usage: { inputTokens: 10, outputTokens: 5 },
      iterations: 1,
    });
    expect(session.messages).toEqual([
      { role: "user", content: "안녕" },
      { role: "assistant", content: [{ type: "text", text: "안녕하세요!" }], tokenCount: 5 },
    ]);
    expect(store.saveCalls).toEqual([{ userId: "u1", messages: session.messages }]);
    expect(api.requests[0].system).toBe("system");
    expect(api.requests[0].tools?.map((tool) => tool.name)).toEqual(["get_user_profile", "read_memory", "record_exercise"]);
  });

  it("runs one round of tools concurrently and answers in request order", async () => {
    const { api, session, deps } = setup([
      toolUseResponse([
        { id: "t1", name: "get_user_profile" },
        { id: "t2", name: "read_memory" },
      ]),
      textResponse("프로필을 확인했어요."),
    ]);

    const result = await runAgentTurn(deps, session, "내 정보 알려줘", "system");

    expect(session.messages).toHaveLength(4);
    expect(session.messages[2]).toEqual({
      role: "user",
      content: [
        { type: "tool_result", tool_use_id: "t1", content: "{\"name\":\"민수\"}" },
        { type: "tool_result", tool_use_id: "t2", content: "no memory yet" },
      ],
    });
    expect(api.requests[1].messages).toHaveLength(3);
    expect(result).toMatchObject({
      ok: true,
      text: "프로필을 확인했어요.",
      iterations: 2,
      usage: { inputTokens: 20, outputTokens: 10 },
      toolCalls: [
        { name: "get_user_profile", input: {}, result: { name: "민수" } },
        { name: "read_memory", input: {}, result: "no memory yet" },
      ],
    });
  });

  it("reports unknown tools and tool errors back to the model", async () => {
    const { session, events, lines, deps } = setup([
      toolUseResponse([
        { id: "t1", name: "teleport" },
        { id: "t2", name: "record_exercise", input: { exercise: "squat" } },
      ]),
      textResponse("다시 시도해 볼게요."),
    ]);

    await runAgentTurn(deps, session, "기록해줘", "system");

    expect(session.messages[2].content).toEqual([
      { type: "tool_result", tool_use_id: "t1", content: "Unknown tool: teleport" },
      { type: "tool_result", tool_use_id: "t2", content: "Tool error: boom" },
    ]);
    const statuses = events.flatMap((event) => (event.type === "tool-result" ? [event.status] : []));
    expect(statuses).toEqual(["unknown-tool", "error"]);
    expect(lines).toContain("[error] tool failed userId=u1 tool=record_exercise error=boom\n");
  });

  it("rolls back every message of the turn when the model fails", async () => {
    const history: ChatMessage[] = [
      { role: "user", content: "어제 운동 했어" },
      { role: "assistant", content: "잘하셨어요" },
    ];
    const { store, events, session, deps } = setup(
      [toolUseResponse([{ id: "t1", name: "read_memory" }]), new Error("rate limited")],
      history,
    );

    const result = await runAgentTurn(deps, session, "오늘은?", "system");

    expect(result).toEqual({ ok: false, error: "rate limited", usage: { inputTokens: 10, outputTokens: 5 } });
    expect(session.messages).toEqual(history);
    expect(store.saveCalls).toHaveLength(0);
    expect(events.at(-1)).toEqual({ type: "model-error", userId: "u1", iteration: 2, error: "rate limited" });
  });

  it("stops at the iteration cap", async () => {
    const { session, events, deps } = setup(
      [toolUseResponse([{ id: "t1", name: "read_memory" }]), toolUseResponse([{ id: "t2", name: "read_memory" }])],
      [],
      { maxIterations: 2 },
    );

    const result = await runAgentTurn(deps, session, "계속 찾아봐", "system");

    expect(result).toMatchObject({ ok: true, text: "", iterations: 2 });
    expect(session.messages).toHaveLength(5);
    expect(events).toContainEqual({ type: "iteration-cap", userId: "u1", iterations: 2 });
  });

  it("keeps the turn when persistence fails", async () => {
    const { store, events, session, deps } = setup([textResponse("좋아요")]);
    store.saveResult = false;

    const result = await runAgentTurn(deps, session, "고마워", "system");

    expect(result.ok).toBe(true);
    expect(session.messages).toHaveLength(2);
    expect(events).toContainEqual({ type: "persist-failed", userId: "u1", messageCount: 2 });
  });

  it("does not append an empty assistant message", async () => {
    const { session, deps } = setup([{ stopReason: "end_turn", content: [], usage: { inputTokens: 1, outputTokens: 0 } }]);

    const result = await runAgentTurn(deps, session, "...", "system");

    expect(result).toMatchObject({ ok: true, text: "" });
    expect(session.messages).toEqual([{ role: "user", content: "..." }]);
  });

  it("drops an unpaired tool_use block when the response is cut off", async () => {
    const { store, session, deps } = setup([
      {
        stopReason: "max_tokens",
        content: [
          { type: "text", text: "기록을 남길게요" },
          { type: "tool_use", id: "t9", name: "record_exercise", input: { weight: 100 } },
        ],
        usage: { inputTokens: 10, outputTokens: 5 },
      },
      textResponse("다음 세트도 화이팅!"),
    ]);

    const first = await runAgentTurn(deps, session, "스쿼트 100kg 5회", "system");
    expect(first).toMatchObject({ ok: true, text: "기록을 남길게요", toolCalls: [] });
    expect(session.messages[1]).toEqual({
      role: "assistant",
      content: [{ type: "text", text: "기록을 남길게요" }],
      tokenCount: 5,
    });

    const second = await runAgentTurn(deps, session, "다음", "system");
    expect(second.ok).toBe(true);
    const blockTypes = session.messages.flatMap((message) =>
      typeof message.content === "string" ? [] : message.content.map((block) => block.type),
    );
    expect(blockTypes).not.toContain("tool_use");
    expect(store.histories.get("u1")).toHaveLength(4);
  });

  it("skips a cut-off response that only held a tool_use block", async () => {
    const { session, deps } = setup([
      {
        stopReason: "max_tokens",
        content: [{ type: "tool_use", id: "t9", name: "read_memory", input: {} }],
        usage: { inputTokens: 10, outputTokens: 5 },
      },
    ]);

    const result = await runAgentTurn(deps, session, "기억해?", "system");

    expect(result).toMatchObject({ ok: true, text: "" });
    expect(session.messages).toEqual([{ role: "user", content: "기억해?" }]);
  });

  it("trims the history past the threshold but saves only the new messages", async () => {
    const history: ChatMessage[] = [
      { role: "user", content: "1" },
      { role: "assistant", content: "2" },
      { role: "user", content: "3" },
      { role: "assistant", content: "4" },
    ];
    const { store, events, session, deps } = setup([textResponse("6")], history, {
      historyTrimThreshold: 4,
      historyTrimKeep: 2,
    });

    await runAgentTurn(deps, session, "5", "system");

    expect(session.messages).toEqual([
      { role: "user", content: "5" },
      { role: "assistant", content: [{ type: "text", text: "6" }], tokenCount: 5 },
    ]);
    expect(store.saveCalls[0].messages).toHaveLength(2);
    expect(events).toContainEqual({ type: "history-trimmed", userId: "u1", before: 6, after: 2 });
  });
});

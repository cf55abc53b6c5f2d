import { describe, expect, it } from "vitest";
import { fromSdkContentBlock, toSdkMessages, toStopReason } from "./anthropic.js";

describe("SDK content conversion", () => {
  it("keeps text and tool_use blocks", () => {
    expect(fromSdkContentBlock({ type: "text", text: "안녕" })).toEqual({ type: "text", text: "안녕" });
    expect(fromSdkContentBlock({ type: "tool_use", id: "t1", name: "read_memory", input: { limit: 5 } })).toEqual({
      type: "tool_use",
      id: "t1",
      name: "read_memory",
      input: { limit: 5 },
    });
  });

  it("replaces a non-object tool input with an empty object", () => {
    expect(fromSdkContentBlock({ type: "tool_use", id: "t1", name: "read_memory", input: "oops" })).toMatchObject({
      input: {},
    });
  });

  it("preserves unknown blocks as JSON text", () => {
    expect(fromSdkContentBlock({ type: "redacted_thinking", data: "abc" })).toEqual({
      type: "text",
      text: "{\"type\":\"redacted_thinking\",\"data\":\"abc\"}",
    });
  });

  it("converts history to SDK message params", () => {
    expect(
      toSdkMessages([
        { role: "user", content: "hi", tokenCount: 3 },
        { role: "user", content: [{ type: "tool_result", tool_use_id: "t1", content: "ok" }] },
      ]),
    ).toEqual([
      { role: "user", content: "hi" },
      { role: "user", content: [{ type: "tool_result", tool_use_id: "t1", content: "ok" }] },
    ]);
  });

  it("maps unrecognized stop reasons to unknown", () => {
    expect(toStopReason("tool_use")).toBe("tool_use");
    expect(toStopReason(null)).toBe("unknown");
    expect(toStopReason("pause_turn")).toBe("unknown");
  });
});

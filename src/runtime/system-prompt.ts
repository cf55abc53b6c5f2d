import { readFile } from "node:fs/promises";
import type { JsonObject } from "../types/chat.js";
import { isJsonObject } from "../types/chat.js";
import type { UserContext } from "./user-context.js";

const MAX_KEY_FACTS = 30;
const NO_FACTS_TEXT = "아직 기록된 사실이 없습니다.";

const PROFILE_DEFAULTS: Record<string, string> = {
  name: "사용자",
  current_level: "beginner",
  numeric_level: "1",
  fitness_goal: "일반 체력",
  injuries: "없음",
  height: "?",
  weight: "?",
};

export async function loadSystemPromptTemplate(pathname: string): Promise<string> {
  const raw = await readFile(pathname, "utf-8");
  return raw.trim();
}

function profileValue(profile: JsonObject, key: string): string {
  const value = profile[key];
  if (typeof value === "string" && value.trim()) {
    return value.trim();
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return PROFILE_DEFAULTS[key] ?? "?";
}

function formatKeyFacts(memory: JsonObject): string {
  const facts = Array.isArray(memory.key_facts) ? memory.key_facts : [];
  const lines = facts
    .filter(isJsonObject)
    .slice(0, MAX_KEY_FACTS)
    .map((fact) => `- [${String(fact.category ?? "기타")}] ${String(fact.content ?? "")}`);
  return lines.length > 0 ? lines.join("\n") : NO_FACTS_TEXT;
}

/**
 * {{key}} 자리표시자를 사용자 프로필/메모리 값으로 채운다.
 * 알 수 없는 자리표시자는 빈 문자열이 된다.
 */
export function renderSystemPrompt(template: string, context: UserContext): string {
  const profile = context.profile ?? {};
  const memory = context.memory ?? {};
  const personality = memory.personality_profile;

  const values: Record<string, string> = {
    key_facts: formatKeyFacts(memory),
    personality:
      typeof personality === "string" && personality.trim() ? `- 성격/대화 스타일: ${personality.trim()}` : "",
  };
  for (const key of Object.keys(PROFILE_DEFAULTS)) {
    values[key] = profileValue(profile, key);
  }

  return template.replace(/\{\{(\w+)\}\}/g, (_match, key: string) => values[key] ?? "").replace(/\n{3,}/g, "\n\n");
}

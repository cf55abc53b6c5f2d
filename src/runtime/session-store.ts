import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { InternalApiClient } from "../adapter/backend/internal-api.js";
import type { ChatMessage } from "../types/chat.js";
import { hasToolResult, isEmptyContent } from "./agent-loop/helpers.js";
import type { Logger } from "./logger.js";
import { errorMessage } from "./logger.js";

/**
 * 파일 목적:
 * - 사용자별 대화 이력의 영속화(load/append/replace)를 담당한다.
 * - 저장 포맷(StoredRow)과 메모리 포맷(ChatMessage) 사이의 변환만 하고 다른 로직은 두지 않는다.
 *
 * 주요 의존성:
 * - adapter/backend/internal-api: 백엔드 세션 엔드포인트
 * - zod: 저장된 row 검증
 *
 * 역의존성:
 * - runtime/session-cache.ts (hydration), runtime/agent-loop/run-loop.ts (턴 종료 저장),
 *   runtime/agent-loop/context-guard.ts (compaction 후 교체)
 */

export interface MessageStore {
  loadHistory(userId: string): Promise<ChatMessage[]>;
  saveMessages(userId: string, messages: ChatMessage[]): Promise<boolean>;
  replaceHistory(userId: string, messages: ChatMessage[]): Promise<boolean>;
}

const contentBlockSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("text"), text: z.string() }),
  z.object({ type: z.literal("tool_use"), id: z.string(), name: z.string(), input: z.record(z.unknown()) }),
  z.object({ type: z.literal("tool_result"), tool_use_id: z.string(), content: z.string() }),
]);

// 과거 compaction 결과는 { type: "summary", text } 객체로 저장되어 있을 수 있다.
const summaryContentSchema = z.object({ type: z.literal("summary"), text: z.string() });

export const storedRowSchema = z.object({
  role: z.enum(["user", "assistant", "tool_result"]),
  content: z.union([z.string(), z.array(contentBlockSchema), summaryContentSchema]),
  token_count: z.number().nullish(),
});

export type StoredRow = z.infer<typeof storedRowSchema>;

export function toStoredRow(message: ChatMessage): StoredRow {
  return {
    role: message.role === "user" && hasToolResult(message) ? "tool_result" : message.role,
    content: message.content,
    token_count: message.tokenCount ?? 0,
  };
}

export function fromStoredRow(row: StoredRow): ChatMessage | undefined {
  const content = Array.isArray(row.content) || typeof row.content === "string" ? row.content : row.content.text;
  if (isEmptyContent(content)) {
    return undefined;
  }
  const message: ChatMessage = {
    // 모델 프로토콜은 user/assistant만 인정하므로 tool_result 배치는 user로 되돌린다.
    role: row.role === "tool_result" ? "user" : row.role,
    content,
  };
  if (typeof row.token_count === "number" && row.token_count > 0) {
    message.tokenCount = row.token_count;
  }
  return message;
}

/**
 * 검증에 실패한 row와 비어 있는 row는 건너뛴다.
 */
export function parseStoredRows(raw: unknown): ChatMessage[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  const messages: ChatMessage[] = [];
  for (const candidate of raw) {
    const parsed = storedRowSchema.safeParse(candidate);
    if (!parsed.success) {
      continue;
    }
    const message = fromStoredRow(parsed.data);
    if (message) {
      messages.push(message);
    }
  }
  return messages;
}

export class BackendMessageStore implements MessageStore {
  constructor(
    private readonly client: InternalApiClient,
    private readonly logger: Logger,
  ) {}

  private messagesPath(userId: string): string {
    return `/sessions/${encodeURIComponent(userId)}/messages`;
  }

  async loadHistory(userId: string): Promise<ChatMessage[]> {
    try {
      const response = await this.client.request("GET", this.messagesPath(userId), userId);
      if (response.success !== true) {
        return [];
      }
      return parseStoredRows(response.messages);
    } catch (error) {
      this.logger.warn("failed to load history", { userId, error: errorMessage(error) });
      return [];
    }
  }

  async saveMessages(userId: string, messages: ChatMessage[]): Promise<boolean> {
    if (messages.length === 0) {
      return true;
    }
    try {
      const response = await this.client.request("POST", this.messagesPath(userId), userId, {
        body: { messages: messages.map(toStoredRow) },
      });
      return response.success === true;
    } catch (error) {
      this.logger.error("failed to save messages", { userId, error: errorMessage(error) });
      return false;
    }
  }

  async replaceHistory(userId: string, messages: ChatMessage[]): Promise<boolean> {
    try {
      const response = await this.client.request("POST", `/sessions/${encodeURIComponent(userId)}/summarize`, userId, {
        body: { messages: messages.map(toStoredRow) },
      });
      return response.success === true;
    } catch (error) {
      this.logger.error("failed to replace history", { userId, error: errorMessage(error) });
      return false;
    }
  }
}

const sessionFileSchema = z.object({
  userId: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  rows: z.array(z.unknown()),
});

type SessionFile = z.infer<typeof sessionFileSchema>;

function nowIso(): string {
  return new Date().toISOString();
}

function normalizeSessionId(input: string): string {
  const normalized = input.trim().toLowerCase().replace(/[^a-z0-9-_]/g, "-");
  return normalized || "default";
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * 사용자당 JSON 파일 하나에 row를 쌓는 로컬 저장소.
 * 백엔드 없이 CLI를 돌릴 때 쓴다.
 */
export class FileMessageStore implements MessageStore {
  constructor(
    private readonly sessionDir: string,
    private readonly logger: Logger,
  ) {}

  private sessionFile(userId: string): string {
    return path.join(this.sessionDir, `${normalizeSessionId(userId)}.json`);
  }

  private async readSessionFile(userId: string): Promise<SessionFile | undefined> {
    try {
      const raw = await readFile(this.sessionFile(userId), "utf-8");
      return sessionFileSchema.parse(JSON.parse(raw));
    } catch (error) {
      if (isMissingFileError(error)) {
        return undefined;
      }
      throw error;
    }
  }

  private async writeSessionFile(userId: string, rows: unknown[], createdAt?: string): Promise<void> {
    await mkdir(this.sessionDir, { recursive: true });
    const file: SessionFile = {
      userId,
      createdAt: createdAt ?? nowIso(),
      updatedAt: nowIso(),
      rows,
    };
    await writeFile(this.sessionFile(userId), JSON.stringify(file, null, 2), "utf-8");
  }

  async loadHistory(userId: string): Promise<ChatMessage[]> {
    try {
      const file = await this.readSessionFile(userId);
      return file ? parseStoredRows(file.rows) : [];
    } catch (error) {
      this.logger.warn("failed to load history", { userId, error: errorMessage(error) });
      return [];
    }
  }

  async saveMessages(userId: string, messages: ChatMessage[]): Promise<boolean> {
    if (messages.length === 0) {
      return true;
    }
    try {
      const file = await this.readSessionFile(userId);
      await this.writeSessionFile(userId, [...(file?.rows ?? []), ...messages.map(toStoredRow)], file?.createdAt);
      return true;
    } catch (error) {
      this.logger.error("failed to save messages", { userId, error: errorMessage(error) });
      return false;
    }
  }

  async replaceHistory(userId: string, messages: ChatMessage[]): Promise<boolean> {
    try {
      const file = await this.readSessionFile(userId);
      await this.writeSessionFile(userId, messages.map(toStoredRow), file?.createdAt);
      return true;
    } catch (error) {
      this.logger.error("failed to replace history", { userId, error: errorMessage(error) });
      return false;
    }
  }
}

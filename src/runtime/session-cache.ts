import type { ChatMessage, ChatSession } from "../types/chat.js";
import { ensureValidHistory } from "./agent-loop/history.js";
import { KeyedMutex } from "./keyed-mutex.js";
import type { Logger } from "./logger.js";
import type { MessageStore } from "./session-store.js";

/**
 * 파일 목적:
 * - 사용자별 대화 이력의 프로세스 메모리 사본을 관리한다.
 *
 * 주요 의존성:
 * - session-store: 최초 접근 시 hydration
 * - keyed-mutex: 사용자 단위 직렬화
 *
 * 역의존성:
 * - chat-service.ts, agent-loop/run-loop.ts
 *
 * 규칙:
 * - hydration은 사용자당 프로세스 수명 동안 한 번. 락을 잡은 뒤 loaded 플래그로 다시 확인한다.
 * - info/reset은 I/O를 하지 않는다.
 */
export class SessionCache {
  private readonly sessions = new Map<string, ChatSession>();
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly store: MessageStore,
    private readonly logger: Logger,
  ) {}

  private sessionFor(userId: string): ChatSession {
    let session = this.sessions.get(userId);
    if (!session) {
      session = { userId, messages: [], loaded: false };
      this.sessions.set(userId, session);
    }
    return session;
  }

  private async hydrateUnlocked(userId: string): Promise<ChatSession> {
    const session = this.sessionFor(userId);
    if (session.loaded) {
      return session;
    }
    const stored = await this.store.loadHistory(userId);
    session.messages = ensureValidHistory(stored);
    session.loaded = true;
    if (session.messages.length > 0) {
      this.logger.info("hydrated session", {
        userId,
        messages: session.messages.length,
        dropped: stored.length - session.messages.length,
      });
    }
    return session;
  }

  /**
   * 사용자 락을 잡고 (필요하면 hydration 후) 세션에 배타적으로 접근한다.
   */
  async withSession<T>(userId: string, task: (session: ChatSession) => Promise<T>): Promise<T> {
    return this.locks.withLock(userId, async () => task(await this.hydrateUnlocked(userId)));
  }

  async get(userId: string): Promise<ChatMessage[]> {
    return this.withSession(userId, async (session) => [...session.messages]);
  }

  /**
   * 캐시만 비운다. 저장소 데이터는 건드리지 않으며 다음 접근 때 다시 hydration 한다.
   */
  reset(userId: string): void {
    this.sessions.delete(userId);
  }

  info(userId: string): { messageCount: number; active: boolean } {
    const messageCount = this.sessions.get(userId)?.messages.length ?? 0;
    return { messageCount, active: messageCount > 0 };
  }

  clear(): void {
    this.sessions.clear();
  }
}

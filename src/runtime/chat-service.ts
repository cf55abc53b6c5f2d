import { resolveMessagesApi } from "../adapter/api/index.js";
import { InternalApiClient } from "../adapter/backend/internal-api.js";
import type { AppConfig } from "../config/env.js";
import { resolveModelCandidate } from "../config/env.js";
import type { MessagesApi } from "../core/api/messages-api.js";
import type { SessionInfo } from "../types/chat.js";
import type { TokenUsage } from "../types/model.js";
import type { AgentTurnSettings, ChatTurnEventHandler, CompactionSettings } from "./agent-loop.js";
import { Compactor, runAgentTurn } from "./agent-loop.js";
import type { Logger } from "./logger.js";
import { errorMessage } from "./logger.js";
import { SessionCache } from "./session-cache.js";
import type { MessageStore } from "./session-store.js";
import { BackendMessageStore, FileMessageStore } from "./session-store.js";
import { loadSystemPromptTemplate, renderSystemPrompt } from "./system-prompt.js";
import { loadToolCatalog, registerBackendTools } from "./tools/backend-tools.js";
import type { ToolCallRecord } from "./tools/registry.js";
import { ToolRegistry } from "./tools/registry.js";
import type { UserContext } from "./user-context.js";
import { fetchUserContext } from "./user-context.js";

/**
 * 파일 목적:
 * - 외부 진입점(HTTP 레이어, CLI)이 호출하는 chat/resetSession/sessionInfo 계약을 제공한다.
 *
 * 주요 의존성:
 * - session-cache: 사용자 락 + hydration
 * - agent-loop: 턴 실행 + compaction
 * - system-prompt/user-context: 개인화 시스템 프롬프트
 *
 * 역의존성:
 * - src/cli/chat.ts, src/cli/chat-turn.ts
 */

export interface ChatResult {
  success: boolean;
  message?: string;
  error?: string;
  toolCalls?: ToolCallRecord[];
  usage?: TokenUsage;
}

export type ChatServiceSettings = AgentTurnSettings & Omit<CompactionSettings, "model" | "debugLlmRequests">;

export interface ChatServiceOptions {
  cache: SessionCache;
  store: MessageStore;
  api: MessagesApi;
  tools: ToolRegistry;
  settings: ChatServiceSettings;
  systemPromptTemplate: string;
  contextLoader?: (userId: string) => Promise<UserContext>;
  logger: Logger;
  onEvent?: ChatTurnEventHandler;
}

export class ChatService {
  private readonly compactor: Compactor;

  constructor(private readonly options: ChatServiceOptions) {
    this.compactor = new Compactor(
      options.api,
      options.store,
      {
        model: options.settings.model,
        summaryMaxTokens: options.settings.summaryMaxTokens,
        maxConversationTokens: options.settings.maxConversationTokens,
        debugLlmRequests: options.settings.debugLlmRequests,
      },
      options.logger,
      options.onEvent,
    );
  }

  async loadUserContext(userId: string): Promise<UserContext> {
    return this.options.contextLoader ? this.options.contextLoader(userId) : {};
  }

  async chat(userId: string, message: string, context?: UserContext): Promise<ChatResult> {
    if (!message.trim()) {
      return { success: false, error: "message is required" };
    }

    const userContext = context ?? (await this.loadUserContext(userId));
    const systemPrompt = renderSystemPrompt(this.options.systemPromptTemplate, userContext);

    try {
      const result = await this.options.cache.withSession(userId, (session) =>
        runAgentTurn(
          {
            api: this.options.api,
            store: this.options.store,
            tools: this.options.tools,
            compactor: this.compactor,
            settings: this.options.settings,
            logger: this.options.logger,
            onEvent: this.options.onEvent,
          },
          session,
          message,
          systemPrompt,
        ),
      );

      if (!result.ok) {
        return { success: false, error: result.error };
      }
      return { success: true, message: result.text, toolCalls: result.toolCalls, usage: result.usage };
    } catch (error) {
      this.options.logger.error("chat turn failed", { userId, error: errorMessage(error) });
      return { success: false, error: errorMessage(error) };
    }
  }

  resetSession(userId: string): void {
    this.options.cache.reset(userId);
  }

  sessionInfo(userId: string): SessionInfo {
    return { userId, ...this.options.cache.info(userId) };
  }

  shutdown(): void {
    this.options.cache.clear();
  }
}

function createBackendClient(config: AppConfig, fetchImpl?: typeof fetch): InternalApiClient | undefined {
  if (!config.backendApiUrl || !config.backendApiToken) {
    return undefined;
  }
  return new InternalApiClient({
    baseUrl: config.backendApiUrl,
    token: config.backendApiToken,
    timeoutMs: config.backendTimeoutMs,
    fetchImpl,
  });
}

/**
 * 프로세스 시작 시 한 번 호출해 서비스 그래프를 조립한다.
 */
export async function createChatService(
  config: AppConfig,
  params: { logger: Logger; onEvent?: ChatTurnEventHandler; api?: MessagesApi; fetchImpl?: typeof fetch },
): Promise<ChatService> {
  const { logger } = params;
  const client = createBackendClient(config, params.fetchImpl);

  let store: MessageStore;
  if (config.storeDriver === "file") {
    store = new FileMessageStore(config.sessionDir, logger);
  } else {
    if (!client) {
      throw new Error("Missing required env var: BACKEND_API_URL / BACKEND_API_TOKEN (or set STORE_DRIVER=file)");
    }
    store = new BackendMessageStore(client, logger);
  }

  const tools = new ToolRegistry();
  if (client) {
    registerBackendTools(tools, client, await loadToolCatalog(config.toolCatalogPath));
  } else {
    logger.warn("backend client is not configured; running without tools");
  }

  return new ChatService({
    cache: new SessionCache(store, logger),
    store,
    api: params.api ?? resolveMessagesApi(resolveModelCandidate(config)),
    tools,
    settings: {
      model: config.anthropicModel,
      maxResponseTokens: config.maxResponseTokens,
      maxIterations: config.maxIterations,
      historyTrimThreshold: config.historyTrimThreshold,
      historyTrimKeep: config.historyTrimKeep,
      summaryMaxTokens: config.summaryMaxTokens,
      maxConversationTokens: config.maxConversationTokens,
      debugLlmRequests: config.debugLlmRequests,
    },
    systemPromptTemplate: await loadSystemPromptTemplate(config.systemPromptPath),
    contextLoader: client ? (userId) => fetchUserContext(client, logger, userId) : undefined,
    logger,
    onEvent: params.onEvent,
  });
}

import type { JsonObject } from "../../types/chat.js";
import { isJsonObject } from "../../types/chat.js";

/**
 * 파일 목적:
 * - 백엔드 내부 API(세션 저장소, 도구 엔드포인트, 사용자 컨텍스트) 호출을 한곳에 모은다.
 *
 * 역의존성:
 * - runtime/session-store.ts, runtime/tools/backend-tools.ts, runtime/user-context.ts
 */

export type HttpMethod = "GET" | "POST";

export type QueryValue = string | number | boolean;

export interface InternalApiOptions {
  baseUrl: string;
  token: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export interface InternalApiRequest {
  query?: Record<string, QueryValue | undefined>;
  body?: JsonObject;
}

export class BackendRequestError extends Error {
  constructor(
    readonly method: HttpMethod,
    readonly path: string,
    readonly status: number,
    readonly responseBody: string,
  ) {
    super(`backend request failed (${method} ${path} -> ${status}): ${responseBody}`);
    this.name = "BackendRequestError";
  }
}

export class InternalApiClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: InternalApiOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async request(method: HttpMethod, path: string, userId: string, request: InternalApiRequest = {}): Promise<JsonObject> {
    const url = new URL(`${this.baseUrl}${path}`);
    const init: RequestInit = {
      method,
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.options.token}`,
      },
      signal: AbortSignal.timeout(this.options.timeoutMs),
    };

    if (method === "GET") {
      for (const [key, value] of Object.entries(request.query ?? {})) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
      url.searchParams.set("user_id", userId);
    } else {
      init.body = JSON.stringify({ ...(request.body ?? {}), user_id: userId });
    }

    const response = await this.fetchImpl(url, init);
    if (!response.ok) {
      throw new BackendRequestError(method, path, response.status, await response.text());
    }

    const data: unknown = await response.json();
    if (!isJsonObject(data)) {
      throw new Error(`backend response is not a JSON object (${method} ${path})`);
    }
    return data;
  }
}

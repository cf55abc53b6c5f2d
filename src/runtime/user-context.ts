import type { InternalApiClient } from "../adapter/backend/internal-api.js";
import type { JsonObject } from "../types/chat.js";
import { isJsonObject } from "../types/chat.js";
import type { Logger } from "./logger.js";
import { errorMessage } from "./logger.js";

export interface UserContext {
  profile?: JsonObject;
  memory?: JsonObject;
}

async function fetchData(
  client: InternalApiClient,
  logger: Logger,
  userId: string,
  kind: "profile" | "memory",
): Promise<JsonObject | undefined> {
  try {
    const response = await client.request("GET", `/users/${encodeURIComponent(userId)}/${kind}`, userId);
    return isJsonObject(response.data) ? response.data : undefined;
  } catch (error) {
    logger.warn(`failed to fetch user ${kind}`, { userId, error: errorMessage(error) });
    return undefined;
  }
}

/**
 * 시스템 프롬프트 개인화용 프로필/메모리를 가져온다. 어느 쪽이 실패해도 나머지로 진행한다.
 */
export async function fetchUserContext(client: InternalApiClient, logger: Logger, userId: string): Promise<UserContext> {
  const [profile, memory] = await Promise.all([
    fetchData(client, logger, userId, "profile"),
    fetchData(client, logger, userId, "memory"),
  ]);
  return {
    ...(profile ? { profile } : {}),
    ...(memory ? { memory } : {}),
  };
}

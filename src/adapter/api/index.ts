import type { MessagesApi } from "../../core/api/messages-api.js";
import type { ResolvedModelCandidate } from "../../types/model.js";
import { AnthropicAdapter } from "./anthropic.js";

const anthropic = new AnthropicAdapter();

export function resolveMessagesApi(candidate: ResolvedModelCandidate): MessagesApi {
  if (candidate.provider === "anthropic") {
    return anthropic.create(candidate);
  }

  throw new Error(`Unsupported provider: ${(candidate as { provider?: string }).provider ?? "<unknown>"}`);
}

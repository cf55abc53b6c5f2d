import type { ModelRequest, ModelResponse, ProviderType, ResolvedModelCandidate } from "../../types/model.js";

export interface MessagesApi {
  create(request: ModelRequest): Promise<ModelResponse>;
}

export interface MessagesAdapter {
  readonly provider: ProviderType;
  create(candidate: ResolvedModelCandidate): MessagesApi;
}

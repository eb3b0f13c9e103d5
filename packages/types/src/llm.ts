import type { AssistantMessage, Conversation } from "./message.js";
import type { ToolChoice, ToolSpec } from "./tool.js";

/** Identifiers of the supported provider backends */
export type ProviderId = "openai" | "anthropic" | "gemini";

/** Request handed to a provider adapter */
export interface AdapterRequest {
  model: string;
  messages: Conversation;
  tools?: readonly ToolSpec[];
  toolChoice?: ToolChoice;
  maxTokens?: number;
  temperature?: number;
}

/** Provider adapter: one per backend, same contract for all */
export interface ProviderAdapter {
  readonly name: ProviderId;

  /** Send the conversation and return the normalized assistant turn */
  send(request: AdapterRequest, signal?: AbortSignal): Promise<AssistantMessage>;
}

/** Options accepted by `Client.invoke` */
export interface InvokeOptions {
  tools?: readonly ToolSpec[];
  toolChoice?: ToolChoice;
  /** Aborts the outstanding request; surfaces CancelledError */
  signal?: AbortSignal;
  maxTokens?: number;
  temperature?: number;
}

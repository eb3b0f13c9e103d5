import type {
  AdapterRequest,
  AssistantMessage,
  Conversation,
  ProviderAdapter,
  ProviderId,
  StopReason,
  TokenUsage,
  ToolCall,
} from "@unillm/types";
import {
  AuthError,
  CancelledError,
  ProviderRequestError,
  UnillmError,
} from "./errors.js";

/** Generate a unique ID (simple, no dependencies) */
export function generateId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`;
}

/** Options shared by all provider adapters */
export interface AdapterOptions {
  apiKey?: string;
  baseUrl?: string;
  /** Max output tokens when the request does not set one */
  defaultMaxTokens?: number;
  /** Log a one-line summary of every request */
  debug?: boolean;
}

/** Pieces an adapter extracts from a provider response */
export interface ResponseParts {
  text: string;
  toolCalls: ToolCall[];
  model: string;
  usage?: TokenUsage;
  stopReason: StopReason;
}

/**
 * Base abstract class for all provider adapters.
 * Implements common logic; subclasses provide API-specific behavior.
 */
export abstract class BaseProviderAdapter implements ProviderAdapter {
  abstract readonly name: ProviderId;

  protected readonly apiKey: string | undefined;
  protected readonly baseUrl: string | undefined;
  protected readonly defaultMaxTokens: number;
  protected readonly debug: boolean;

  constructor(options: AdapterOptions = {}) {
    this.apiKey = options.apiKey || undefined;
    this.baseUrl = options.baseUrl || undefined;
    this.defaultMaxTokens = options.defaultMaxTokens ?? 4096;
    this.debug = options.debug ?? false;
  }

  async send(
    request: AdapterRequest,
    signal?: AbortSignal,
  ): Promise<AssistantMessage> {
    if (!this.apiKey) {
      throw new AuthError(
        this.name,
        undefined,
        "No API key configured for this provider",
      );
    }
    if (signal?.aborted) {
      throw new CancelledError();
    }

    // An empty tool list offers no tools at all
    const tools =
      request.tools && request.tools.length > 0 ? request.tools : undefined;
    const normalized: AdapterRequest = {
      ...request,
      tools,
      toolChoice: tools ? request.toolChoice : undefined,
    };

    if (this.debug) {
      console.debug(
        `[${this.name}] model=${request.model} messages=${request.messages.length} tools=${tools?.length ?? 0}`,
      );
    }

    try {
      return await this.complete(normalized, signal);
    } catch (err) {
      throw this.translateError(err, signal);
    }
  }

  /**
   * Provider round trip. `request.tools` is absent or non-empty, and
   * `toolChoice` is absent without tools. Errors are translated by `send`.
   */
  protected abstract complete(
    request: AdapterRequest,
    signal?: AbortSignal,
  ): Promise<AssistantMessage>;

  /** Map an SDK-specific error onto the library's error taxonomy */
  protected abstract translateProviderError(err: unknown): Error;

  private translateError(err: unknown, signal?: AbortSignal): Error {
    if (err instanceof UnillmError) return err;
    if (signal?.aborted || (err instanceof Error && err.name === "AbortError")) {
      return new CancelledError("Request cancelled", { cause: err });
    }
    return this.translateProviderError(err);
  }

  protected requestError(
    status: number | undefined,
    message: string,
    cause: unknown,
  ): ProviderRequestError {
    if (status === 401 || status === 403) {
      return new AuthError(this.name, status, message, { cause });
    }
    return new ProviderRequestError(this.name, status, message, { cause });
  }

  /** Helper: concatenate system messages for providers with a system field */
  protected systemPrompt(messages: Conversation): string | undefined {
    const parts = messages.flatMap((m) =>
      m.role === "system" ? [m.content] : [],
    );
    return parts.length > 0 ? parts.join("\n\n") : undefined;
  }

  /** Helper: build the normalized assistant turn */
  protected toAssistantMessage(parts: ResponseParts): AssistantMessage {
    const hasToolCalls = parts.toolCalls.length > 0;
    const message: AssistantMessage = { role: "assistant" };

    // Content is only absent for a pure tool-call turn
    if (parts.text || !hasToolCalls) message.content = parts.text;
    if (hasToolCalls) message.toolCalls = parts.toolCalls;

    message.model = parts.model;
    if (parts.usage) message.usage = parts.usage;
    message.stopReason = hasToolCalls ? "tool_use" : parts.stopReason;
    return message;
  }
}

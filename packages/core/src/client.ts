import type {
  AssistantMessage,
  Conversation,
  InvokeOptions,
  ProviderAdapter,
  ProviderId,
} from "@unillm/types";
import {
  AnthropicAdapter,
  ClientClosedError,
  GeminiAdapter,
  OpenAIAdapter,
  ToolSpecError,
  UnknownProviderError,
  validateTools,
  type AdapterOptions,
} from "@unillm/providers";
import { loadConfig } from "./config.js";
import { validateConversation } from "./messages.js";

export const PROVIDERS = [
  "openai",
  "anthropic",
  "gemini",
] as const satisfies readonly ProviderId[];

export function isProviderId(value: string): value is ProviderId {
  return PROVIDERS.some((p) => p === value);
}

export type AdapterFactory = (options: AdapterOptions) => ProviderAdapter;

const ADAPTERS: Record<ProviderId, AdapterFactory> = {
  openai: (options) => new OpenAIAdapter(options),
  anthropic: (options) => new AnthropicAdapter(options),
  gemini: (options) => new GeminiAdapter(options),
};

export interface ClientOptions {
  /** Overrides the provider's API key from the environment */
  apiKey?: string;
  /** Overrides the provider's endpoint from the environment */
  baseUrl?: string;
  /** Default max output tokens */
  maxTokens?: number;
  debug?: boolean;
  /** Environment to read config from (default: process.env) */
  env?: Record<string, string | undefined>;
  /** Replaces the built-in adapter for the provider */
  adapterFactory?: AdapterFactory;
}

export type ClientState = "created" | "open" | "closed";

/** Link several optional signals into one, with listener cleanup */
function linkSignals(...signals: Array<AbortSignal | undefined>): {
  signal: AbortSignal;
  dispose: () => void;
} {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const source of signals) {
    if (!source) continue;
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = () => controller.abort(source.reason);
    source.addEventListener("abort", onAbort, { once: true });
    cleanups.push(() => source.removeEventListener("abort", onAbort));
  }

  return {
    signal: controller.signal,
    dispose: () => cleanups.forEach((cleanup) => cleanup()),
  };
}

/**
 * Unified LLM client for one provider.
 *
 * Lifecycle: created → open → closed. `open()` builds the provider session,
 * `close()` releases it and aborts any outstanding request. A closed client
 * cannot be reopened.
 */
export class Client {
  readonly provider: ProviderId;

  private current: ClientState = "created";
  private adapter: ProviderAdapter | undefined;
  private controller: AbortController | undefined;

  constructor(
    provider: string,
    private readonly options: ClientOptions = {},
  ) {
    if (!isProviderId(provider)) {
      throw new UnknownProviderError(provider);
    }
    this.provider = provider;
  }

  get state(): ClientState {
    return this.current;
  }

  async open(): Promise<this> {
    if (this.current === "closed") {
      throw new ClientClosedError("Client is closed and cannot be reopened");
    }
    if (this.current === "open") return this;

    const config = loadConfig(this.options.env);
    const providerConfig = config.providers[this.provider];
    const factory = this.options.adapterFactory ?? ADAPTERS[this.provider];

    this.adapter = factory({
      apiKey: this.options.apiKey ?? providerConfig.apiKey,
      baseUrl: this.options.baseUrl ?? providerConfig.baseUrl,
      defaultMaxTokens: this.options.maxTokens ?? config.maxTokens,
      debug: this.options.debug ?? config.debug,
    });
    this.controller = new AbortController();
    this.current = "open";
    return this;
  }

  async close(): Promise<void> {
    if (this.current === "closed") return;
    this.controller?.abort();
    this.controller = undefined;
    this.adapter = undefined;
    this.current = "closed";
  }

  /**
   * Send the whole conversation and return the assistant's reply.
   * Without `tools` (or with an empty list) no tool calling is offered.
   */
  async invoke(
    model: string,
    messages: Conversation,
    options: InvokeOptions = {},
  ): Promise<AssistantMessage> {
    const { adapter, controller } = this;
    if (this.current !== "open" || !adapter || !controller) {
      throw new ClientClosedError(
        this.current === "created" ? "Client is not open" : "Client is closed",
      );
    }

    const tools = options.tools ?? [];
    validateTools(tools);
    const { toolChoice } = options;
    if (
      tools.length > 0 &&
      toolChoice &&
      !["auto", "none", "required"].includes(toolChoice) &&
      !tools.some((t) => t.function.name === toolChoice)
    ) {
      throw new ToolSpecError(`Tool choice "${toolChoice}" names no declared tool`);
    }
    validateConversation(messages);

    const linked = linkSignals(controller.signal, options.signal);
    try {
      return await adapter.send(
        {
          model,
          messages,
          tools,
          toolChoice,
          maxTokens: options.maxTokens,
          temperature: options.temperature,
        },
        linked.signal,
      );
    } finally {
      linked.dispose();
    }
  }
}

/** Open a client, run `fn`, and close the client on every exit path */
export async function withClient<T>(
  provider: string,
  fn: (client: Client) => Promise<T>,
  options?: ClientOptions,
): Promise<T> {
  const client = new Client(provider, options);
  await client.open();
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}

import type { ProviderId } from "./llm.js";

/** Provider-specific configuration */
export interface ProviderConfig {
  apiKey?: string;
  baseUrl?: string;
}

/** Full library configuration */
export interface UnillmConfig {
  providers: Record<ProviderId, ProviderConfig>;

  /** Default max output tokens (required by Anthropic) */
  maxTokens: number;

  /** Log a one-line summary of every request */
  debug: boolean;

  /** CLI defaults */
  cli: {
    provider: string;
    model?: string;
  };
}

import { PROVIDERS, isProviderId, loadConfig } from "@unillm/core";
import type { ProviderId } from "@unillm/core";

/** Model used when neither --model nor UNILLM_MODEL is given */
export const DEFAULT_MODELS: Record<ProviderId, string> = {
  openai: "gpt-5-mini",
  anthropic: "claude-sonnet-4-0",
  gemini: "gemini-2.5-flash",
};

export interface CLIConfig {
  provider: ProviderId;
  model: string;
  prompt?: string;
  help: boolean;
  version: boolean;
}

/** Parse argv on top of environment defaults */
export function parseArgs(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
): CLIConfig {
  const config = loadConfig(env);
  let provider = config.cli.provider;
  let model = config.cli.model;
  let help = false;
  let version = false;
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      help = true;
    } else if (arg === "--version" || arg === "-v") {
      version = true;
    } else if (arg === "--provider" || arg === "--model") {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error(`${arg} needs a value`);
      }
      if (arg === "--provider") provider = value;
      else model = value;
      i++;
    } else {
      words.push(arg);
    }
  }

  const providerId = provider.toLowerCase();
  if (!isProviderId(providerId)) {
    throw new Error(
      `Unknown provider: ${provider}. Supported: ${PROVIDERS.join(", ")}`,
    );
  }

  return {
    provider: providerId,
    model: model ?? DEFAULT_MODELS[providerId],
    prompt: words.length > 0 ? words.join(" ") : undefined,
    help,
    version,
  };
}

#!/usr/bin/env node
import "dotenv/config";
import { withClient } from "@unillm/core";
import { parseArgs } from "./config.js";
import { ask, startChat } from "./chat.js";

const VERSION = "0.1.0";

async function main(): Promise<void> {
  const config = parseArgs(process.argv.slice(2));

  if (config.help) {
    printHelp();
    return;
  }
  if (config.version) {
    console.log(`unillm v${VERSION}`);
    return;
  }

  await withClient(config.provider, async (client) => {
    if (config.prompt) {
      console.log(await ask({ client, model: config.model }, config.prompt));
    } else {
      await startChat({ client, model: config.model });
    }
  });
}

function printHelp(): void {
  console.log(`
unillm v${VERSION} — one client for OpenAI, Anthropic and Gemini

Usage:
  unillm [options] [prompt...]

With a prompt, sends it once and prints the reply.
Without one, starts an interactive chat.

Options:
  --provider <name>   openai, anthropic or gemini
  --model <name>      Model id (default depends on provider)
  --help, -h          Show this help
  --version, -v       Show version

Environment Variables:
  UNILLM_PROVIDER      Default provider (default: openai)
  UNILLM_MODEL         Default model
  UNILLM_MAX_TOKENS    Default max output tokens (default: 4096)
  UNILLM_DEBUG         Log a summary line per request (1/true)
  OPENAI_API_KEY       API key for OpenAI
  OPENAI_BASE_URL      OpenAI-compatible endpoint
  ANTHROPIC_API_KEY    API key for Anthropic
  GEMINI_API_KEY       API key for Gemini (or GOOGLE_API_KEY)

Examples:
  unillm --provider anthropic "Say hello in three words"
  unillm --provider gemini
`);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`❌ ${message}`);
  process.exit(1);
});

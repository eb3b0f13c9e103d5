import { z } from "zod";
import type { UnillmConfig } from "@unillm/types";
import { ConfigError } from "./errors.js";

const flag = z
  .enum(["1", "0", "true", "false"])
  .optional()
  .transform((v) => v === "1" || v === "true");

const envSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_BASE_URL: z.string().url().optional(),
  GEMINI_API_KEY: z.string().optional(),
  GOOGLE_API_KEY: z.string().optional(),
  GEMINI_BASE_URL: z.string().url().optional(),

  UNILLM_MAX_TOKENS: z.coerce.number().int().positive().default(4096),
  UNILLM_DEBUG: flag,

  UNILLM_PROVIDER: z.string().default("openai"),
  UNILLM_MODEL: z.string().optional(),
});

/** Load config from environment variables */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): UnillmConfig {
  // Blank values count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== ""),
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  const e = result.data;

  return {
    providers: {
      openai: { apiKey: e.OPENAI_API_KEY, baseUrl: e.OPENAI_BASE_URL },
      anthropic: { apiKey: e.ANTHROPIC_API_KEY, baseUrl: e.ANTHROPIC_BASE_URL },
      gemini: {
        apiKey: e.GEMINI_API_KEY ?? e.GOOGLE_API_KEY,
        baseUrl: e.GEMINI_BASE_URL,
      },
    },
    maxTokens: e.UNILLM_MAX_TOKENS,
    debug: e.UNILLM_DEBUG,
    cli: {
      provider: e.UNILLM_PROVIDER,
      model: e.UNILLM_MODEL,
    },
  };
}

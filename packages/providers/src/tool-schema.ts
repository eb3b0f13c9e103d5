import type Anthropic from "@anthropic-ai/sdk";
import type OpenAI from "openai";
import { Type, type FunctionDeclaration, type Schema } from "@google/genai";
import { z } from "zod";
import type {
  JsonSchema,
  ProviderId,
  ToolCall,
  ToolSpec,
} from "@unillm/types";
import {
  MalformedToolArgumentsError,
  ProtocolError,
  ToolSpecError,
} from "./errors.js";

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const toolSpecSchema = z.object({
  type: z.literal("function"),
  function: z.object({
    name: z
      .string()
      .regex(
        /^[a-zA-Z0-9_-]{1,64}$/,
        "must be 1-64 letters, digits, underscores or dashes",
      ),
    description: z.string(),
    parameters: z
      .object({
        type: z.literal("object"),
        properties: z.record(z.string(), z.record(z.string(), z.unknown())),
        required: z.array(z.string()).optional(),
      })
      .passthrough(),
  }),
});

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Check one tool declaration; throws ToolSpecError listing every issue. */
export function validateToolSpec(spec: ToolSpec): void {
  const result = toolSpecSchema.safeParse(spec);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ToolSpecError(`Invalid tool declaration: ${issues}`);
  }

  const { name, parameters } = spec.function;
  for (const field of parameters.required ?? []) {
    if (!(field in parameters.properties)) {
      throw new ToolSpecError(
        `Tool "${name}" requires "${field}" which is not a declared property`,
      );
    }
  }
}

/** Validate a tool list; names must be unique. */
export function validateTools(tools: readonly ToolSpec[]): void {
  const seen = new Set<string>();
  for (const tool of tools) {
    validateToolSpec(tool);
    if (seen.has(tool.function.name)) {
      throw new ToolSpecError(`Duplicate tool name: ${tool.function.name}`);
    }
    seen.add(tool.function.name);
  }
}

// ---------------------------------------------------------------------------
// Declaration (canonical → provider)
// ---------------------------------------------------------------------------

export function toOpenAITool(spec: ToolSpec): OpenAI.ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: spec.function.name,
      description: spec.function.description,
      parameters: structuredClone(spec.function.parameters),
    },
  };
}

export function toAnthropicTool(spec: ToolSpec): Anthropic.Tool {
  return {
    name: spec.function.name,
    description: spec.function.description,
    input_schema: structuredClone(spec.function.parameters),
  };
}

const GEMINI_TYPES: Record<string, Type | undefined> = {
  object: Type.OBJECT,
  string: Type.STRING,
  number: Type.NUMBER,
  integer: Type.INTEGER,
  boolean: Type.BOOLEAN,
  array: Type.ARRAY,
};

/**
 * Convert a JSON Schema into Gemini's OpenAPI-flavoured Schema.
 * Only keywords Gemini understands are copied; `["string", "null"]` becomes
 * a nullable STRING.
 */
export function toGeminiSchema(schema: JsonSchema): Schema {
  const result: Schema = {};

  const types =
    schema.type === undefined
      ? []
      : Array.isArray(schema.type)
        ? schema.type
        : [schema.type];
  const concrete = types.filter((t) => t !== "null");
  const mapped = concrete.length > 0 ? GEMINI_TYPES[concrete[0]] : undefined;
  if (mapped) result.type = mapped;
  if (types.includes("null") || schema.nullable === true) result.nullable = true;

  if (schema.description !== undefined) result.description = schema.description;
  if (schema.format !== undefined) result.format = schema.format;
  if (schema.enum) {
    result.enum = schema.enum.filter((v) => v !== null).map((v) => String(v));
  }
  if (schema.properties) {
    result.properties = Object.fromEntries(
      Object.entries(schema.properties).map(([key, value]) => [
        key,
        toGeminiSchema(value),
      ]),
    );
  }
  if (schema.items) result.items = toGeminiSchema(schema.items);
  if (schema.required && schema.required.length > 0) {
    result.required = [...schema.required];
  }
  if (schema.anyOf) result.anyOf = schema.anyOf.map(toGeminiSchema);

  return result;
}

export function toGeminiFunctionDeclaration(
  spec: ToolSpec,
): FunctionDeclaration {
  return {
    name: spec.function.name,
    description: spec.function.description,
    parameters: toGeminiSchema(spec.function.parameters),
  };
}

// ---------------------------------------------------------------------------
// Parsing (provider → canonical)
// ---------------------------------------------------------------------------

/**
 * Parse tool-call arguments. Empty text means no arguments; anything that
 * is not a JSON object is rejected.
 */
export function parseToolArguments(
  raw: string,
  context: { toolName: string; provider?: ProviderId },
): Record<string, unknown> {
  const text = raw.trim() === "" ? "{}" : raw;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new MalformedToolArgumentsError(context.toolName, raw, {
      provider: context.provider,
      cause: err,
    });
  }

  if (!isRecord(parsed)) {
    throw new MalformedToolArgumentsError(context.toolName, raw, {
      provider: context.provider,
    });
  }
  return parsed;
}

/** JSON text for providers that hand back structured arguments. */
export function encodeToolArguments(value: unknown): string {
  return JSON.stringify(value ?? {});
}

/**
 * Build a ToolCall from argument text, validating it on the way.
 * The text is kept as sent so it round-trips untouched.
 */
export function createToolCall(
  provider: ProviderId,
  id: string,
  name: string,
  rawArguments: string,
): ToolCall {
  parseToolArguments(rawArguments, { toolName: name, provider });
  return {
    id,
    type: "function",
    function: {
      name,
      arguments: rawArguments.trim() === "" ? "{}" : rawArguments,
    },
  };
}

interface PendingToolCall {
  id: string;
  name: string;
  /** Arguments known at block start (used when no fragments arrive) */
  initial: string;
  fragments: string[];
}

/**
 * Collects streamed tool-call fragments keyed by content-block index.
 * Arguments are concatenated first and parsed only in `finish()`.
 */
export class ToolCallAssembler {
  private pending = new Map<number, PendingToolCall>();

  constructor(private readonly provider: ProviderId) {}

  get size(): number {
    return this.pending.size;
  }

  start(index: number, id: string, name: string, initial = ""): void {
    if (!id || !name) {
      throw new ProtocolError(
        this.provider,
        `Tool call at block ${index} is missing its id or name`,
      );
    }
    this.pending.set(index, { id, name, initial, fragments: [] });
  }

  append(index: number, fragment: string): void {
    const call = this.pending.get(index);
    if (!call) {
      throw new ProtocolError(
        this.provider,
        `Argument fragment for unknown tool call at block ${index}`,
      );
    }
    call.fragments.push(fragment);
  }

  /** Assembled tool calls in block order. */
  finish(): ToolCall[] {
    return [...this.pending.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, call]) => {
        const raw =
          call.fragments.length > 0 ? call.fragments.join("") : call.initial;
        return createToolCall(this.provider, call.id, call.name, raw);
      });
  }
}

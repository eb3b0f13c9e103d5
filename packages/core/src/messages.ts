import { z } from "zod";
import type {
  AssistantMessage,
  Conversation,
  Message,
  SystemMessage,
  ToolCall,
  ToolMessage,
  UserMessage,
} from "@unillm/types";
import { parseToolArguments } from "@unillm/providers";
import { ConversationError, MessageValidationError } from "./errors.js";

const toolCallSchema = z.object({
  id: z.string().min(1, "tool call id must not be empty"),
  type: z.literal("function"),
  function: z.object({
    name: z.string().min(1, "function name must not be empty"),
    arguments: z.string(),
  }),
});

const messageSchema = z.discriminatedUnion("role", [
  z.object({ role: z.literal("system"), content: z.string() }),
  z.object({ role: z.literal("user"), content: z.string() }),
  z.object({
    role: z.literal("assistant"),
    content: z.string().optional(),
    toolCalls: z.array(toolCallSchema).optional(),
  }),
  z.object({
    role: z.literal("tool"),
    toolCallId: z.string().min(1, "tool message needs a toolCallId"),
    name: z.string().min(1, "tool message needs a name"),
    content: z.string(),
  }),
]);

function argumentsAreObject(call: ToolCall): boolean {
  try {
    parseToolArguments(call.function.arguments, {
      toolName: call.function.name,
    });
    return true;
  } catch {
    return false;
  }
}

/** Every problem with one message, empty when it is valid */
function messageIssues(message: unknown): string[] {
  const result = messageSchema.safeParse(message);
  if (!result.success) {
    return result.error.issues.map(
      (i) => `${i.path.join(".") || "(root)"}: ${i.message}`,
    );
  }

  const msg = result.data;
  if (msg.role !== "assistant") return [];

  const issues: string[] = [];
  if (msg.content === undefined && !msg.toolCalls?.length) {
    issues.push("assistant message needs content or tool calls");
  }
  msg.toolCalls?.forEach((tc, i) => {
    if (!argumentsAreObject(tc)) {
      issues.push(`toolCalls.${i}.function.arguments: not a JSON object`);
    }
  });
  return issues;
}

export function validateMessage(message: Message): void {
  const issues = messageIssues(message);
  if (issues.length > 0) throw new MessageValidationError(issues);
}

function build<T extends Message>(message: T): T {
  validateMessage(message);
  Object.freeze(message);
  return message;
}

export function systemMessage(content: string): SystemMessage {
  return build({ role: "system", content });
}

export function userMessage(content: string): UserMessage {
  return build({ role: "user", content });
}

/**
 * Assistant turn. Content may be omitted when tool calls are present;
 * an empty tool-call list is dropped.
 */
export function assistantMessage(
  fields: string | { content?: string; toolCalls?: ToolCall[] },
): AssistantMessage {
  const { content, toolCalls } =
    typeof fields === "string" ? { content: fields, toolCalls: undefined } : fields;

  const message: AssistantMessage = { role: "assistant" };
  if (content !== undefined) message.content = content;
  if (toolCalls && toolCalls.length > 0) message.toolCalls = [...toolCalls];
  return build(message);
}

export function toolMessage(fields: {
  toolCallId: string;
  name: string;
  content: string;
}): ToolMessage {
  return build({
    role: "tool",
    toolCallId: fields.toolCallId,
    name: fields.name,
    content: fields.content,
  });
}

/** Parsed arguments of a tool call */
export function toolCallArguments(call: ToolCall): Record<string, unknown> {
  return parseToolArguments(call.function.arguments, {
    toolName: call.function.name,
  });
}

/**
 * Check every message, and that each tool message answers a tool call
 * issued by an earlier assistant message.
 */
export function validateConversation(messages: Conversation): void {
  if (messages.length === 0) {
    throw new ConversationError("Conversation is empty");
  }

  const issued = new Set<string>();

  messages.forEach((msg, index) => {
    const issues = messageIssues(msg);
    if (issues.length > 0) {
      throw new ConversationError(issues.join("; "), index);
    }

    if (msg.role === "assistant") {
      const ids = new Set<string>();
      for (const tc of msg.toolCalls ?? []) {
        if (ids.has(tc.id)) {
          throw new ConversationError(`Duplicate tool call id "${tc.id}"`, index);
        }
        ids.add(tc.id);
        issued.add(tc.id);
      }
    } else if (msg.role === "tool" && !issued.has(msg.toolCallId)) {
      throw new ConversationError(
        `Tool message answers unknown tool call "${msg.toolCallId}"`,
        index,
      );
    }
  });
}

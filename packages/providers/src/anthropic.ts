import Anthropic, {
  APIConnectionError,
  APIError,
  APIUserAbortError,
} from "@anthropic-ai/sdk";
import type {
  AdapterRequest,
  AssistantMessage,
  Conversation,
  StopReason,
  TokenUsage,
  ToolChoice,
} from "@unillm/types";
import { BaseProviderAdapter, type AdapterOptions } from "./base.js";
import { CancelledError, ProtocolError, TransportError } from "./errors.js";
import {
  ToolCallAssembler,
  encodeToolArguments,
  parseToolArguments,
  toAnthropicTool,
} from "./tool-schema.js";

/**
 * Anthropic Messages API adapter.
 * The response is consumed as an event stream; text and tool-call argument
 * fragments are assembled into one assistant message.
 */
export class AnthropicAdapter extends BaseProviderAdapter {
  readonly name = "anthropic";

  private client: Anthropic;

  constructor(options: AdapterOptions = {}) {
    super(options);
    this.client = new Anthropic({
      apiKey: this.apiKey ?? "",
      baseURL: this.baseUrl,
      maxRetries: 0,
    });
  }

  protected async complete(
    request: AdapterRequest,
    signal?: AbortSignal,
  ): Promise<AssistantMessage> {
    const system = this.systemPrompt(request.messages);
    const { tools, toolChoice } = this.convertTools(request);

    const params: Anthropic.MessageCreateParamsStreaming = {
      model: request.model,
      max_tokens: request.maxTokens ?? this.defaultMaxTokens,
      messages: this.convertMessages(request.messages),
      stream: true,
      ...(system ? { system } : {}),
      ...(tools ? { tools } : {}),
      ...(toolChoice ? { tool_choice: toolChoice } : {}),
      ...(request.temperature != null
        ? { temperature: request.temperature }
        : {}),
    };

    const stream = await this.client.messages.create(params, { signal });

    const assembler = new ToolCallAssembler(this.name);
    let text = "";
    let model = request.model;
    let usage: TokenUsage | undefined;
    let stopReason: string | null = null;
    let stopped = false;

    for await (const event of stream) {
      switch (event.type) {
        case "message_start":
          model = event.message.model;
          usage = {
            inputTokens: event.message.usage.input_tokens,
            outputTokens: event.message.usage.output_tokens,
          };
          break;
        case "content_block_start": {
          const block = event.content_block;
          if (block.type === "text") {
            text += block.text;
          } else if (block.type === "tool_use") {
            assembler.start(
              event.index,
              block.id,
              block.name,
              encodeToolArguments(block.input),
            );
          }
          // Skip thinking / redacted_thinking blocks
          break;
        }
        case "content_block_delta": {
          const delta = event.delta;
          if (delta.type === "text_delta") {
            text += delta.text;
          } else if (delta.type === "input_json_delta") {
            assembler.append(event.index, delta.partial_json);
          }
          break;
        }
        case "message_delta":
          stopReason = event.delta.stop_reason;
          if (usage) usage.outputTokens = event.usage.output_tokens;
          break;
        case "message_stop":
          stopped = true;
          break;
      }
    }

    if (!stopped) {
      throw new ProtocolError(this.name, "Stream ended before message_stop");
    }

    return this.toAssistantMessage({
      text,
      toolCalls: assembler.finish(),
      model,
      usage,
      stopReason: this.mapStopReason(stopReason),
    });
  }

  protected translateProviderError(err: unknown): Error {
    // Abort and connection errors are APIError subclasses: check them first
    if (err instanceof APIUserAbortError) {
      return new CancelledError("Request cancelled", { cause: err });
    }
    if (err instanceof APIConnectionError) {
      return new TransportError(this.name, err.message, { cause: err });
    }
    if (err instanceof APIError) {
      return this.requestError(err.status, err.message, err);
    }
    return err instanceof Error ? err : new Error(String(err));
  }

  // ---- Internal conversion helpers ----

  private convertMessages(messages: Conversation): Anthropic.MessageParam[] {
    const result: Anthropic.MessageParam[] = [];
    // Results answering one assistant turn share a single user message
    let toolResults: Anthropic.ToolResultBlockParam[] | undefined;

    for (const msg of messages) {
      if (msg.role !== "tool") toolResults = undefined;

      switch (msg.role) {
        // Passed via the system param
        case "system":
          break;
        case "user":
          result.push({ role: "user", content: msg.content });
          break;
        case "assistant": {
          if (!msg.toolCalls || msg.toolCalls.length === 0) {
            // Empty assistant content is rejected outside the final turn
            if (msg.content) {
              result.push({ role: "assistant", content: msg.content });
            }
            break;
          }
          const blocks: Anthropic.ContentBlockParam[] = [];
          if (msg.content) blocks.push({ type: "text", text: msg.content });
          for (const tc of msg.toolCalls) {
            blocks.push({
              type: "tool_use",
              id: tc.id,
              name: tc.function.name,
              input: parseToolArguments(tc.function.arguments, {
                toolName: tc.function.name,
                provider: this.name,
              }),
            });
          }
          result.push({ role: "assistant", content: blocks });
          break;
        }
        case "tool": {
          const block: Anthropic.ToolResultBlockParam = {
            type: "tool_result",
            tool_use_id: msg.toolCallId,
            content: msg.content,
          };
          if (toolResults) {
            toolResults.push(block);
          } else {
            toolResults = [block];
            result.push({ role: "user", content: toolResults });
          }
          break;
        }
      }
    }

    return result;
  }

  /**
   * Declared tools and tool choice. A conversation that already holds tool
   * calls must still define those tools, so without requested tools the
   * called functions are declared with open schemas and choice "none".
   */
  private convertTools(request: AdapterRequest): {
    tools?: Anthropic.Tool[];
    toolChoice?: Anthropic.ToolChoice;
  } {
    if (request.tools) {
      return {
        tools: request.tools.map(toAnthropicTool),
        toolChoice: request.toolChoice
          ? this.convertToolChoice(request.toolChoice)
          : undefined,
      };
    }

    const called = new Set<string>();
    for (const msg of request.messages) {
      if (msg.role === "assistant") {
        for (const tc of msg.toolCalls ?? []) called.add(tc.function.name);
      }
    }
    if (called.size === 0) return {};

    return {
      tools: [...called].map((name) => ({
        name,
        input_schema: { type: "object" as const },
      })),
      toolChoice: { type: "none" },
    };
  }

  private convertToolChoice(choice: ToolChoice): Anthropic.ToolChoice {
    switch (choice) {
      case "auto":
        return { type: "auto" };
      case "none":
        return { type: "none" };
      case "required":
        return { type: "any" };
      default:
        return { type: "tool", name: choice };
    }
  }

  private mapStopReason(reason: string | null): StopReason {
    switch (reason) {
      case "tool_use":
        return "tool_use";
      case "max_tokens":
        return "max_tokens";
      case "stop_sequence":
        return "stop_sequence";
      default:
        return "end_turn";
    }
  }
}

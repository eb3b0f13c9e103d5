import OpenAI, {
  APIConnectionError,
  APIError,
  APIUserAbortError,
} from "openai";
import type {
  AdapterRequest,
  AssistantMessage,
  Conversation,
  StopReason,
  ToolCall,
  ToolChoice,
} from "@unillm/types";
import { BaseProviderAdapter, type AdapterOptions } from "./base.js";
import { CancelledError, ProtocolError, TransportError } from "./errors.js";
import { createToolCall, toOpenAITool } from "./tool-schema.js";

/**
 * OpenAI Chat Completions adapter.
 * Also works with any OpenAI-compatible endpoint through `baseUrl`.
 */
export class OpenAIAdapter extends BaseProviderAdapter {
  readonly name = "openai";

  private client: OpenAI;

  constructor(options: AdapterOptions = {}) {
    super(options);
    this.client = new OpenAI({
      apiKey: this.apiKey ?? "",
      baseURL: this.baseUrl,
      maxRetries: 0,
    });
  }

  protected async complete(
    request: AdapterRequest,
    signal?: AbortSignal,
  ): Promise<AssistantMessage> {
    const tools = request.tools?.map(toOpenAITool);

    const response = await this.client.chat.completions.create(
      {
        model: request.model,
        messages: this.convertMessages(request.messages),
        ...(tools ? { tools } : {}),
        ...(tools && request.toolChoice
          ? { tool_choice: this.convertToolChoice(request.toolChoice) }
          : {}),
        ...(request.temperature != null
          ? { temperature: request.temperature }
          : {}),
        ...(request.maxTokens != null
          ? { max_completion_tokens: request.maxTokens }
          : {}),
      },
      { signal },
    );

    const choice = response.choices?.[0];
    if (!choice?.message) {
      throw new ProtocolError(this.name, "Response contains no choices");
    }

    return this.toAssistantMessage({
      text: choice.message.content ?? choice.message.refusal ?? "",
      toolCalls: this.convertResponseToolCalls(choice.message),
      model: response.model ?? request.model,
      usage: response.usage
        ? {
            inputTokens: response.usage.prompt_tokens,
            outputTokens: response.usage.completion_tokens,
          }
        : undefined,
      stopReason: this.mapFinishReason(choice.finish_reason),
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

  private convertMessages(
    messages: Conversation,
  ): OpenAI.ChatCompletionMessageParam[] {
    return messages.map((msg): OpenAI.ChatCompletionMessageParam => {
      switch (msg.role) {
        case "system":
          return { role: "system", content: msg.content };
        case "user":
          return { role: "user", content: msg.content };
        case "assistant":
          return {
            role: "assistant",
            content: msg.content ?? null,
            ...(msg.toolCalls && msg.toolCalls.length > 0
              ? {
                  tool_calls: msg.toolCalls.map((tc) => ({
                    id: tc.id,
                    type: "function" as const,
                    function: {
                      name: tc.function.name,
                      arguments: tc.function.arguments,
                    },
                  })),
                }
              : {}),
          };
        case "tool":
          return {
            role: "tool",
            tool_call_id: msg.toolCallId,
            content: msg.content,
          };
      }
    });
  }

  private convertToolChoice(
    choice: ToolChoice,
  ): OpenAI.ChatCompletionToolChoiceOption {
    switch (choice) {
      case "auto":
        return "auto";
      case "none":
        return "none";
      case "required":
        return "required";
      default:
        return { type: "function", function: { name: choice } };
    }
  }

  private convertResponseToolCalls(
    msg: OpenAI.ChatCompletionMessage,
  ): ToolCall[] {
    return (msg.tool_calls ?? []).map((tc) =>
      createToolCall(
        this.name,
        tc.id,
        tc.function.name,
        tc.function.arguments,
      ),
    );
  }

  private mapFinishReason(reason: string | null | undefined): StopReason {
    switch (reason) {
      case "tool_calls":
        return "tool_use";
      case "length":
        return "max_tokens";
      default:
        return "end_turn";
    }
  }
}

import {
  ApiError,
  FunctionCallingConfigMode,
  GoogleGenAI,
  type Content,
  type GenerateContentConfig,
  type Part,
  type ToolConfig,
} from "@google/genai";
import type {
  AdapterRequest,
  AssistantMessage,
  Conversation,
  StopReason,
  ToolCall,
  ToolChoice,
  ToolMessage,
} from "@unillm/types";
import {
  BaseProviderAdapter,
  generateId,
  type AdapterOptions,
} from "./base.js";
import { ProtocolError, TransportError } from "./errors.js";
import {
  createToolCall,
  encodeToolArguments,
  isRecord,
  parseToolArguments,
  toGeminiFunctionDeclaration,
} from "./tool-schema.js";

/**
 * Google Gemini adapter.
 * Uses the @google/genai SDK.
 */
export class GeminiAdapter extends BaseProviderAdapter {
  readonly name = "gemini";

  private client: GoogleGenAI;

  constructor(options: AdapterOptions = {}) {
    super(options);
    this.client = new GoogleGenAI({
      apiKey: this.apiKey ?? "",
      ...(this.baseUrl ? { httpOptions: { baseUrl: this.baseUrl } } : {}),
    });
  }

  protected async complete(
    request: AdapterRequest,
    signal?: AbortSignal,
  ): Promise<AssistantMessage> {
    const systemInstruction = this.systemPrompt(request.messages);

    const config: GenerateContentConfig = {
      ...(systemInstruction ? { systemInstruction } : {}),
      ...(request.tools
        ? {
            tools: [
              {
                functionDeclarations: request.tools.map(
                  toGeminiFunctionDeclaration,
                ),
              },
            ],
          }
        : {}),
      ...(request.tools && request.toolChoice
        ? { toolConfig: this.convertToolChoice(request.toolChoice) }
        : {}),
      ...(request.temperature != null
        ? { temperature: request.temperature }
        : {}),
      ...(request.maxTokens != null
        ? { maxOutputTokens: request.maxTokens }
        : {}),
      ...(signal ? { abortSignal: signal } : {}),
    };

    const response = await this.client.models.generateContent({
      model: request.model,
      contents: this.convertMessages(request.messages),
      config,
    });

    const candidate = response.candidates?.[0];
    if (!candidate) {
      const blockReason = response.promptFeedback?.blockReason;
      if (blockReason) {
        throw this.requestError(
          undefined,
          `Prompt blocked: ${blockReason}`,
          undefined,
        );
      }
      throw new ProtocolError(this.name, "Response contains no candidates");
    }

    const parts = candidate.content?.parts ?? [];
    let text = "";
    const toolCalls: ToolCall[] = [];

    for (const part of parts) {
      // Skip thought summaries
      if (part.thought) continue;

      if (part.text) {
        text += part.text;
      }
      if (part.functionCall) {
        const { id, name, args } = part.functionCall;
        if (!name) {
          throw new ProtocolError(this.name, "Function call without a name");
        }
        // Gemini does not always issue call ids
        toolCalls.push(
          createToolCall(
            this.name,
            id ?? `call_${generateId()}`,
            name,
            encodeToolArguments(args),
          ),
        );
      }
    }

    return this.toAssistantMessage({
      text,
      toolCalls,
      model: response.modelVersion ?? request.model,
      usage: response.usageMetadata
        ? {
            inputTokens: response.usageMetadata.promptTokenCount ?? 0,
            outputTokens: response.usageMetadata.candidatesTokenCount ?? 0,
          }
        : undefined,
      stopReason: this.mapFinishReason(candidate.finishReason),
    });
  }

  protected translateProviderError(err: unknown): Error {
    if (err instanceof ApiError) {
      return this.requestError(err.status, err.message, err);
    }
    // fetch reports network failures as TypeError
    if (err instanceof TypeError) {
      return new TransportError(this.name, err.message, { cause: err });
    }
    return err instanceof Error ? err : new Error(String(err));
  }

  // ---- Internal conversion helpers ----

  private convertMessages(messages: Conversation): Content[] {
    const result: Content[] = [];
    // Responses to one model turn share a single user content
    let responses: Part[] | undefined;

    for (const msg of messages) {
      if (msg.role !== "tool") responses = undefined;

      switch (msg.role) {
        // Handled via systemInstruction config
        case "system":
          break;
        case "user":
          result.push({ role: "user", parts: [{ text: msg.content }] });
          break;
        case "assistant": {
          const parts: Part[] = [];
          if (msg.content) parts.push({ text: msg.content });
          for (const tc of msg.toolCalls ?? []) {
            parts.push({
              functionCall: {
                name: tc.function.name,
                args: parseToolArguments(tc.function.arguments, {
                  toolName: tc.function.name,
                  provider: this.name,
                }),
              },
            });
          }
          // A content without parts is rejected
          if (parts.length > 0) result.push({ role: "model", parts });
          break;
        }
        case "tool": {
          const part: Part = {
            functionResponse: {
              name: msg.name,
              response: this.toolResponse(msg),
            },
          };
          if (responses) {
            responses.push(part);
          } else {
            responses = [part];
            result.push({ role: "user", parts: responses });
          }
          break;
        }
      }
    }

    return result;
  }

  /** Function responses must be objects: JSON objects pass through */
  private toolResponse(msg: ToolMessage): Record<string, unknown> {
    try {
      const parsed: unknown = JSON.parse(msg.content);
      return isRecord(parsed) ? parsed : { content: msg.content };
    } catch {
      return { content: msg.content };
    }
  }

  private convertToolChoice(choice: ToolChoice): ToolConfig {
    switch (choice) {
      case "auto":
        return {
          functionCallingConfig: { mode: FunctionCallingConfigMode.AUTO },
        };
      case "none":
        return {
          functionCallingConfig: { mode: FunctionCallingConfigMode.NONE },
        };
      case "required":
        return {
          functionCallingConfig: { mode: FunctionCallingConfigMode.ANY },
        };
      default:
        return {
          functionCallingConfig: {
            mode: FunctionCallingConfigMode.ANY,
            allowedFunctionNames: [choice],
          },
        };
    }
  }

  private mapFinishReason(reason: string | undefined): StopReason {
    switch (reason) {
      case "MAX_TOKENS":
        return "max_tokens";
      default:
        return "end_turn";
    }
  }
}

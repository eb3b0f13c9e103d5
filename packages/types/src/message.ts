/** Role of a message participant */
export type MessageRole = "system" | "user" | "assistant" | "tool";

/** A function invocation requested by the model */
export interface FunctionCall {
  name: string;
  /** JSON text encoding an object */
  arguments: string;
}

/** A tool call issued by the model, answered by a ToolMessage */
export interface ToolCall {
  /** Provider-issued (or generated) id, unique within one response */
  id: string;
  type: "function";
  function: FunctionCall;
}

/** Why the model stopped generating */
export type StopReason = "end_turn" | "tool_use" | "max_tokens" | "stop_sequence";

/** Token usage reported by the provider */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface SystemMessage {
  role: "system";
  content: string;
}

export interface UserMessage {
  role: "user";
  content: string;
}

export interface AssistantMessage {
  role: "assistant";
  /** Absent only when the message carries tool calls */
  content?: string;
  /** Absent when the model made no tool calls */
  toolCalls?: ToolCall[];
  /** Model that generated this message */
  model?: string;
  usage?: TokenUsage;
  stopReason?: StopReason;
}

export interface ToolMessage {
  role: "tool";
  /** Id of the ToolCall this message answers */
  toolCallId: string;
  /** Name of the function that was called */
  name: string;
  content: string;
}

/** A single turn in a conversation */
export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

/** Ordered turns, oldest first. Passed whole on every request. */
export type Conversation = readonly Message[];

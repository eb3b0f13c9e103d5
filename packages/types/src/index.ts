export type {
  MessageRole,
  FunctionCall,
  ToolCall,
  StopReason,
  TokenUsage,
  SystemMessage,
  UserMessage,
  AssistantMessage,
  ToolMessage,
  Message,
  Conversation,
} from "./message.js";

export type {
  JsonSchema,
  ToolParameterSchema,
  ToolSpec,
  ToolChoice,
} from "./tool.js";

export type {
  ProviderId,
  AdapterRequest,
  ProviderAdapter,
  InvokeOptions,
} from "./llm.js";

export type { ProviderConfig, UnillmConfig } from "./config.js";

// @unillm/core — message model, config and the Client facade

export {
  Client,
  withClient,
  PROVIDERS,
  isProviderId,
  type AdapterFactory,
  type ClientOptions,
  type ClientState,
} from "./client.js";
export { loadConfig } from "./config.js";
export {
  systemMessage,
  userMessage,
  assistantMessage,
  toolMessage,
  toolCallArguments,
  validateMessage,
  validateConversation,
} from "./messages.js";
export {
  MessageValidationError,
  ConversationError,
  ConfigError,
} from "./errors.js";

export {
  UnillmError,
  UnknownProviderError,
  ClientClosedError,
  TransportError,
  ProviderRequestError,
  AuthError,
  ProtocolError,
  MalformedToolArgumentsError,
  CancelledError,
  ToolSpecError,
} from "@unillm/providers";

export type {
  Message,
  SystemMessage,
  UserMessage,
  AssistantMessage,
  ToolMessage,
  ToolCall,
  FunctionCall,
  Conversation,
  ToolSpec,
  ToolChoice,
  InvokeOptions,
  ProviderId,
  StopReason,
  TokenUsage,
} from "@unillm/types";

// @unillm/providers — provider adapters (OpenAI, Anthropic, Gemini) + tool schema translation

export {
  BaseProviderAdapter,
  generateId,
  type AdapterOptions,
  type ResponseParts,
} from "./base.js";
export { OpenAIAdapter } from "./openai.js";
export { AnthropicAdapter } from "./anthropic.js";
export { GeminiAdapter } from "./gemini.js";
export {
  ToolCallAssembler,
  createToolCall,
  encodeToolArguments,
  isRecord,
  parseToolArguments,
  toAnthropicTool,
  toGeminiFunctionDeclaration,
  toGeminiSchema,
  toOpenAITool,
  validateToolSpec,
  validateTools,
} from "./tool-schema.js";
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
} from "./errors.js";

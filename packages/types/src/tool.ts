/** JSON Schema subset used to describe tool parameters */
export interface JsonSchema {
  type?: string | string[];
  description?: string;
  enum?: Array<string | number | boolean | null>;
  properties?: Record<string, JsonSchema>;
  items?: JsonSchema;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  anyOf?: JsonSchema[];
  format?: string;
  nullable?: boolean;
  default?: unknown;
  [keyword: string]: unknown;
}

/** Parameters of a tool: always an object schema */
export interface ToolParameterSchema extends JsonSchema {
  type: "object";
  properties: Record<string, JsonSchema>;
}

/**
 * Tool declaration as the caller writes it, independent of provider.
 * Matches the OpenAI function-tool format.
 */
export interface ToolSpec {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: ToolParameterSchema;
  };
}

/**
 * Tool choice policy for one request:
 * - "auto": the model decides
 * - "none": the model must not call a tool
 * - "required": the model must call some tool
 * - any other string: the model must call the tool with that name
 */
export type ToolChoice = "auto" | "none" | "required" | (string & {});

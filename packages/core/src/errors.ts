import { UnillmError } from "@unillm/providers";

/** Thrown when a message does not have the expected shape. */
export class MessageValidationError extends UnillmError {
  constructor(public readonly issues: string[]) {
    super(`Invalid message: ${issues.join("; ")}`);
    this.name = "MessageValidationError";
  }
}

/** Thrown when a conversation breaks tool-call linkage. */
export class ConversationError extends UnillmError {
  constructor(
    message: string,
    public readonly index?: number,
  ) {
    super(index === undefined ? message : `messages[${index}]: ${message}`);
    this.name = "ConversationError";
  }
}

/** Thrown when environment configuration is invalid. */
export class ConfigError extends UnillmError {
  constructor(public readonly invalid: string[]) {
    super(`Invalid configuration: ${invalid.join("; ")}`);
    this.name = "ConfigError";
  }
}

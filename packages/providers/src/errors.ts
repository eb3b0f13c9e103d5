import type { ProviderId } from "@unillm/types";

/** Base class for every error raised by this library. */
export class UnillmError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UnillmError";
  }
}

/** Thrown by the Client constructor for an unrecognized provider id. */
export class UnknownProviderError extends UnillmError {
  constructor(public readonly provider: string) {
    super(
      `Unknown provider: ${provider}. Supported: openai, anthropic, gemini`,
    );
    this.name = "UnknownProviderError";
  }
}

/** Thrown when a client is used outside its open state. */
export class ClientClosedError extends UnillmError {
  constructor(message = "Client is closed") {
    super(message);
    this.name = "ClientClosedError";
  }
}

/** Network-layer failure (timeout, connection reset). The caller may retry. */
export class TransportError extends UnillmError {
  constructor(
    public readonly provider: ProviderId,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${provider}] ${message}`, options);
    this.name = "TransportError";
  }
}

/** The provider rejected the request (bad key, rate limit, invalid request). */
export class ProviderRequestError extends UnillmError {
  constructor(
    public readonly provider: ProviderId,
    public readonly status: number | undefined,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${provider}] ${message}`, options);
    this.name = "ProviderRequestError";
  }
}

/** Missing or rejected credential. */
export class AuthError extends ProviderRequestError {
  constructor(
    provider: ProviderId,
    status: number | undefined,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(provider, status, message, options);
    this.name = "AuthError";
  }
}

/** The provider response did not have the expected shape. */
export class ProtocolError extends UnillmError {
  constructor(
    public readonly provider: ProviderId,
    message: string,
  ) {
    super(`[${provider}] ${message}`);
    this.name = "ProtocolError";
  }
}

/** Tool-call arguments are not a JSON object after assembly. */
export class MalformedToolArgumentsError extends UnillmError {
  public readonly provider: ProviderId | undefined;

  constructor(
    public readonly toolName: string,
    public readonly raw: string,
    options: { provider?: ProviderId; cause?: unknown } = {},
  ) {
    super(
      `${options.provider ? `[${options.provider}] ` : ""}Tool call "${toolName}" has malformed arguments: ${raw}`,
      { cause: options.cause },
    );
    this.name = "MalformedToolArgumentsError";
    this.provider = options.provider;
  }
}

/** The request was aborted through its AbortSignal or by closing the client. */
export class CancelledError extends UnillmError {
  constructor(message = "Request cancelled", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CancelledError";
  }
}

/** A tool declaration does not have the expected shape. */
export class ToolSpecError extends UnillmError {
  constructor(message: string) {
    super(message);
    this.name = "ToolSpecError";
  }
}

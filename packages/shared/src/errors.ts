export type ErrorContext = Record<string, string | number | undefined>;

/** Base class for every error the wristlog tools raise on purpose. */
export class WristlogError extends Error {
  override readonly name: string = "WristlogError";

  constructor(
    message: string,
    readonly context: ErrorContext = {},
  ) {
    super(message);
  }
}

/** Required settings (token, user id) are missing or blank. */
export class ConfigurationError extends WristlogError {
  override readonly name = "ConfigurationError";
}

/** A caller passed arguments that cannot produce a request. */
export class InvalidArgumentError extends WristlogError {
  override readonly name = "InvalidArgumentError";
}

/** The remote service rejected the token. Tokens are never refreshed. */
export class AuthenticationError extends WristlogError {
  override readonly name = "AuthenticationError";

  constructor(
    message: string,
    readonly status: number,
    context: ErrorContext = {},
  ) {
    super(message, { ...context, status });
  }
}

/** Connection failures, aborted requests and non-2xx answers. */
export class TransportError extends WristlogError {
  override readonly name = "TransportError";

  constructor(
    message: string,
    readonly status?: number,
    context: ErrorContext = {},
  ) {
    super(message, { ...context, status });
  }
}

/**
 * A response did not have the expected shape.
 * `field` is the dotted path of the first offending value.
 */
export class ParseError extends WristlogError {
  override readonly name = "ParseError";

  constructor(
    readonly endpoint: string,
    readonly field: string,
    detail: string,
  ) {
    super(`Unexpected response from ${endpoint}: ${field} ${detail}`, {
      endpoint,
      field,
    });
  }
}

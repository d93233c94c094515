import type { UseType } from "../ports/adapter"
import { BaseError, type ErrorContext } from "./base-error"

/**
 * A method was called in a connection mode that does not support it.
 * Raised before the call pipeline runs.
 */
export class ClientUsageError extends BaseError<"client_usage"> {
  constructor(useType: UseType, context: ErrorContext = {}) {
    super(`Method cannot be used in ${useType} mode.`, {
      code: "client_usage",
      context: { useType, ...context },
      isOperational: false,
    })
  }
}

/** The server answered with an error reply. */
export class ReplyError extends BaseError<"reply_error"> {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, { code: "reply_error", context })
  }
}

/** The transport failed before a reply arrived. */
export class ConnectionError extends BaseError<"connection"> {
  constructor(message: string, options: { cause?: unknown; context?: ErrorContext } = {}) {
    super(message, {
      code: "connection",
      isRetryable: true,
      ...(options.cause !== undefined && { cause: options.cause }),
      ...(options.context && { context: options.context }),
    })
  }
}

/**
 * A value could not be converted and no soft fallback applies.
 */
export class ConversionError extends BaseError<"conversion"> {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, { code: "conversion", context, isOperational: false })
  }
}

/** The client was used after `dispose()`. */
export class DisposedError extends BaseError<"disposed"> {
  constructor() {
    super("The client has been disposed.", { code: "disposed", isOperational: false })
  }
}

/** Configuration failed to load or validate. */
export class ConfigError extends BaseError<"config"> {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, { code: "config", context, isOperational: false })
  }
}

/**
 * Source Client Error Classes
 *
 * Every failure surfaced by the client is one of the classes below, so callers
 * can tell a contract violation apart from a rejected write or a dead network.
 */

/**
 * Base error class for all source client errors.
 *
 * @example
 * ```typescript
 * try {
 *   await client.load('OPT_1', new Options());
 * } catch (error) {
 *   if (error instanceof SourceError) {
 *     console.error(`Source Error [${error.code}]: ${error.message}`);
 *   }
 * }
 * ```
 */
export class SourceError extends Error {
  /** Error code for programmatic handling */
  public readonly code: string;
  /** HTTP status code if applicable */
  public readonly statusCode?: number;

  constructor(
    message: string,
    code: string = 'SOURCE_ERROR',
    options?: { statusCode?: number; cause?: unknown }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SourceError';
    this.code = code;
    this.statusCode = options?.statusCode;

    // Maintains proper stack trace for where error was thrown (V8 engines)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SourceError);
    }
  }

  /**
   * Convert error to a JSON-serializable object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Raised when the caller breaks a client-side contract: an empty key or item
 * type, a missing tag name, a prototype that cannot be written to, or a value
 * that cannot be owned by the request (a promise or a function).
 *
 * Never retried.
 */
export class UsageError extends SourceError {
  /** The argument that was misused */
  public readonly argument?: string;

  constructor(message: string, options?: { argument?: string }) {
    super(message, 'USAGE_ERROR');
    this.name = 'UsageError';
    this.argument = options?.argument;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      argument: this.argument,
    };
  }
}

/**
 * Raised when an item rejects itself through its `validate()` method, or when
 * client configuration is invalid.
 *
 * @example
 * ```typescript
 * try {
 *   await client.save('OPT_?', 'AAA', options);
 * } catch (error) {
 *   if (error instanceof ValidationError) {
 *     console.error(`Invalid item: ${error.field} - ${error.message}`);
 *   }
 * }
 * ```
 */
export class ValidationError extends SourceError {
  /** The field that failed validation */
  public readonly field?: string;
  /** The value that was invalid */
  public readonly value?: unknown;

  constructor(
    message: string,
    options?: { field?: string; value?: unknown; cause?: unknown }
  ) {
    super(message, 'VALIDATION_ERROR', { cause: options?.cause });
    this.name = 'ValidationError';
    this.field = options?.field;
    this.value = options?.value;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
    };
  }
}

/**
 * Raised when a schema cannot be derived from a type example.
 */
export class SchemaError extends SourceError {
  /** Path of the offending field inside the example, `$` for the root */
  public readonly path?: string;

  constructor(message: string, options?: { path?: string; cause?: unknown }) {
    super(message, 'SCHEMA_ERROR', { cause: options?.cause });
    this.name = 'SchemaError';
    this.path = options?.path;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      path: this.path,
    };
  }
}

/**
 * Raised when a value cannot be serialized for transmission.
 */
export class EncodeError extends SourceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ENCODE_ERROR', { cause: options?.cause });
    this.name = 'EncodeError';
  }
}

/**
 * Raised when a response body or an item payload cannot be decoded into the
 * requested shape.
 */
export class DecodeError extends SourceError {
  /** Path of the mismatched field, when the payload parsed but did not fit */
  public readonly path?: string;

  constructor(message: string, options?: { path?: string; cause?: unknown }) {
    super(message, 'DECODE_ERROR', { cause: options?.cause });
    this.name = 'DecodeError';
    this.path = options?.path;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      path: this.path,
    };
  }
}

/**
 * Raised when the source server cannot be reached before the retry budget or
 * the request timeout runs out.
 *
 * @example
 * ```typescript
 * try {
 *   await client.loadRaw('OPT_1');
 * } catch (error) {
 *   if (error instanceof TransportError && error.timedOut) {
 *     console.error(`Gave up on ${error.url}`);
 *   }
 * }
 * ```
 */
export class TransportError extends SourceError {
  /** The URL that failed */
  public readonly url?: string;
  /** Whether the request timeout expired */
  public readonly timedOut: boolean;

  constructor(
    message: string,
    options?: { url?: string; timedOut?: boolean; cause?: unknown }
  ) {
    super(message, 'TRANSPORT_ERROR', { cause: options?.cause });
    this.name = 'TransportError';
    this.url = options?.url;
    this.timedOut = options?.timedOut ?? false;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      url: this.url,
      timedOut: this.timedOut,
    };
  }
}

/**
 * Raised when the source server answers with a status above 299.
 */
export class RemoteError extends SourceError {
  /** Reason phrase sent with the status */
  public readonly statusText: string;
  /** Response body, when the server sent one */
  public readonly body?: string;

  constructor(
    message: string,
    options: { statusCode: number; statusText: string; body?: string }
  ) {
    super(message, 'REMOTE_ERROR', { statusCode: options.statusCode });
    this.name = 'RemoteError';
    this.statusText = options.statusText;
    this.body = options.body;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      statusText: this.statusText,
      body: this.body,
    };
  }
}

/**
 * Type guard to check if an error is a SourceError.
 */
export function isSourceError(error: unknown): error is SourceError {
  return error instanceof SourceError;
}

export function isUsageError(error: unknown): error is UsageError {
  return error instanceof UsageError;
}

/**
 * Type guard to check if an error is a ValidationError.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isSchemaError(error: unknown): error is SchemaError {
  return error instanceof SchemaError;
}

export function isEncodeError(error: unknown): error is EncodeError {
  return error instanceof EncodeError;
}

export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof DecodeError;
}

/**
 * Type guard to check if an error is a TransportError.
 */
export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

/**
 * Type guard to check if an error is a RemoteError.
 */
export function isRemoteError(error: unknown): error is RemoteError {
  return error instanceof RemoteError;
}

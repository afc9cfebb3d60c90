// pattern: Functional Core

/**
 * Error taxonomy shared by every layer.
 * Each failure carries a `kind` so callers (and tests) can branch on it without
 * string matching.
 */

export type ErrorKind =
  | "validation"
  | "not_found"
  | "auth"
  | "transient"
  | "malformed_record"
  | "conversion"
  | "client"
  | "cancelled";

export type ToolFailure = {
  readonly kind: ErrorKind;
  readonly message: string;
  readonly field?: string;
};

export abstract class ToolError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends ToolError {
  readonly kind = "validation" as const;

  constructor(
    readonly field: string,
    message: string,
  ) {
    super(`${field}: ${message}`);
  }
}

export class NotFoundError extends ToolError {
  readonly kind = "not_found" as const;
}

export class AuthError extends ToolError {
  readonly kind = "auth" as const;

  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

export class TransientError extends ToolError {
  readonly kind = "transient" as const;
  readonly attempts: number;
  // server-supplied Retry-After hint, already converted to milliseconds
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    options: { attempts?: number; retryAfterMs?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.attempts = options.attempts ?? 1;
    if (options.retryAfterMs !== undefined) {
      this.retryAfterMs = options.retryAfterMs;
    }
  }
}

export class MalformedRecordError extends ToolError {
  readonly kind = "malformed_record" as const;

  constructor(
    message: string,
    readonly record: unknown,
  ) {
    super(message);
  }
}

export class ConversionError extends ToolError {
  readonly kind = "conversion" as const;
}

export class ClientError extends ToolError {
  readonly kind = "client" as const;

  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
  }
}

export class CancelledError extends ToolError {
  readonly kind = "cancelled" as const;
}

export function isToolError(error: unknown): error is ToolError {
  return error instanceof ToolError;
}

export function toToolFailure(error: unknown): ToolFailure {
  if (error instanceof ValidationError) {
    return { kind: error.kind, message: error.message, field: error.field };
  }
  if (error instanceof ToolError) {
    return { kind: error.kind, message: error.message };
  }
  // unclassified failures surface as transient
  const message = error instanceof Error ? error.message : String(error);
  return { kind: "transient", message };
}

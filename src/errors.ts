// ============================================================================
// Error Taxonomy
// ============================================================================
// Every failure a tool call can produce is one of these kinds. Handlers throw
// ToolError subclasses; the kernel turns anything thrown into a Failure.
// ============================================================================

export type ErrorKind =
  | 'UnknownTool'
  | 'ValidationError'
  | 'DatabaseUnavailable'
  | 'MissingParameter'
  | 'DatabaseOperationFailed'
  | 'InvalidArgument'
  | 'NotFound'
  | 'UnexpectedError';

export interface Failure {
  ok: false;
  kind: ErrorKind;
  message: string;
  /** Structured context, e.g. per-field violations for ValidationError */
  detail?: unknown;
  hint?: string;
  /** Constructor name of the thrown value (UnexpectedError only) */
  errorName?: string;
}

export interface Success {
  ok: true;
  value: unknown;
}

export type DispatchResult = Success | Failure;

export class ToolError extends Error {
  readonly kind: ErrorKind;
  readonly detail?: unknown;

  constructor(kind: ErrorKind, message: string, options?: { detail?: unknown; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.kind = kind;
    this.detail = options?.detail;
  }
}

/** A handler needed an argument the schema let through without it. */
export class MissingParameterError extends ToolError {
  readonly parameter: string;

  constructor(parameter: string) {
    super('MissingParameter', `Missing required parameter: '${parameter}'`);
    this.parameter = parameter;
  }
}

/** The database rejected or failed an operation (driver, network, timeout). */
export class DatabaseOperationError extends ToolError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DatabaseOperationFailed', `Database operation failed: ${message}`, options);
  }
}

export class InvalidArgumentError extends ToolError {
  constructor(message: string, detail?: unknown) {
    super('InvalidArgument', message, { detail });
  }
}

export class NotFoundError extends ToolError {
  constructor(message: string) {
    super('NotFound', message);
  }
}

/**
 * Startup-only: registry misconfiguration. Never caught by the kernel.
 */
export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryError';
  }
}

export function isToolError(err: unknown): err is ToolError {
  return err instanceof ToolError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Map anything a handler threw to a Failure. Only the message and kind
 * leave the process; stack traces stay in the log.
 */
export function toFailure(err: unknown): Failure {
  if (isToolError(err)) {
    const failure: Failure = { ok: false, kind: err.kind, message: err.message };
    if (err.detail !== undefined) failure.detail = err.detail;
    return failure;
  }
  const errorName = err instanceof Error ? err.constructor.name : typeof err;
  return {
    ok: false,
    kind: 'UnexpectedError',
    message: `Operation failed: ${errorMessage(err)}`,
    errorName,
  };
}

export function failure(kind: ErrorKind, message: string, extra?: Partial<Omit<Failure, 'ok' | 'kind' | 'message'>>): Failure {
  return { ok: false, kind, message, ...extra };
}

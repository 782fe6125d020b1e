/**
 * Error types for the deployment orchestrator.
 *
 * Configuration problems are thrown before anything runs; gateway and
 * readiness failures are folded into step results instead of propagating.
 */

/**
 * Base error class for all application errors
 */
export abstract class ApplicationError extends Error {
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: string,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context ?? {};
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    name: string;
    message: string;
    code: string;
    timestamp: Date;
    context: Record<string, unknown>;
    stack?: string;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
      ...(this.stack !== undefined && { stack: this.stack }),
    };
  }
}

/**
 * Invalid or missing deployment input. Raised before any external call.
 */
export class ConfigError extends ApplicationError {
  constructor(
    message: string,
    public readonly fields: string[] = [],
    context?: Record<string, unknown>,
  ) {
    super(message, 'CONFIG_ERROR', { ...context, fields });
    this.name = 'ConfigError';
  }
}

/**
 * Error thrown when an operation times out
 */
export class TimeoutError extends ApplicationError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    public readonly operation?: string,
  ) {
    super(message, 'TIMEOUT', { timeoutMs, operation });
    this.name = 'TimeoutError';
  }
}

/**
 * Raised when the caller's AbortSignal fires before an operation settles
 */
export class CancelledError extends ApplicationError {
  constructor(public readonly operation = 'operation') {
    super(`${operation} cancelled`, 'CANCELLED', { operation });
    this.name = 'CancelledError';
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Best-effort message extraction for unknown thrown values
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}

/**
 * Errors raised by collaborators: storage engines, the HTTP fetcher and
 * content stores. `VALIDATION_ERROR` marks a caller mistake (unsafe
 * identifier, invalid options); every other code is an I/O failure.
 */

export type ErrorCode =
  | 'CONNECTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'RATE_LIMITED'
  | 'TIMEOUT'
  | 'WRITE_FAILED'
  | 'READ_FAILED'
  | 'DECODE_FAILED'
  | 'CONFIGURATION_ERROR'
  | 'UNKNOWN';

export interface ConnectorErrorDetails {
  code: ErrorCode;
  message: string;
  /** What the caller can do about it */
  suggestion?: string;
  cause?: Error;
  /** Table, endpoint, status and similar details for logs */
  context?: Record<string, unknown>;
}

export class ConnectorError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor({ code, message, suggestion, cause, context }: ConnectorErrorDetails) {
    super(message, cause ? { cause } : undefined);
    this.name = 'ConnectorError';
    this.code = code;
    this.suggestion = suggestion;
    this.context = context;
  }

  /** Whether the caller, not the collaborator, is at fault */
  get isCallerError(): boolean {
    return this.code === 'VALIDATION_ERROR';
  }

  toActionableMessage(): string {
    const head = `Error [${this.code}]: ${this.message}`;
    return this.suggestion ? `${head}\nSuggested action: ${this.suggestion}` : head;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

export function isConnectorError(error: unknown, code?: ErrorCode): error is ConnectorError {
  return error instanceof ConnectorError && (code === undefined || error.code === code);
}

/**
 * Wrap anything thrown by a driver or callback. Connector errors pass
 * through unchanged so their code survives nested boundaries.
 */
export function wrapError(
  error: unknown,
  defaultCode: ErrorCode = 'UNKNOWN',
  context?: Record<string, unknown>
): ConnectorError {
  if (error instanceof ConnectorError) {
    return error;
  }

  return new ConnectorError({
    code: defaultCode,
    message: errorMessage(error),
    cause: error instanceof Error ? error : undefined,
    context,
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

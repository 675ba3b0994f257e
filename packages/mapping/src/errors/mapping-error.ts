/**
 * Mapping-specific Error Types
 */

export type MappingErrorCode =
  | 'SCHEMA_CONFLICT'
  | 'UNSUPPORTED_FILTER'
  | 'UNPARSEABLE_TIMESTAMP'
  | 'INVALID_OPTIONS'
  | 'INVALID_MAPPING';

export interface MappingErrorDetails {
  code: MappingErrorCode;
  message: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class MappingError extends Error {
  readonly code: MappingErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: MappingErrorDetails) {
    super(details.message);
    this.name = 'MappingError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /**
   * Format error as a structured, actionable message
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
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

/**
 * Marker written in place of a field value that could not be produced.
 * The rest of the record is still transformed.
 */
export class FieldFailure {
  constructor(
    /** Target field (dotted path for repeater rows) */
    readonly field: string,
    readonly code: MappingErrorCode,
    readonly message: string,
    /** The source value that failed */
    readonly input?: unknown
  ) {}

  /** Same failure, reported under a parent path */
  under(prefix: string): FieldFailure {
    return new FieldFailure(`${prefix}.${this.field}`, this.code, this.message, this.input);
  }

  toJSON(): Record<string, unknown> {
    return { field: this.field, code: this.code, message: this.message };
  }
}

export function isFieldFailure(value: unknown): value is FieldFailure {
  return value instanceof FieldFailure;
}

import type { ValidationFailure } from './columns/types.js';

export enum BoardErrorType {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  UPSTREAM_ERROR = 'UPSTREAM_ERROR',
}

export class BoardError extends Error {
  constructor(
    public readonly type: BoardErrorType,
    message: string,
    public readonly details?: Record<string, unknown>,
    public readonly hint?: string
  ) {
    super(message);
    this.name = 'BoardError';
  }

  toJSON(): Record<string, unknown> {
    return {
      type: this.type,
      message: this.message,
      details: this.details,
      hint: this.hint,
    };
  }
}

/**
 * Bad user input for one or more columns. Never sent upstream; the tool
 * layer returns it as an ordinary result so the caller can correct itself.
 */
export class ValidationError extends BoardError {
  readonly failures: ValidationFailure[];

  constructor(failures: ValidationFailure[]) {
    const [first] = failures;
    const message = first
      ? `Invalid value for column "${first.field}": ${first.reason}`
      : 'Invalid column values';
    super(BoardErrorType.VALIDATION_ERROR, message, undefined, first?.suggestions?.length
      ? `Did you mean: ${first.suggestions.join(', ')}?`
      : undefined);
    this.name = 'ValidationError';
    this.failures = failures;
  }

  get field(): string | undefined {
    return this.failures[0]?.field;
  }

  get value(): unknown {
    return this.failures[0]?.value;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
      failures: this.failures,
    };
  }
}

export type NotFoundKind = 'board' | 'field' | 'column' | 'item' | 'group' | 'resource';

export class NotFoundError extends BoardError {
  constructor(
    public readonly kind: NotFoundKind,
    public readonly id: string,
    public readonly known: string[] = []
  ) {
    super(
      BoardErrorType.NOT_FOUND,
      `Unknown ${kind}: ${id}`,
      known.length > 0 ? { known } : undefined,
      known.length > 0 ? `Valid ${kind}s: ${known.join(', ')}` : undefined
    );
    this.name = 'NotFoundError';
  }
}

/**
 * Keys and value kinds of a request payload, never the values themselves,
 * so the error is safe to log and return.
 */
export function describePayloadShape(variables: Record<string, unknown>): Record<string, string> {
  const shape: Record<string, string> = {};
  for (const [key, value] of Object.entries(variables)) {
    if (Array.isArray(value)) {
      shape[key] = `array(${value.length})`;
    } else if (value === null) {
      shape[key] = 'null';
    } else if (typeof value === 'object') {
      shape[key] = `{${Object.keys(value).join(',')}}`;
    } else if (typeof value === 'string' && value.startsWith('{')) {
      // column_values travel as a JSON string
      shape[key] = describeJsonKeys(value);
    } else {
      shape[key] = typeof value;
    }
  }
  return shape;
}

function describeJsonKeys(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return `json{${Object.keys(parsed).join(',')}}`;
    }
  } catch {
    return 'string';
  }
  return 'string';
}

export class UpstreamError extends BoardError {
  constructor(
    public readonly operation: string,
    public readonly upstreamType: string,
    message: string,
    public readonly payloadShape: Record<string, string> = {},
    options?: { cause?: unknown; hint?: string; status?: number }
  ) {
    super(
      BoardErrorType.UPSTREAM_ERROR,
      `${operation} failed: ${message}`,
      { upstream_type: upstreamType, payload_shape: payloadShape, status: options?.status },
      options?.hint
    );
    this.name = 'UpstreamError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

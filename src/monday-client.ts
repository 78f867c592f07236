import axios, { AxiosInstance, AxiosError, AxiosAdapter } from 'axios';
import { default as PQueue } from 'p-queue';
import { z } from 'zod';
import { safeLog } from './config.js';
import { logger } from './logging/index.js';
import { setupLoggingMiddleware } from './middleware/logging-middleware.js';
import type { GraphQLOperation } from './queries.js';

// ============================================
// ERROR TYPES
// ============================================

export enum MondayErrorType {
  AUTH_ERROR = 'AUTH_ERROR',
  PERMISSION_ERROR = 'PERMISSION_ERROR',
  RATE_LIMITED = 'RATE_LIMITED',
  FIELD_NOT_FOUND = 'FIELD_NOT_FOUND',
  NOT_FOUND = 'NOT_FOUND',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  TIMEOUT = 'TIMEOUT',
  NETWORK_ERROR = 'NETWORK_ERROR',
  ABORTED = 'ABORTED',
  API_ERROR = 'API_ERROR',
}

export class MondayError extends Error {
  constructor(
    public type: MondayErrorType,
    message: string,
    public status?: number,
    public details?: Record<string, unknown>,
    public hint?: string
  ) {
    super(message);
    this.name = 'MondayError';
  }

  toJSON() {
    return {
      type: this.type,
      message: this.message,
      status: this.status,
      details: this.details,
      hint: this.hint,
    };
  }
}

type ErrorMapping = [MondayErrorType, string];

// GraphQL `extensions.code` and legacy `error_code` values
const CODE_MAP: Record<string, ErrorMapping> = {
  UNAUTHENTICATED: [MondayErrorType.AUTH_ERROR, 'Check MONDAY_API_KEY in your .env file'],
  Unauthorized: [MondayErrorType.AUTH_ERROR, 'Check MONDAY_API_KEY in your .env file'],
  UserUnauthorizedException: [MondayErrorType.PERMISSION_ERROR, 'The API token cannot access this board or action'],
  USER_UNAUTHORIZED: [MondayErrorType.PERMISSION_ERROR, 'The API token cannot access this board or action'],
  ComplexityException: [MondayErrorType.RATE_LIMITED, 'The complexity budget is spent; wait before retrying'],
  COMPLEXITY_BUDGET_EXHAUSTED: [MondayErrorType.RATE_LIMITED, 'The complexity budget is spent; wait before retrying'],
  RATE_LIMIT_EXCEEDED: [MondayErrorType.RATE_LIMITED, 'Reduce the frequency of requests'],
  maxConcurrencyExceeded: [MondayErrorType.RATE_LIMITED, 'Reduce MONDAY_MAX_CONCURRENT_REQUESTS'],
  InvalidColumnIdException: [MondayErrorType.FIELD_NOT_FOUND, 'Read monday://board/columns for valid column ids'],
  InvalidItemIdException: [MondayErrorType.NOT_FOUND, 'Check that the item exists on this board'],
  InvalidBoardIdException: [MondayErrorType.NOT_FOUND, 'Check MONDAY_BOARD_ID'],
  InvalidGroupIdException: [MondayErrorType.NOT_FOUND, 'Read monday://board/schema for valid group ids'],
  ResourceNotFoundException: [MondayErrorType.NOT_FOUND, 'Check that the item exists on this board'],
  ColumnValueException: [MondayErrorType.VALIDATION_ERROR, 'Check the value format for this column type'],
  InvalidArgumentException: [MondayErrorType.VALIDATION_ERROR, 'Check the request arguments'],
  ItemNameTooLongException: [MondayErrorType.VALIDATION_ERROR, 'Item names are limited to 255 characters'],
};

const STATUS_MAP: Record<number, [MondayErrorType, string, string]> = {
  401: [MondayErrorType.AUTH_ERROR, 'Authentication failed', 'Check MONDAY_API_KEY in your .env file'],
  403: [MondayErrorType.PERMISSION_ERROR, 'Insufficient permissions', 'The API token cannot access this board or action'],
  404: [MondayErrorType.NOT_FOUND, 'Resource not found', 'Check MONDAY_API_URL and MONDAY_BOARD_ID'],
  429: [MondayErrorType.RATE_LIMITED, 'Rate limit exceeded', 'Reduce the frequency of requests'],
};

const GraphQLErrorSchema = z.object({
  message: z.string(),
  extensions: z.object({ code: z.string().optional() }).passthrough().optional(),
});

const EnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(GraphQLErrorSchema).optional(),
  error_code: z.string().optional(),
  error_message: z.string().optional(),
  status_code: z.number().optional(),
  account_id: z.number().optional(),
});

type Envelope = z.infer<typeof EnvelopeSchema>;

function mapCode(code: string | undefined): [MondayErrorType, string | undefined] {
  return code && Object.hasOwn(CODE_MAP, code) ? CODE_MAP[code] : [MondayErrorType.API_ERROR, undefined];
}

/** Error carried in a response body, GraphQL-style first, then the legacy shape. */
function errorFromEnvelope(envelope: Envelope, status?: number): MondayError | undefined {
  const [first] = envelope.errors ?? [];
  if (first) {
    const code = first.extensions?.code;
    const [type, hint] = mapCode(code);
    const messages = (envelope.errors ?? []).map((e) => e.message).join('; ');
    return new MondayError(type, messages, status, code ? { code } : undefined, hint);
  }

  if (envelope.error_code || envelope.error_message) {
    const code = envelope.error_code;
    const [type, hint] = mapCode(code);
    return new MondayError(
      type,
      envelope.error_message ?? code ?? 'Request failed',
      status ?? envelope.status_code,
      code ? { code } : undefined,
      hint
    );
  }

  return undefined;
}

// ============================================
// GATEWAY
// ============================================

/** Anything that can run a monday.com GraphQL operation and return its `data`. */
export interface MondayGateway {
  execute(operation: GraphQLOperation, variables: Record<string, unknown>, signal?: AbortSignal): Promise<unknown>;
}

export interface MondayClientOptions {
  apiUrl: string;
  apiKey: string;
  apiVersion: string;
  timeoutMs: number;
  maxConcurrent: number;
  /** Replaces the HTTP transport; used by tests */
  adapter?: AxiosAdapter;
}

export class MondayClient implements MondayGateway {
  private client: AxiosInstance;
  private queue: PQueue;
  private timeoutMs: number;

  constructor(options: MondayClientOptions) {
    this.timeoutMs = options.timeoutMs;

    this.client = axios.create({
      baseURL: options.apiUrl,
      headers: {
        'Authorization': options.apiKey,
        'API-Version': options.apiVersion,
        'Content-Type': 'application/json',
        'User-Agent': 'monday-board-mcp/1.0.0',
      },
      timeout: options.timeoutMs,
      adapter: options.adapter,
    });

    // Setup logging middleware
    setupLoggingMiddleware(this.client);

    // Map transport failures after logging has seen them
    this.client.interceptors.response.use(
      (response) => response,
      (error: AxiosError) => {
        throw this.handleAxiosError(error);
      }
    );

    this.queue = new PQueue({
      concurrency: options.maxConcurrent,
      interval: 1000,
      intervalCap: options.maxConcurrent,
    });

    safeLog.info(`MondayClient initialized with ${options.maxConcurrent} max concurrent requests`);

    logger.info('MondayClient initialized', {
      max_concurrent: options.maxConcurrent,
      timeout: options.timeoutMs,
      api_version: options.apiVersion,
    }, 'monday-client');
  }

  private handleAxiosError(error: AxiosError): MondayError {
    if (axios.isCancel(error) || error.code === 'ERR_CANCELED') {
      return new MondayError(
        MondayErrorType.ABORTED,
        'Request aborted',
        undefined,
        { code: error.code },
        'The operation was cancelled by the client'
      );
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new MondayError(
        MondayErrorType.TIMEOUT,
        `Request timeout after ${this.timeoutMs}ms`,
        undefined,
        { code: error.code },
        'Try again, or raise MONDAY_REQUEST_TIMEOUT_MS for large boards'
      );
    }

    // Network error (no response from server)
    if (!error.response) {
      return new MondayError(
        MondayErrorType.NETWORK_ERROR,
        error.message || 'Network error occurred',
        undefined,
        { code: error.code },
        'Check your internet connection and MONDAY_API_URL'
      );
    }

    const status = error.response.status;
    const envelope = EnvelopeSchema.safeParse(error.response.data);
    const fromBody = envelope.success ? errorFromEnvelope(envelope.data, status) : undefined;
    if (fromBody) {
      return fromBody;
    }

    const mapped = STATUS_MAP[status];
    if (mapped) {
      const [type, message, hint] = mapped;
      const retryAfter = error.response.headers['retry-after'];
      return new MondayError(
        type,
        message,
        status,
        status === 429 ? { retry_after: typeof retryAfter === 'string' ? retryAfter : 'unknown' } : undefined,
        hint
      );
    }

    if (status >= 500 && status < 600) {
      return new MondayError(
        MondayErrorType.API_ERROR,
        'monday.com server error',
        status,
        undefined,
        'The monday.com API is experiencing issues. Try again later.'
      );
    }

    return new MondayError(MondayErrorType.API_ERROR, error.message || 'API request failed', status);
  }

  // Wrap all requests with queue for concurrency control
  private async queuedRequest<T>(fn: (signal?: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      throw new MondayError(
        MondayErrorType.ABORTED,
        'Request aborted before execution',
        undefined,
        undefined,
        'The operation was cancelled by the client'
      );
    }

    try {
      return await this.queue.add(
        async ({ signal: queueSignal }) => fn(signal ?? queueSignal),
        { signal, throwOnTimeout: true }
      );
    } catch (error) {
      if (error instanceof MondayError) throw error;
      if (signal?.aborted) {
        throw new MondayError(MondayErrorType.ABORTED, 'Request aborted while queued', undefined, undefined,
          'The operation was cancelled by the client');
      }
      throw error;
    }
  }

  async execute(operation: GraphQLOperation, variables: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    return this.queuedRequest(async (effectiveSignal) => {
      const response = await this.client.post<unknown>(
        '',
        { query: operation.query, variables },
        { signal: effectiveSignal }
      );

      const envelope = EnvelopeSchema.safeParse(response.data);
      if (!envelope.success) {
        throw new MondayError(
          MondayErrorType.API_ERROR,
          `Unexpected response body for ${operation.name}`,
          response.status
        );
      }

      const error = errorFromEnvelope(envelope.data, response.status);
      if (error) {
        throw error;
      }

      if (envelope.data.data === undefined || envelope.data.data === null) {
        throw new MondayError(MondayErrorType.API_ERROR, `No data returned for ${operation.name}`, response.status);
      }

      return envelope.data.data;
    }, signal);
  }

  getQueueStats() {
    return { pending: this.queue.pending, queued: this.queue.size, concurrency: this.queue.concurrency };
  }
}

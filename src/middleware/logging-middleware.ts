import { AxiosInstance, AxiosError, InternalAxiosRequestConfig, AxiosResponse } from 'axios';
import { logger } from '../logging/index.js';

const startTimes = new WeakMap<InternalAxiosRequestConfig, number>();

function parseBody(data: unknown): unknown {
  if (typeof data !== 'string') return data;
  // request bodies are already serialized by the time responses arrive
  try {
    return JSON.parse(data);
  } catch {
    return undefined;
  }
}

/** `BoardItems` from `query BoardItems(...)`, when the body is a GraphQL request. */
export function operationNameOf(data: unknown): string | undefined {
  const body = parseBody(data);
  if (typeof body !== 'object' || body === null || !('query' in body)) return undefined;
  const query = body.query;
  if (typeof query !== 'string') return undefined;
  const match = /^\s*(?:query|mutation)\s+(\w+)/.exec(query);
  return match?.[1];
}

function elapsed(config: InternalAxiosRequestConfig | undefined): number {
  const start = config ? startTimes.get(config) : undefined;
  return start === undefined ? 0 : Date.now() - start;
}

export function setupLoggingMiddleware(axiosInstance: AxiosInstance): void {
  // Request interceptor
  axiosInstance.interceptors.request.use(
    (config: InternalAxiosRequestConfig) => {
      startTimes.set(config, Date.now());

      if (logger.getConfig().requestsEnabled) {
        logger.debug('GraphQL Request', {
          method: config.method?.toUpperCase(),
          url: config.url,
          operation: operationNameOf(config.data),
        }, 'http-client');
      }

      return config;
    },
    (error: AxiosError) => {
      logger.error('GraphQL Request Error', {
        message: error.message,
        code: error.code,
      }, 'http-client');
      return Promise.reject(error);
    }
  );

  // Response interceptor
  axiosInstance.interceptors.response.use(
    (response: AxiosResponse) => {
      const duration = elapsed(response.config);

      if (logger.getConfig().requestsEnabled) {
        logger.debug('GraphQL Response', {
          operation: operationNameOf(response.config.data),
          status: response.status,
          duration_ms: duration,
        }, 'http-client');
      }

      logger.recordMetric({
        kind: 'graphql',
        name: operationNameOf(response.config.data) ?? 'anonymous',
        latency_ms: duration,
        success: true,
        timestamp: new Date().toISOString(),
      });

      return response;
    },
    (error: AxiosError) => {
      const duration = elapsed(error.config);

      logger.error('GraphQL Response Error', {
        operation: operationNameOf(error.config?.data),
        status: error.response?.status,
        duration_ms: duration,
        message: error.message,
      }, 'http-client');

      logger.recordMetric({
        kind: 'graphql',
        name: operationNameOf(error.config?.data) ?? 'anonymous',
        latency_ms: duration,
        success: false,
        timestamp: new Date().toISOString(),
        error: error.message,
      });

      return Promise.reject(error);
    }
  );
}

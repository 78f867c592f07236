// RFC 5424 log levels, lowest first
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  NOTICE = 'notice',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
  ALERT = 'alert',
  EMERGENCY = 'emergency'
}

export type LogData = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Component that logged, e.g. `board-operations` */
  logger?: string;
  timestamp?: string;
  data?: LogData;
}

/**
 * What a metric measures: an MCP tool call, a resource read, or one
 * GraphQL request sent to monday.com.
 */
export type MetricKind = 'tool' | 'resource' | 'graphql';

export interface RequestMetric {
  kind: MetricKind;
  /** Tool name, resource URI or GraphQL operation name */
  name: string;
  latency_ms: number;
  success: boolean;
  timestamp: string;
  cache_hit?: boolean;
  error?: string;
}

export interface LoggerConfig {
  enabled: boolean;
  level: LogLevel;
  mcpEnabled: boolean;
  fileEnabled: boolean;
  filePath: string;
  requestsEnabled: boolean;
  metricsEnabled: boolean;
}

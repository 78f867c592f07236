export { logger, Logger, DEFAULT_LOG_FILE, loadLoggerConfig, parseLogLevel } from './logger.js';
export { LogLevel, type LogEntry, type LogData, type MetricKind, type RequestMetric, type LoggerConfig } from './types.js';
export { MCPLogger } from './mcp-logger.js';
export { MetricsCollector, type AggregatedMetrics, type MetricsSnapshot } from './metrics.js';

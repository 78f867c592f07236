import { LogLevel, LogEntry, LogData, LoggerConfig, RequestMetric } from './types.js';
import { MCPLogger } from './mcp-logger.js';
import { FileLogger } from './file-logger.js';
import { MetricsCollector, MetricsSnapshot } from './metrics.js';

const LEVEL_ORDER = Object.values(LogLevel);

export const DEFAULT_LOG_FILE = './logs/monday-mcp.log';

export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.ERROR): LogLevel {
  const match = LEVEL_ORDER.find((level) => level === value?.toLowerCase());
  return match ?? fallback;
}

/** Logging settings from `MONDAY_LOG_*` variables. Everything but error logging starts off. */
export function loadLoggerConfig(env: NodeJS.ProcessEnv): LoggerConfig {
  return {
    enabled: env.MONDAY_LOG_ENABLED !== 'false',
    level: parseLogLevel(env.MONDAY_LOG_LEVEL),
    mcpEnabled: env.MONDAY_LOG_MCP_ENABLED === 'true',
    fileEnabled: env.MONDAY_LOG_FILE_ENABLED === 'true',
    filePath: env.MONDAY_LOG_FILE_PATH || DEFAULT_LOG_FILE,
    requestsEnabled: env.MONDAY_LOG_REQUESTS === 'true',
    metricsEnabled: env.MONDAY_LOG_METRICS === 'true',
  };
}

/**
 * Fans entries out to the MCP client and the log file. Nothing is written
 * to stdout, which belongs to the JSON-RPC stream.
 */
export class Logger {
  private config: LoggerConfig;
  private readonly mcpLogger = new MCPLogger();
  private fileLogger: FileLogger | null = null;
  private readonly metrics: MetricsCollector;

  constructor(config: LoggerConfig) {
    this.config = config;
    this.metrics = new MetricsCollector(config.metricsEnabled);
    if (config.fileEnabled) {
      this.fileLogger = new FileLogger(config.filePath);
    }
  }

  isEnabledFor(level: LogLevel): boolean {
    if (!this.config.enabled) return false;
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.level);
  }

  log(level: LogLevel, message: string, data?: LogData, logger?: string): void {
    if (!this.isEnabledFor(level)) return;

    const entry: LogEntry = { level, message, data, logger, timestamp: new Date().toISOString() };
    if (this.config.mcpEnabled) this.mcpLogger.log(entry);
    this.fileLogger?.log(entry);
  }

  debug(message: string, data?: LogData, logger?: string): void {
    this.log(LogLevel.DEBUG, message, data, logger);
  }

  info(message: string, data?: LogData, logger?: string): void {
    this.log(LogLevel.INFO, message, data, logger);
  }

  notice(message: string, data?: LogData, logger?: string): void {
    this.log(LogLevel.NOTICE, message, data, logger);
  }

  warning(message: string, data?: LogData, logger?: string): void {
    this.log(LogLevel.WARNING, message, data, logger);
  }

  error(message: string, data?: LogData, logger?: string): void {
    this.log(LogLevel.ERROR, message, data, logger);
  }

  critical(message: string, data?: LogData, logger?: string): void {
    this.log(LogLevel.CRITICAL, message, data, logger);
  }

  recordMetric(metric: RequestMetric): void {
    this.metrics.record(metric);
  }

  getMetrics(): MetricsSnapshot {
    return this.metrics.getMetrics();
  }

  getMCPLogger(): MCPLogger {
    return this.mcpLogger;
  }

  /** Applied at runtime by `set_log_level`. */
  updateConfig(changes: Partial<LoggerConfig>): void {
    const previous = this.config;
    this.config = { ...previous, ...changes };

    const reopen = this.config.fileEnabled && (!this.fileLogger || this.config.filePath !== previous.filePath);
    if (!this.config.fileEnabled || reopen) {
      this.fileLogger?.close();
      this.fileLogger = null;
    }
    if (reopen) {
      this.fileLogger = new FileLogger(this.config.filePath);
    }

    this.metrics.setEnabled(this.config.metricsEnabled);

    this.info('Logging configuration updated', { config: { ...this.config } }, 'logger');
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }
}

export const logger = new Logger(loadLoggerConfig(process.env));

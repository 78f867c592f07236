import pino from 'pino';
import { LogEntry, LogLevel } from './types.js';
import { redactSecrets } from '../config.js';

type PinoLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const PINO_LEVELS: Record<LogLevel, PinoLevel> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.NOTICE]: 'info',
  [LogLevel.WARNING]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.CRITICAL]: 'error',
  [LogLevel.ALERT]: 'fatal',
  [LogLevel.EMERGENCY]: 'fatal',
};

export class FileLogger {
  private pino: pino.Logger;

  constructor(logPath: string) {
    this.pino = pino({
      level: 'debug', // filtering happens in logger.ts

      formatters: {
        level: (label) => ({ level: label }),
      },

      timestamp: pino.stdTimeFunctions.isoTime,

      redact: {
        paths: ['*.token', '*.api_key', '*.apiKey', 'Authorization', 'headers.Authorization'],
        censor: '***REDACTED***',
      },
    },

    pino.destination({
      dest: logPath,
      sync: false,
      mkdir: true,
    }));
  }

  log(entry: LogEntry): void {
    try {
      const safeMessage = redactSecrets(entry.message);
      // redacted after serialization to reach nested values
      const safeData: unknown = entry.data ? JSON.parse(redactSecrets(JSON.stringify(entry.data))) : undefined;

      this.pino[PINO_LEVELS[entry.level]]({
        level: entry.level, // keep the RFC 5424 name in the record
        logger: entry.logger ?? 'monday-mcp',
        timestamp: entry.timestamp ?? new Date().toISOString(),
        ...(typeof safeData === 'object' && safeData !== null ? safeData : {}),
      }, safeMessage);
    } catch (error) {
      console.error('[FileLogger] Failed to write log:', error);
    }
  }

  close(): void {
    this.pino.flush((error) => {
      if (error) console.error('[FileLogger] Failed to flush log:', error);
    });
  }
}

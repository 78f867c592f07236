import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { LoggingLevel } from '@modelcontextprotocol/sdk/types.js';
import { LogEntry, LogLevel } from './types.js';

// Our levels and MCP's are the same RFC 5424 set
const MCP_LEVELS: Record<LogLevel, LoggingLevel> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.NOTICE]: 'notice',
  [LogLevel.WARNING]: 'warning',
  [LogLevel.ERROR]: 'error',
  [LogLevel.CRITICAL]: 'critical',
  [LogLevel.ALERT]: 'alert',
  [LogLevel.EMERGENCY]: 'emergency',
};

export class MCPLogger {
  private server: Server | null = null;

  setServer(server: Server): void {
    this.server = server;
  }

  log(entry: LogEntry): void {
    if (!this.server) {
      // Server not connected yet
      return;
    }

    this.server
      .sendLoggingMessage({
        level: MCP_LEVELS[entry.level],
        logger: entry.logger || 'monday-mcp',
        data: {
          message: entry.message,
          timestamp: entry.timestamp || new Date().toISOString(),
          ...entry.data,
        },
      })
      .catch((error: unknown) => {
        // Logging must never take the server down
        console.error('[MCPLogger] Failed to send log:', error);
      });
  }
}

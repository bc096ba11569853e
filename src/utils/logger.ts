import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { errorMessage } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

class Logger {
  private servers = new Set<McpServer>();
  private currentLevel: LogLevel = 'info';

  private readonly levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warning: 2,
    error: 3,
  };

  /**
   * Attach an MCP server so log lines are also forwarded to its client as
   * `notifications/message`. Returns a detach function.
   */
  attachServer(server: McpServer): () => void {
    this.servers.add(server);
    return () => {
      this.servers.delete(server);
    };
  }

  /** Accepts MCP's syslog-style levels and folds them onto ours. */
  setLevel(level: string): void {
    if (this.isValidLevel(level)) {
      this.currentLevel = level;
    } else if (level === 'notice') {
      this.currentLevel = 'info';
    } else if (level === 'critical' || level === 'alert' || level === 'emergency') {
      this.currentLevel = 'error';
    }
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  private isValidLevel(level: string): level is LogLevel {
    return level in this.levels;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.currentLevel];
  }

  private async forward(level: LogLevel, loggerName: string, data: unknown): Promise<void> {
    for (const server of this.servers) {
      if (!server.isConnected()) {
        continue;
      }
      try {
        await server.server.sendLoggingMessage({ level, logger: loggerName, data });
      } catch (error) {
        // stdout is the stdio transport's channel, so diagnostics go to stderr
        console.error(
          `[${new Date().toISOString()}] WARNING logger: failed to forward log message: ${
            errorMessage(error)
          }`,
        );
      }
    }
  }

  private async log(level: LogLevel, loggerName: string, data: unknown): Promise<void> {
    if (!this.shouldLog(level)) {
      return;
    }

    await this.forward(level, loggerName, data);

    const timestamp = new Date().toISOString();
    const payload = typeof data === 'object' ? JSON.stringify(data) : String(data);
    console.error(`[${timestamp}] ${level.toUpperCase()} ${loggerName}: ${payload}`);
  }

  async debug(loggerName: string, data?: unknown): Promise<void> {
    await this.log('debug', loggerName, data ?? {});
  }
  async info(loggerName: string, data?: unknown): Promise<void> {
    await this.log('info', loggerName, data ?? {});
  }
  async warning(loggerName: string, data?: unknown): Promise<void> {
    await this.log('warning', loggerName, data ?? {});
  }
  async error(loggerName: string, data?: unknown): Promise<void> {
    await this.log('error', loggerName, data ?? {});
  }
}

export const logger = new Logger();

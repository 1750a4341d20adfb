type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope?: string;
  message: string;
  data?: unknown;
}

function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message, stack: data.stack };
  }
  return data;
}

class Logger {
  private isDevelopment: boolean;
  private scope?: string;

  constructor(scope?: string) {
    this.isDevelopment = process.env.NODE_ENV !== 'production';
    this.scope = scope;
  }

  private formatLog(level: LogLevel, message: string, data?: unknown): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      ...(this.scope ? { scope: this.scope } : {}),
      message,
      ...(data !== undefined ? { data: serializeData(data) } : {})
    };
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (process.env.LOG_SILENT === 'true') {
      return;
    }

    const logEntry = this.formatLog(level, message, data);

    if (this.isDevelopment) {
      const prefix = logEntry.scope ? `[${logEntry.scope}] ` : '';
      console.log('[' + logEntry.timestamp + '] ' + level + ': ' + prefix + message);
      if (data !== undefined) {
        console.log('Data:', data);
      }
    } else {
      console.log(JSON.stringify(logEntry));
    }
  }

  /**
   * Logger that tags every entry with a component name.
   */
  child(scope: string): Logger {
    return new Logger(this.scope ? `${this.scope}:${scope}` : scope);
  }

  error(message: string, data?: unknown): void {
    this.log('ERROR', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('WARN', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('INFO', message, data);
  }

  debug(message: string, data?: unknown): void {
    if (this.isDevelopment) {
      this.log('DEBUG', message, data);
    }
  }
}

export type { Logger };
export const logger = new Logger();
export default logger;

/**
 * logger.ts
 * Leveled console logger shared by the whole application
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const isLogLevel = (value: string): value is LogLevel =>
  (LOG_LEVELS as readonly string[]).includes(value);

class Logger {
  private _level: LogLevel = 'info';

  constructor() {
    // Check for environment setting; keep test output quiet unless asked otherwise
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    if (envLevel && isLogLevel(envLevel)) {
      this.setLevel(envLevel);
    } else if (process.env.NODE_ENV === 'test') {
      this.setLevel('error');
    }
  }

  /**
   * Set the minimum log level to display
   * @param level The minimum level to log
   */
  setLevel(level: LogLevel): void {
    this._level = level;
  }

  get level(): LogLevel {
    return this._level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this._level);
  }

  private getTimestamp(): string {
    return new Date().toISOString();
  }

  /**
   * Log a debug message
   * @param message The message to log
   * @param meta Optional metadata to include
   */
  debug(message: string, meta?: unknown): void {
    if (this.shouldLog('debug')) {
      console.debug(`[${this.getTimestamp()}] [DEBUG] ${message}`, meta ?? '');
    }
  }

  /**
   * Log an informational message
   * @param message The message to log
   * @param meta Optional metadata to include
   */
  info(message: string, meta?: unknown): void {
    if (this.shouldLog('info')) {
      console.info(`[${this.getTimestamp()}] [INFO] ${message}`, meta ?? '');
    }
  }

  /**
   * Log a warning message
   * @param message The message to log
   * @param meta Optional metadata to include
   */
  warn(message: string, meta?: unknown): void {
    if (this.shouldLog('warn')) {
      console.warn(`[${this.getTimestamp()}] [WARN] ${message}`, meta ?? '');
    }
  }

  /**
   * Log an error message
   * @param message The message to log
   * @param meta Optional error object or metadata
   */
  error(message: string, meta?: unknown): void {
    if (this.shouldLog('error')) {
      console.error(`[${this.getTimestamp()}] [ERROR] ${message}`, meta ?? '');
    }
  }
}

export default new Logger();

/**
 * Component logger
 * One instance per component; output is prefixed with the component name
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function levelFromEnv(): LogLevel {
  const value = process.env.DRIFT_MONITOR_LOG_LEVEL;
  return isLogLevel(value) ? value : 'info';
}

export class Logger {
  private static minLevel: LogLevel = levelFromEnv();

  private readonly component: string;

  constructor(component: string) {
    this.component = component;
  }

  /**
   * Set the minimum level for every logger in the process
   */
  static setLevel(level: LogLevel): void {
    Logger.minLevel = level;
  }

  static getLevel(): LogLevel {
    return Logger.minLevel;
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[Logger.minLevel]) return;

    const line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} [${this.component}] ${message}`;

    switch (level) {
      case 'debug':
        console.debug(line, ...args);
        break;
      case 'info':
        console.info(line, ...args);
        break;
      case 'warn':
        console.warn(line, ...args);
        break;
      case 'error':
        console.error(line, ...args);
        break;
    }
  }
}

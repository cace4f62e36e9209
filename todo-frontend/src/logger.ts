/**
 * Console-backed logger with per-module instances.
 * Messages below the configured level are dropped.
 */
import { type LogLevel, readLogLevel } from './config';

const levelRank: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3
};

export class Logger {
  private currentLevel: LogLevel;
  private moduleLoggers: Map<string, LoggerInstance> = new Map();

  constructor(level: LogLevel) {
    this.currentLevel = level;
  }

  get level(): LogLevel {
    return this.currentLevel;
  }

  // Cached child logger for a module
  public getLogger(module: string): LoggerInstance {
    let instance = this.moduleLoggers.get(module);
    if (!instance) {
      instance = new LoggerInstance(this, module);
      this.moduleLoggers.set(module, instance);
    }
    return instance;
  }

  public log(level: LogLevel, module: string, message: string, data?: unknown): void {
    if (levelRank[level] > levelRank[this.currentLevel]) return;

    const line = `[${module}] ${message}`;
    if (data === undefined) {
      console[level](line);
    } else {
      console[level](line, data);
    }
  }

  public setLevel(level: LogLevel): void {
    this.currentLevel = level;
  }
}

export class LoggerInstance {
  constructor(
    private readonly logger: Logger,
    private readonly module: string
  ) {}

  public error(message: string, data?: unknown): void {
    this.logger.log('error', this.module, message, data);
  }

  public warn(message: string, data?: unknown): void {
    this.logger.log('warn', this.module, message, data);
  }

  public info(message: string, data?: unknown): void {
    this.logger.log('info', this.module, message, data);
  }

  public debug(message: string, data?: unknown): void {
    this.logger.log('debug', this.module, message, data);
  }
}

export const rootLogger = new Logger(readLogLevel());
export default rootLogger;

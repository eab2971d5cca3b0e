import { ConfigService } from '../config/config-service.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogMetadata {
  [key: string]: unknown;
}

/** 一条日志最终落到哪里；默认写 stderr，测试可替换为内存收集 */
export type LogWriter = (line: string) => void;

const stderrWriter: LogWriter = line => {
  console.error(line);
};

export class Logger {
  constructor(
    private readonly component: string,
    private readonly minLevel: LogLevel = LogLevel.INFO,
    private readonly writer: LogWriter = stderrWriter
  ) {}

  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  debug(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: Error, meta?: LogMetadata): void {
    const errorMeta = error
      ? {
          error: error.message,
          errorName: error.name,
          ...meta,
        }
      : meta;
    this.log(LogLevel.ERROR, message, errorMeta);
  }

  private log(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (!this.isEnabled(level)) return;

    const entry = {
      level: LogLevel[level],
      timestamp: new Date().toISOString(),
      component: this.component,
      message,
      ...meta,
    };

    // 打印器的输出常嵌在诊断文本里，日志一律走 stderr
    this.writer(JSON.stringify(entry));
  }
}

export function createLogger(component: string, writer?: LogWriter): Logger {
  return new Logger(component, ConfigService.getInstance().logLevel, writer);
}

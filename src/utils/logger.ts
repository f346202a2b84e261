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

export interface LogEntry extends LogMetadata {
  readonly level: string;
  readonly timestamp: string;
  readonly component: string;
  readonly message: string;
}

/** 日志输出目标，接收一条已序列化的 JSON 行 */
export type LogSink = (line: string) => void;

// 始终写 stderr，stdout 留给嵌入这些 pass 的工具
const stderrSink: LogSink = (line) => console.error(line);

export class Logger {
  constructor(
    private readonly component: string,
    private readonly minLevel: LogLevel = LogLevel.INFO,
    private readonly sink: LogSink = stderrSink
  ) {}

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
    this.log(LogLevel.ERROR, message, error ? { error: error.message, stack: error.stack, ...meta } : meta);
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  private log(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (!this.isEnabled(level)) return;
    this.sink(
      formatLogEntry({
        ...meta,
        level: LogLevel[level],
        timestamp: new Date().toISOString(),
        component: this.component,
        message,
      })
    );
  }
}

/**
 * 序列化日志条目。保留字段（level/timestamp/component/message）固定在最前面，
 * 元数据中的同名字段不会覆盖它们。
 */
export function formatLogEntry(entry: LogEntry): string {
  const { level, timestamp, component, message, ...meta } = entry;
  return JSON.stringify({ level, timestamp, component, message, ...meta });
}

export interface PerformanceMetrics {
  component: string;
  operation: string;
  duration: number;
  metadata?: LogMetadata;
}

export function logPerformance(metrics: PerformanceMetrics, sink?: LogSink): void {
  createLogger('performance', sink).info(`${metrics.operation} completed`, {
    source: metrics.component,
    duration_ms: metrics.duration,
    ...metrics.metadata,
  });
}

export function createLogger(component: string, sink?: LogSink): Logger {
  return new Logger(component, ConfigService.getInstance().logLevel, sink);
}

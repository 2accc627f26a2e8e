/**
 * Structured Logger - 結構化日誌系統
 * JSON 格式日誌，一律寫到 stderr，stdout 只留給查詢結果
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  /** 請求唯一識別碼，用於追蹤一次查詢的完整生命週期 */
  requestId?: string;
  /** 請求 URL 或端點 */
  url?: string;
  /** 執行時間（毫秒） */
  duration?: number;
  /** 自定義數據 */
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  component: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: 'warn') */
  minLevel?: LogLevel;
  /** 自定義格式化函數 */
  formatter?: (entry: LogEntry) => string;
  /** 是否包含堆棧追蹤 (default: true) */
  includeStack?: boolean;
}

/** 日誌級別優先級 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * 結構化日誌記錄器
 */
export class StructuredLogger {
  private component: string;
  private config: Required<LoggerConfig>;
  private requestIdStack: string[] = [];

  constructor(
    component: string,
    config: LoggerConfig = {}
  ) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel || 'warn',
      formatter: config.formatter || this.defaultFormatter,
      includeStack: config.includeStack !== false
    };
  }

  private defaultFormatter = (entry: LogEntry): string => {
    return JSON.stringify(entry);
  };

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private output(entry: LogEntry): void {
    console.error(this.config.formatter(entry));
  }

  debug(message: string, context?: LogContext): void {
    if (!this.shouldLog('debug')) return;

    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog('info')) return;

    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog('warn')) return;

    this.log('warn', message, context);
  }

  /**
   * 記錄 ERROR 級別日誌
   */
  error(
    message: string,
    error?: Error | null,
    context?: LogContext
  ): void {
    if (!this.shouldLog('error')) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: 'error',
      message,
      component: this.component,
      context: this.enrichContext(context)
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
        stack: this.config.includeStack ? error.stack : undefined
      };
    }

    this.output(entry);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext
  ): void {
    this.output({
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context: this.enrichContext(context)
    });
  }

  /**
   * 自動補上目前的 requestId
   */
  private enrichContext(context?: LogContext): LogContext | undefined {
    const current = this.getCurrentRequestId();
    if (!context) {
      return current ? { requestId: current } : undefined;
    }
    if (!context.requestId && current) {
      return { ...context, requestId: current };
    }
    return context;
  }

  /**
   * 推入新的 requestId（未指定時產生 UUID）
   */
  pushRequestId(requestId?: string): string {
    const id = requestId || randomUUID();
    this.requestIdStack.push(id);
    return id;
  }

  popRequestId(): string | undefined {
    return this.requestIdStack.pop();
  }

  getCurrentRequestId(): string | undefined {
    return this.requestIdStack[this.requestIdStack.length - 1];
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.config.minLevel;
  }

  /**
   * 執行帶日誌的非同步操作
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>,
    failureLevel: LogLevel = 'error'
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await fn();

      this.debug(`${operation} completed`, {
        ...context,
        duration: Date.now() - startTime
      });

      return result;
    } catch (error) {
      const failureContext = { ...context, duration: Date.now() - startTime };

      if (failureLevel === 'error') {
        this.error(
          `${operation} failed`,
          error instanceof Error ? error : new Error(String(error)),
          failureContext
        );
      } else if (this.shouldLog(failureLevel)) {
        this.log(failureLevel, `${operation} failed`, {
          ...failureContext,
          reason: error instanceof Error ? error.message : String(error)
        });
      }

      throw error;
    }
  }
}

/**
 * 預設的日誌記錄器實例，按組件分類
 */
export const loggers = {
  cli: new StructuredLogger('CLI'),
  efa: new StructuredLogger('EFA'),
  config: new StructuredLogger('Config')
};

/**
 * 一次調整所有組件的最小級別
 */
export function setGlobalLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}

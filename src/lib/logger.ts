/**
 * Structured Logger - 結構化日誌系統
 * 特性：
 *   - JSON 格式輸出（一行一筆，易於機器解析）
 *   - 日誌級別控制（LOG_LEVEL / --verbose / --quiet）
 *   - requestId 追蹤
 *   - 性能監控 (duration)
 *   - 錯誤堆棧記錄
 *
 * 所有日誌寫到 stderr，stdout 保留給指令結果（例如 `accbi auth token`）。
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** 請求唯一識別碼，用於追蹤一個操作的完整生命週期 */
  requestId?: string;
  /** 操作類型 (GET, POST, 等) */
  method?: string;
  /** 請求 URL 或端點 */
  url?: string;
  /** 執行時間（毫秒） */
  duration?: number;
  /** 返回狀態碼 */
  statusCode?: number;
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
  metadata?: Record<string, unknown>;
}

export interface LoggerConfig {
  /** 最小日誌級別 (default: 'warn') */
  minLevel?: LogLevel;
  /** 是否輸出 (default: true) */
  console?: boolean;
  /** 自定義輸出目的地 (default: process.stderr) */
  write?: (line: string) => void;
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
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

/**
 * 從環境變數取得預設級別
 */
function resolveDefaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'warn';
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

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.config = {
      minLevel: config.minLevel || resolveDefaultLevel(),
      console: config.console !== false,
      write: config.write || ((line: string) => process.stderr.write(`${line}\n`)),
      formatter: config.formatter || this.defaultFormatter,
      includeStack: config.includeStack !== false,
    };
  }

  private defaultFormatter = (entry: LogEntry): string => {
    return JSON.stringify(entry);
  };

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.minLevel];
  }

  private output(entry: LogEntry): void {
    if (!this.config.console) return;
    this.config.write(this.config.formatter(entry));
  }

  debug(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;

    this.log('debug', message, context, metadata);
  }

  info(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;

    this.log('info', message, context, metadata);
  }

  warn(message: string, context?: LogContext, metadata?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;

    this.log('warn', message, context, metadata);
  }

  error(
    message: string,
    error?: Error | null,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    if (!this.shouldLog('error')) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: 'error',
      message,
      component: this.component,
      context: this.enrichContext(context),
      metadata,
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        code: errorCode(error),
        stack: this.config.includeStack ? error.stack : undefined,
      };
    }

    this.output(entry);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    metadata?: Record<string, unknown>
  ): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      component: this.component,
      context: this.enrichContext(context),
      metadata,
    };

    this.output(entry);
  }

  /**
   * 自動添加 requestId（如果存在）
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
   * 推入新的 requestId（支持嵌套操作）
   */
  pushRequestId(requestId?: string): string {
    const id = requestId || randomUUID();
    this.requestIdStack.push(id);
    return id;
  }

  /**
   * 移除 requestId；指定 id 時只移除該筆（並行的非同步流程不一定按 LIFO 結束）
   */
  popRequestId(requestId?: string): string | undefined {
    if (requestId === undefined) {
      return this.requestIdStack.pop();
    }
    const index = this.requestIdStack.lastIndexOf(requestId);
    if (index === -1) {
      return undefined;
    }
    this.requestIdStack.splice(index, 1);
    return requestId;
  }

  getCurrentRequestId(): string | undefined {
    return this.requestIdStack[this.requestIdStack.length - 1];
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  /**
   * 執行帶日誌的非同步操作
   */
  async trackAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Omit<LogContext, 'duration'>
  ): Promise<T> {
    const startTime = Date.now();
    const requestId = this.getCurrentRequestId();

    try {
      const result = await fn();
      const duration = Date.now() - startTime;

      this.info(`${operation} completed`, {
        ...context,
        requestId,
        duration,
      });

      return result;
    } catch (error) {
      const duration = Date.now() - startTime;

      this.error(
        `${operation} failed`,
        error instanceof Error ? error : new Error(String(error)),
        {
          ...context,
          requestId,
          duration,
        }
      );

      throw error;
    }
  }
}

/**
 * 預設的日誌記錄器實例
 * 按組件分類，便於按服務過濾日誌
 */
export const loggers = {
  auth: new StructuredLogger('Auth'),
  callback: new StructuredLogger('CallbackListener'),
  api: new StructuredLogger('API'),
  config: new StructuredLogger('Config'),
};

/**
 * 一次設定所有組件的級別（--verbose / --quiet）
 */
export function setGlobalLogLevel(level: LogLevel): void {
  for (const logger of Object.values(loggers)) {
    logger.setMinLevel(level);
  }
}


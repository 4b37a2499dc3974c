export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export const logLevels: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
];

export interface LogContext {
  /** 事件名稱，會出現在輸出的路徑最後一段 */
  event?: string;
  /** 覆寫本次輸出的 emoji */
  emoji?: string;
  /** 附帶的錯誤，輸出時展開 stack */
  error?: unknown;
  [key: string]: unknown;
}

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

/**
 * 三種呼叫方式：
 * - logger.info({ count }, "訊息")
 * - logger.info("訊息")
 * - logger.info({ count })`訊息 ${count}`
 */
export interface LogMethod {
  (context: LogContext, message: string): void;
  (message: string): void;
  (context?: LogContext): TemplateLog;
}

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
};

export interface LogRecord {
  time: string;
  level: LogLevel;
  path: string;
  event?: string;
  msg: string;
  err?: SerializedError;
  [key: string]: unknown;
}

export interface LogTransport {
  write(record: LogRecord): void;
  [Symbol.asyncDispose](): Promise<void>;
}

export type EmojiMap = Record<string, string | undefined>;

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;

  /** 建立子 logger，name 會接在路徑後方，context 會與上層合併 */
  extend(name: string, context?: LogContext): Logger;
  /** 只合併 context，不改變路徑 */
  append(context: LogContext): Logger;
  attachTransport(transport: LogTransport): void;
  /** 關閉所有 transport（整棵 logger 樹共用） */
  [Symbol.asyncDispose](): Promise<void>;
}

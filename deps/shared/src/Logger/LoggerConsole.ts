import kleur from "kleur";

import { dispose } from "../utils/Disposeable";

import {
  type EmojiMap,
  type LogContext,
  type LogLevel,
  type LogMethod,
  type LogRecord,
  type LogTransport,
  type Logger,
  type SerializedError,
  type TemplateLog,
  logLevels,
} from "./Logger";

export class LoggerConsole implements Logger {
  readonly trace: LogMethod;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;

  constructor(
    private readonly level: LogLevel,
    private readonly transports: LogTransport[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = {},
    private readonly path: readonly string[] = []
  ) {
    this.trace = this.buildMethod("trace");
    this.debug = this.buildMethod("debug");
    this.info = this.buildMethod("info");
    this.warn = this.buildMethod("warn");
    this.error = this.buildMethod("error");
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      [...this.path, name]
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      this.path
    );
  }

  // transports 陣列與子 logger 共用，掛上後整棵樹都會輸出
  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  async [Symbol.asyncDispose]() {
    const transports = this.transports.splice(0);
    await dispose(...transports);
  }

  private buildMethod(level: LogLevel): LogMethod {
    const write = (context: LogContext, plain: string, colored: string) =>
      this.write(level, context, plain, colored);

    function log(context: LogContext, message: string): void;
    function log(message: string): void;
    function log(context?: LogContext): TemplateLog;
    function log(
      first?: LogContext | string,
      message?: string
    ): TemplateLog | void {
      if (typeof first === "string") return write({}, first, first);
      if (message !== undefined) return write(first ?? {}, message, message);
      return (strings, ...values) => {
        const indexed: Record<string, unknown> = {};
        let plain = strings[0] ?? "";
        let colored = plain;
        values.forEach((value, i) => {
          const tail = strings[i + 1] ?? "";
          indexed[`__${i}`] = value;
          plain += formatValue(value) + tail;
          colored += kleur.green(formatValue(value)) + tail;
        });
        write({ ...indexed, ...first }, plain, colored);
      };
    }
    return log;
  }

  private write(
    level: LogLevel,
    callContext: LogContext,
    plain: string,
    colored: string
  ) {
    if (logLevels.indexOf(level) < logLevels.indexOf(this.level)) return;

    const merged: LogContext = { ...this.context, ...callContext };
    const { event, emoji: _emoji, error, ...rest } = merged;
    const emoji = this.resolveEmoji(level, callContext, event);
    const label = [...this.path, event ?? level].join(":");
    const extra = Object.keys(rest).length > 0 ? ` ${stringify(rest)}` : "";
    const line = `${emoji} ${label}: ${colored}${extra}`.trimStart();

    const print = pickConsole(level);
    print(line);
    const serialized = error === undefined ? undefined : serializeError(error);
    if (serialized) {
      console.error(serialized.stack ?? `${serialized.name}: ${serialized.message}`);
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      ...rest,
      time: new Date().toISOString(),
      level,
      path: this.path.join(":"),
      event,
      msg: plain,
      err: serialized,
    };
    for (const transport of this.transports) {
      transport.write(record);
    }
  }

  /**
   * emoji 優先序：呼叫時指定 → 事件對應 → warn/error 等級對應 → logger 自身 → 等級對應。
   */
  private resolveEmoji(
    level: LogLevel,
    callContext: LogContext,
    event: string | undefined
  ) {
    if (callContext.emoji) return callContext.emoji;
    const byEvent = event ? this.emojiMap[event] : undefined;
    if (byEvent) return byEvent;
    const byLevel = this.emojiMap[level];
    if ((level === "warn" || level === "error") && byLevel) return byLevel;
    return this.context.emoji ?? byLevel ?? "";
  }
}

function pickConsole(level: LogLevel) {
  switch (level) {
    case "error":
      return console.error;
    case "warn":
      return console.warn;
    case "info":
      return console.info;
    default:
      return console.debug;
  }
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(formatValue).join(", ");
  if (value !== null && typeof value === "object") return stringify(value);
  return String(value);
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  if (error !== null && typeof error === "object") {
    const type = "type" in error ? String(error.type) : "Error";
    const message = "message" in error ? String(error.message) : stringify(error);
    return { name: type, message };
  }
  return { name: "Error", message: String(error) };
}

function stringify(value: unknown) {
  try {
    return JSON.stringify(value, (_key, v: unknown) =>
      typeof v === "bigint" ? v.toString() : v
    );
  } catch {
    return "[unserializable]";
  }
}

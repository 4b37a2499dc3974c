import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import type { EmojiMap, Logger } from "./Logger";
import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export { LoggerConsole } from "./LoggerConsole";

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Union(
      [
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
      ],
      { default: "info" }
    ),
    LOG_DIR: t.Optional(t.String()),
    LOG_FILE_NAME: t.String({ default: "media-flow.log" }),
  })
);

/**
 * 依環境變數建立 logger：
 * - LOG_LEVEL：最低輸出等級，預設 info
 * - LOG_DIR：有設定時另外寫入輪替檔（JSON Lines）
 */
export function createDefaultLoggerFromEnv(): Logger {
  const { LOG_LEVEL, LOG_DIR, LOG_FILE_NAME } = getLoggerConfig();
  const logger = new LoggerConsole(LOG_LEVEL, [], {}, defaultEmojiMap);
  if (LOG_DIR) {
    logger.attachTransport(
      new RfsTransport({ filename: LOG_FILE_NAME, rfs: { path: LOG_DIR } })
    );
  }
  return logger;
}

import { LoggerConsole, type LogLevel, logLevels } from "../Logger";

/**
 * 測試用 logger，預設只輸出 error；可用 TEST_LOG_LEVEL 調整。
 */
export function buildTestLogger(level?: LogLevel) {
  return new LoggerConsole(level ?? readLevel(), [], {}, {});
}

function readLevel(): LogLevel {
  const fromEnv = process.env.TEST_LOG_LEVEL;
  return logLevels.find((l) => l === fromEnv) ?? "error";
}

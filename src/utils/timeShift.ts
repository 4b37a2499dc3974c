import { addHours } from "date-fns";

import { type Result, err, ok } from "~shared/utils/Result";

/** auto：依檔名判斷相機，再決定偏移 */
export type TimeShift = number | "auto";

/**
 * 轉為 exiftool Geosync 格式，例如 -8 → "-8:00:00"。
 * Geosync 的值會加在檔案時間上再去比對軌跡。
 */
export function toGeosync(hours: number) {
  const sign = hours < 0 ? "-" : "+";
  return `${sign}${Math.abs(hours)}:00:00`;
}

/** 檔案時間加上偏移後，才是軌跡紀錄上的時間 */
export function resolveLookupTime(fileTime: Date, shiftHours: number) {
  return addHours(fileTime, shiftHours);
}

/**
 * 本機時區相對 UTC 的整數小時，例如 Asia/Taipei 為 8。
 * timezoneOffsetMinutes 與 Date#getTimezoneOffset 同號（UTC - 當地）。
 */
export function localUtcOffsetHours(
  timezoneOffsetMinutes = new Date().getTimezoneOffset()
) {
  return Math.trunc(-timezoneOffsetMinutes / 60) || 0;
}

export function parseTimeShift(
  value: unknown,
  optionName = "--time-shift"
): Result<number, string> {
  if (value === undefined || value === null || value === "") return ok(0);
  const n = typeof value === "number" ? value : Number(String(value).trim());
  if (!Number.isInteger(n)) {
    return err(`${optionName} 必須是整數小時，收到: ${String(value)}`);
  }
  return ok(n);
}

/** 與 parseTimeShift 相同，另外接受 "auto" */
export function parseAutoTimeShift(
  value: unknown,
  optionName = "--time-shift"
): Result<TimeShift, string> {
  if (typeof value === "string" && value.trim().toLowerCase() === "auto") {
    return ok("auto");
  }
  const parsed = parseTimeShift(value, optionName);
  if (!parsed.ok) {
    return err(`${optionName} 必須是整數小時或 auto，收到: ${String(value)}`);
  }
  return parsed;
}

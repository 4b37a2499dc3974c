import { ExifDate, ExifDateTime, ExifTime } from "exiftool-vendored";

const EXIF_TIMESTAMP_RE =
  /^(\d{4}):(\d{2}):(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(Z|[+-]\d{2}:\d{2})?$/;

/**
 * 解析 "YYYY:MM:DD HH:mm:ss[.sss][±HH:MM]"。
 * 無時區時視為 UTC（QuickTime 標籤即為 UTC），有時區時換算成 UTC。
 */
export function parseExifTimestamp(raw: string): Date | undefined {
  const m = EXIF_TIMESTAMP_RE.exec(raw.trim());
  if (!m) return undefined;
  const [, year, month, day, hour, minute, second, zone] = m;
  const baseUtcMs = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second)
  );
  const d = new Date(baseUtcMs - offsetMinutes(zone) * 60 * 1000);
  return Number.isNaN(d.getTime()) ? undefined : d;
}

function offsetMinutes(zone: string | undefined) {
  if (!zone || zone === "Z") return 0;
  const sign = zone.startsWith("-") ? -1 : 1;
  const [h, m] = zone.slice(1).split(":");
  return sign * (Number(h) * 60 + Number(m));
}

/** 將 exiftool-vendored 讀出的值轉回 exiftool 文字格式 */
export function tagValueToString(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (
    value instanceof ExifDateTime ||
    value instanceof ExifDate ||
    value instanceof ExifTime
  ) {
    return value.rawValue ?? value.toString();
  }
  if (Array.isArray(value)) {
    const parts = value.flatMap((v) => tagValueToString(v) ?? []);
    return parts.length > 0 ? parts.join(", ") : undefined;
  }
  return undefined;
}

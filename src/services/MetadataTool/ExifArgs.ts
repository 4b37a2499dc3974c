import type { TagValues } from "@/types";
import { toGeosync } from "@/utils/timeShift";

// 影片常超過 4GB
export const commonWriteArgs = [
  "-overwrite_original",
  "-api",
  "largefilesupport=1",
] as const;

export function assignmentArgs(tags: TagValues): string[] {
  return Object.entries(tags).flatMap(([name, value]) =>
    value === undefined ? [] : [`-${name}=${value}`]
  );
}

export function shiftArgs(tagNames: readonly string[], hours: number) {
  if (hours === 0) return [];
  const op = hours > 0 ? "+=" : "-=";
  return tagNames.map((name) => `-${name}${op}${Math.abs(hours)}`);
}

export function copyArgs(sourcePath: string, tagNames: readonly string[]) {
  return ["-tagsFromFile", sourcePath, ...tagNames.map((name) => `-${name}`)];
}

export function createArgs(outputPath: string) {
  return ["-o", outputPath];
}

/** Geosync 必須出現在 -geotag 之前才會生效 */
export function geotagArgs(trackLogs: readonly string[], shiftHours: number) {
  const sync = shiftHours === 0 ? [] : [`-Geosync=${toGeosync(shiftHours)}`];
  return [...sync, ...trackLogs.flatMap((log) => ["-geotag", log])];
}

const noFixPatterns = [/too far/i, /No track points/i];

/** exiftool 在時間落在軌跡範圍外時的訊息 */
export function isNoFixMessage(message: string) {
  return noFixPatterns.some((re) => re.test(message));
}

const gpsFilePatterns = [/Error (opening|reading) GPS file/i, /GPS track is empty/i];

/** 軌跡檔本身不可用；exiftool 只當成警告並以 0 結束 */
export function isGpsFileError(message: string) {
  return gpsFilePatterns.some((re) => re.test(message));
}

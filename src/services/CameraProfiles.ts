import path from "node:path";

import { cameraProfiles, fujifilmXT30 } from "@/constants";
import type { CameraProfile, TagValues } from "@/types";
import { kindOf } from "@/utils/helper";
import type { TimeShift } from "@/utils/timeShift";

export function matchCameraProfile(fileName: string): CameraProfile | undefined {
  return cameraProfiles.find((p) => p.fileNamePattern.test(fileName));
}

export function guessCameraProfile(fileName: string): CameraProfile {
  return matchCameraProfile(fileName) ?? fujifilmXT30;
}

/**
 * 整理成可寫入的 Make / Model。
 * Sony 的 DeviceManufacturer / DeviceModelName 優先；都沒有時依檔名推測機身。
 */
export function canonicalCameraTags(
  fileName: string,
  values: TagValues
): { Make: string; Model: string } {
  const profile = guessCameraProfile(fileName);
  return {
    Make: values.DeviceManufacturer ?? values.Make ?? profile.make,
    Model: values.DeviceModelName ?? values.Model ?? profile.model,
  };
}

/** 影片時間相對 UTC 的小時數；認不出相機時當作 UTC */
export function guessVideoUtcOffset(filePath: string, localOffsetHours: number) {
  const profile = matchCameraProfile(path.basename(filePath));
  return profile?.videoClock === "local" ? localOffsetHours : 0;
}

/**
 * 時間標籤要平移多少才會變成 UTC。
 * auto 時 Fujifilm 影片（當地時間）為 -localOffsetHours，其餘影片與所有影像為 0。
 */
export function resolveVideoTimeShift(
  shift: TimeShift,
  filePath: string,
  localOffsetHours: number
) {
  if (shift !== "auto") return shift;
  if (kindOf(filePath) !== "video") return 0;
  return -guessVideoUtcOffset(filePath, localOffsetHours) || 0;
}

/**
 * 比對軌跡時的偏移。exiftool 把沒有時區的時間當作本機時間，
 * 所以 auto 時 UTC 影片要補上 localOffsetHours，當地時間的影片與影像為 0。
 */
export function resolveLookupShift(
  shift: TimeShift,
  filePath: string,
  localOffsetHours: number,
  isVideo: boolean
) {
  if (shift !== "auto") return shift;
  if (!isVideo) return 0;
  return localOffsetHours - guessVideoUtcOffset(filePath, localOffsetHours);
}

import type { CameraProfile, NamingConvention, TagValues } from "@/types";

export const videoExtensions = [".mov", ".mp4", ".m4v"] as const;

export const imageExtensions = [
  ".jpg",
  ".jpeg",
  ".heic",
  ".heif",
  ".tif",
  ".tiff",
  ".png",
  ".dng",
  ".raf",
  ".arw",
] as const;

export const companionExtension = ".xmp";

/** geotag 影片時暫存的 companion：<base>_geotag_tmp.xmp，不會碰到使用者自己的 sidecar */
export const companionSuffix = "_geotag_tmp";

export const imageDateTags = [
  "CreateDate",
  "DateTimeOriginal",
  "ModifyDate",
  "DateCreated",
] as const;

export const videoDateTags = [
  ...imageDateTags,
  "MediaCreateDate",
  "MediaModifyDate",
  "TrackCreateDate",
  "TrackModifyDate",
] as const;

// macOS 轉檔服務會改掉或丟掉這些標籤
export const copyTimeTags = [
  "TrackCreateDate",
  "TrackModifyDate",
  "MediaCreateDate",
  "MediaModifyDate",
  "ModifyDate",
  "DateTimeOriginal",
  "CreateDate",
] as const;

// Sony 使用 DeviceManufacturer / DeviceModelName，exiftool 無法寫入，需轉成 Make / Model
export const cameraTags = [
  "Make",
  "Model",
  "DeviceManufacturer",
  "DeviceModelName",
] as const;

export const coordinateTags = [
  "GPSCoordinates",
  "GPSAltitude",
  "GPSAltitudeRef",
  "GPSLatitude",
  "GPSLongitude",
] as const;

export const placeholderCoordinates: TagValues = {
  GPSCoordinates: "0, 0, 0",
  GPSLatitude: "0",
  GPSLongitude: "0",
  GPSAltitude: "0",
  GPSAltitudeRef: "Above Sea Level",
};

export const fujifilmXT30: CameraProfile = {
  make: "FUJIFILM",
  model: "X-T30",
  fileNamePattern: /^DSCF/,
  videoClock: "local",
};

export const sonyA7M4: CameraProfile = {
  make: "SONY",
  model: "ILCE-7M4",
  fileNamePattern: /^C\d{4}.*\.MP4$/,
  videoClock: "utc",
};

export const cameraProfiles: readonly CameraProfile[] = [fujifilmXT30, sonyA7M4];

export const defaultNamingConvention: NamingConvention = {
  prefix: "DSCF",
  originalExtension: ".MOV",
  processedMarker: "-1",
  processedExtension: ".mov",
};

export type MediaKind = "image" | "video";

export type MediaFile = {
  /** 檔案完整路徑 */
  path: string;
  /** 不含副檔名的檔名 */
  baseName: string;
  /** 副檔名（保留大小寫，含 "."） */
  extension: string;
  kind: MediaKind;
};

/**
 * 原始影片與轉檔後影片的配對，兩者共用 baseName：
 *   DSCF1234.MOV ↔ DSCF1234-1.mov
 */
export type FilePair = {
  baseName: string;
  original: MediaFile;
  processed: MediaFile;
};

/**
 * 相機與轉檔服務產生的檔名規則，比對時區分大小寫。
 */
export type NamingConvention = {
  prefix: string;
  originalExtension: string;
  processedMarker: string;
  processedExtension: string;
};

export type CameraProfile = {
  make: string;
  model: string;
  fileNamePattern: RegExp;
  /** local：影片時間為拍攝地的當地時間；utc：影片時間為 UTC */
  videoClock: "local" | "utc";
};

/** 標籤名稱 → exiftool 文字格式的值 */
export type TagValues = Partial<Record<string, string>>;

export type MoveFile = { from: string; to: string };

export type ToolInvocationError = {
  type: "TOOL_INVOCATION_FAILED";
  filePath: string;
  message: string;
};

export type PairingWarning = {
  type: "PAIRING_WARNING";
  reason: "MISSING_ORIGINAL" | "MISSING_PROCESSED";
  filePath: string;
  message: string;
};

export type TagAbsentFallback = {
  type: "TAG_ABSENT_FALLBACK";
  filePath: string;
  tags: string[];
  message: string;
};

export type StampError = {
  type: "STAMP_FAILED";
  filePath: string;
  message: string;
};

export type NoCreationTime = {
  type: "NO_CREATION_TIME";
  filePath: string;
  message: string;
};

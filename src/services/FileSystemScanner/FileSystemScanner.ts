import type { Result } from "~shared/utils/Result";

import type { MediaKind } from "@/types";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export type ScanOptions = {
  /** 只列出這些種類的媒體檔；未指定時列出所有檔案 */
  kinds?: readonly MediaKind[];
  /** 檔名 glob（不分大小寫），預設 "*" */
  pattern?: string;
};

/** 只列出資料夾本身的檔案，不進子資料夾，也不列出 .xmp sidecar */
export interface FileSystemScanner {
  scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>>;
}

import type { Result } from "~shared/utils/Result";
import type { AsyncDisposeable } from "~shared/utils/Disposeable";

import type { TagValues, ToolInvocationError } from "@/types";

export type GeotagReport = {
  /** 個別寫入失敗的檔案，其餘檔案仍會處理 */
  failures: ToolInvocationError[];
  /** 軌跡範圍內沒有對應點、維持原樣的檔案 */
  noFix: string[];
};

export type WriteTagsOptions = {
  /** 由此檔案複製出新檔後再寫入（目標檔不可已存在） */
  createFrom?: string;
};

/**
 * 對外部 metadata 工具的唯一出入口，所有寫入皆直接覆寫原檔。
 */
export interface MetadataTool extends AsyncDisposeable {
  /** 只回傳存在的標籤，值一律為 exiftool 的文字格式 */
  readTags(
    filePath: string,
    tagNames: readonly string[]
  ): Promise<Result<TagValues, ToolInvocationError>>;

  readTag(
    filePath: string,
    tagName: string
  ): Promise<Result<string | undefined, ToolInvocationError>>;

  writeTags(
    filePath: string,
    tags: TagValues,
    options?: WriteTagsOptions
  ): Promise<Result<void, ToolInvocationError>>;

  /** 只複製來源上存在的標籤 */
  copyTags(
    sourcePath: string,
    targetPath: string,
    tagNames: readonly string[]
  ): Promise<Result<void, ToolInvocationError>>;

  /** hours 為 0 時不做任何事 */
  shiftTags(
    filePath: string,
    tagNames: readonly string[],
    hours: number
  ): Promise<Result<void, ToolInvocationError>>;

  /**
   * 以軌跡檔為 targets 寫入 GPS。找不到對應點的檔案維持原樣，不視為錯誤。
   * 軌跡檔不存在或無法讀取時整批回傳錯誤；個別檔案失敗則收在 report.failures。
   */
  geotag(
    targets: readonly string[],
    trackLogs: readonly string[],
    timeShiftHours: number
  ): Promise<Result<GeotagReport, ToolInvocationError>>;
}

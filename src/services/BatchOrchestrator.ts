import { type Result, err, ok } from "~shared/utils/Result";

import type {
  MoveFile,
  NamingConvention,
  PairingWarning,
  TagAbsentFallback,
} from "@/types";
import type { TimeShift } from "@/utils/timeShift";

export type BatchStage = "scan" | "move" | "copy-time" | "geotag";

export type BatchFailure = {
  stage: BatchStage;
  type: string;
  filePath: string;
  message: string;
};

export type BatchWarning = PairingWarning | TagAbsentFallback;

export type GeotagDirectoryOptions = {
  timeShiftHours?: TimeShift;
  videoTimeShiftHours?: TimeShift;
  /** 已有座標的檔案不再處理 */
  skipTagged?: boolean;
  /** 展開資料夾時使用的檔名 glob，預設列出所有影像與影片 */
  pattern?: string;
};

/** 配對與搬移一定會執行，其餘步驟可選 */
export type BatchAction = "copy-time" | "geotag";

export const batchActions: readonly BatchAction[] = ["copy-time", "geotag"];

/** 接受重複指定或以逗號分隔；沒有指定時回傳 undefined（全部執行） */
export function parseBatchActions(
  values: readonly string[]
): Result<BatchAction[] | undefined, string> {
  const names = values
    .flatMap((v) => v.split(","))
    .map((v) => v.trim())
    .filter((v) => v !== "");
  if (names.length === 0) return ok(undefined);
  const actions: BatchAction[] = [];
  for (const name of names) {
    const action = batchActions.find((a) => a === name);
    if (!action) {
      return err(`--action 只接受 ${batchActions.join(", ")}，收到: ${name}`);
    }
    if (!actions.includes(action)) actions.push(action);
  }
  return ok(actions);
}

export type GeotagDirectoryResult = {
  geotagged: string[];
  /** 軌跡範圍內找不到座標（影片則為寫入預設座標）的檔案 */
  untagged: string[];
  skipped: string[];
  warnings: TagAbsentFallback[];
  failures: BatchFailure[];
};

export type BatchRequest = {
  directory: string;
  /** 絕對路徑，或相對於 directory */
  outputDir: string;
  trackLogs: readonly string[];
  convention?: NamingConvention;
  /** 預設全部執行 */
  actions?: readonly BatchAction[];
  timeShiftHours?: TimeShift;
  videoTimeShiftHours?: TimeShift;
};

export type BatchResult = {
  /** failures 為空即為 true，warnings 不影響 */
  ok: boolean;
  moved: MoveFile[];
  geotagged: string[];
  untagged: string[];
  warnings: BatchWarning[];
  failures: BatchFailure[];
};

export interface BatchOrchestrator {
  /** 配對 → 搬移 → 複製時間 → geotag */
  run(request: BatchRequest): Promise<BatchResult>;

  geotagDirectory(
    directory: string,
    trackLogs: readonly string[],
    options?: GeotagDirectoryOptions
  ): Promise<GeotagDirectoryResult>;

  /** paths 可混合檔案與資料夾，資料夾只展開一層 */
  geotagPaths(
    paths: readonly string[],
    trackLogs: readonly string[],
    options?: GeotagDirectoryOptions
  ): Promise<GeotagDirectoryResult>;
}

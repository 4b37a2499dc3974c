import type { Result } from "~shared/utils/Result";

import type { NoCreationTime, TagValues, ToolInvocationError } from "@/types";

export type CopyTimeReport = {
  source: string;
  target: string;
  tags: TagValues;
};

export type BridgeError = ToolInvocationError | NoCreationTime;

export interface TimestampBridge {
  /** 把原始檔的時間標籤與 Make / Model 寫到處理後的檔案，可重複執行 */
  copyCreationTime(
    originalPath: string,
    processedPath: string
  ): Promise<Result<CopyTimeReport, BridgeError>>;
}

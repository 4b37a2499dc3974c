import type { Result } from "~shared/utils/Result";

import type {
  StampError,
  TagAbsentFallback,
  ToolInvocationError,
} from "@/types";
import type { TimeShift } from "@/utils/timeShift";

export type GeotagOptions = {
  /** 檔案時間 + timeShiftHours = 軌跡時間 */
  timeShiftHours?: TimeShift;
  /** 座標轉移後再平移影片的時間標籤 */
  videoTimeShiftHours?: TimeShift;
};

/**
 * copied：來源有 GPSCoordinates
 * synthesized：由經緯度組出 GPSCoordinates
 * placeholder：來源沒有座標，寫入 0, 0, 0
 */
export type CoordinateSource = "copied" | "synthesized" | "placeholder";

export type TransferOutcome = {
  source: string;
  target: string;
  coordinates: string;
  coordinateSource: CoordinateSource;
  warnings: TagAbsentFallback[];
};

export type GeotagOutcome = TransferOutcome & {
  video: string;
  companion: string;
  companionReused: boolean;
  /** 用來比對軌跡的時間（UTC ISO） */
  lookupTime?: string;
  /** 實際套用的偏移（auto 已換算成小時） */
  timeShiftHours: number;
  videoTimeShiftHours: number;
};

export type PipelineError = StampError | ToolInvocationError;

export interface GeotagPipeline {
  /** stamp → tag → transfer：透過 companion 影像替影片寫入座標 */
  geotagVideo(
    videoPath: string,
    trackLogs: readonly string[],
    options?: GeotagOptions
  ): Promise<Result<GeotagOutcome, PipelineError>>;

  /** 複製座標標籤，完成後 target 一定帶有 GPSCoordinates */
  transfer(
    sourcePath: string,
    targetPath: string
  ): Promise<Result<TransferOutcome, ToolInvocationError>>;
}

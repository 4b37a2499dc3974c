import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { expandHome, toArray } from "@/utils/helper";
import { parseAutoTimeShift } from "@/utils/timeShift";

import { buildServices } from "./ServiceContext";

type GeotagOptions = {
  gpslog?: string | string[];
  pattern?: string;
  timeShift?: string | number;
  videoTimeShift?: string | number;
  skipTagged?: boolean;
};

export function registerGeotag(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "geotag <...paths>",
      "依 GPS 軌跡為檔案或資料夾內的影像與影片寫入座標"
    )
    .option("-g, --gpslog <file>", "GPS 軌跡檔，可重複指定")
    .option("-p, --pattern <glob>", "只處理資料夾內符合此 glob 的檔案，例如 *.jpg")
    .option(
      "--time-shift <hours>",
      "檔案時間加上此值後比對軌跡，負數請寫成 --time-shift=-8；auto 依檔名判斷"
    )
    .option(
      "--video-time-shift <hours>",
      "影片寫入座標後平移時間標籤；auto 會把 Fujifilm 影片轉成 UTC"
    )
    .option("--skip-tagged", "略過已有座標的檔案", { default: false })
    .action(async (paths: string[], options: GeotagOptions) => {
      const logger = baseLogger.extend("geotag", { emoji: "🗺️" });
      const trackLogs = toArray(options.gpslog).map(expandHome);
      if (trackLogs.length === 0) {
        logger.error("至少需要一個 -g <軌跡檔>");
        process.exitCode = 1;
        return;
      }
      const timeShift = parseAutoTimeShift(options.timeShift);
      const videoTimeShift = parseAutoTimeShift(
        options.videoTimeShift,
        "--video-time-shift"
      );
      if (isErr(timeShift) || isErr(videoTimeShift)) {
        logger.error(
          [timeShift, videoTimeShift]
            .flatMap((r) => (r.ok ? [] : [r.error]))
            .join("; ")
        );
        process.exitCode = 1;
        return;
      }

      const { config, metadataTool, orchestrator } = buildServices(logger);
      const targets = paths.map(expandHome);
      try {
        const result = await orchestrator.geotagPaths(targets, trackLogs, {
          timeShiftHours: timeShift.value,
          videoTimeShiftHours: videoTimeShift.value,
          skipTagged: options.skipTagged,
          pattern: options.pattern,
        });
        const writer = new DumpWriterDefault(
          logger,
          config.MEDIA_FLOW_REPORT_DIR
        );
        await writer.dump("geotag", { paths: targets, trackLogs, ...result });
        if (result.failures.length > 0) process.exitCode = 1;
      } finally {
        await dispose(metadataTool);
      }
    });
}

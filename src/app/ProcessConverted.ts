import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { defaultNamingConvention } from "@/constants";
import { batchActions, parseBatchActions } from "@/services/BatchOrchestrator";
import { expandHome, toArray } from "@/utils/helper";
import { parseAutoTimeShift } from "@/utils/timeShift";

import { buildServices } from "./ServiceContext";

type ProcessOptions = {
  gpslog?: string | string[];
  action?: string | string[];
  output?: string;
  timeShift?: string | number;
  videoTimeShift?: string | number;
  prefix?: string;
  marker?: string;
};

export function registerProcessConverted(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "process <dir>",
      "處理 macOS 轉檔後的影片：配對、搬到輸出資料夾、補時間、geotag"
    )
    .option("-g, --gpslog <file>", "GPS 軌跡檔，可重複指定；未指定則略過 geotag")
    .option(
      "-a, --action <action>",
      `只執行指定步驟，可重複指定：${batchActions.join(", ")}（預設全部）`
    )
    .option("--output <dir>", "輸出資料夾，相對於 <dir>（預設 000hevc）")
    .option(
      "--time-shift <hours>",
      "檔案時間加上此值後比對軌跡，負數請寫成 --time-shift=-8；auto 依檔名判斷"
    )
    .option(
      "--video-time-shift <hours>",
      "影片寫入座標後平移時間標籤；auto 會把 Fujifilm 影片轉成 UTC"
    )
    .option("--prefix <prefix>", `檔名前綴（預設 ${defaultNamingConvention.prefix}）`)
    .option(
      "--marker <marker>",
      `轉檔後檔名標記（預設 ${defaultNamingConvention.processedMarker}）`
    )
    .action(async (dir: string, options: ProcessOptions) => {
      const logger = baseLogger.extend("process", { emoji: "🎞️" });
      const actions = parseBatchActions(toArray(options.action));
      if (isErr(actions)) {
        logger.error(actions.error);
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
      const directory = expandHome(dir);
      const trackLogs = toArray(options.gpslog).map(expandHome);
      try {
        const result = await orchestrator.run({
          directory,
          outputDir: options.output ?? config.MEDIA_FLOW_OUTPUT_DIR,
          trackLogs,
          convention: {
            ...defaultNamingConvention,
            prefix: options.prefix ?? defaultNamingConvention.prefix,
            processedMarker:
              options.marker ?? defaultNamingConvention.processedMarker,
          },
          actions: actions.value,
          timeShiftHours: timeShift.value,
          videoTimeShiftHours: videoTimeShift.value,
        });

        const writer = new DumpWriterDefault(
          logger,
          config.MEDIA_FLOW_REPORT_DIR
        );
        await writer.dump("process", { directory, trackLogs, ...result });

        logger.info({
          emoji: result.ok ? "✅" : "⚠️",
          moved: result.moved.length,
          geotagged: result.geotagged.length,
          untagged: result.untagged.length,
          warnings: result.warnings.length,
          failures: result.failures.length,
        })`處理完成`;
        if (!result.ok) process.exitCode = 1;
      } finally {
        await dispose(metadataTool);
      }
    });
}

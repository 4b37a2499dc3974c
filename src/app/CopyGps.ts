import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { imageDateTags, videoDateTags } from "@/constants";
import { resolveVideoTimeShift } from "@/services/CameraProfiles";
import { expandHome, kindOf } from "@/utils/helper";
import { localUtcOffsetHours, parseAutoTimeShift } from "@/utils/timeShift";

import { buildServices } from "./ServiceContext";

type CopyGpsOptions = {
  timeShift?: string | number;
};

export function registerCopyGps(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "copy-gps <source> <...targets>",
      "將來源檔案的座標複製到目標檔案，來源沒有座標時寫入 0, 0, 0"
    )
    .option(
      "--time-shift <hours>",
      "複製後平移目標的時間標籤，負數請寫成 --time-shift=-8；auto 依檔名判斷"
    )
    .action(
      async (source: string, targets: string[], options: CopyGpsOptions) => {
        const logger = baseLogger.extend("copy-gps", { emoji: "📍" });
        const shift = parseAutoTimeShift(options.timeShift);
        if (isErr(shift)) {
          logger.error(shift.error);
          process.exitCode = 1;
          return;
        }

        const { metadataTool, pipeline } = buildServices(logger);
        const localOffset = localUtcOffsetHours();
        let failed = 0;

        try {
          for (const target of targets.map(expandHome)) {
            const transferred = await pipeline.transfer(
              expandHome(source),
              target
            );
            if (isErr(transferred)) {
              failed++;
              logger.error({ error: transferred.error })`${target} 複製座標失敗`;
              continue;
            }
            const tags =
              kindOf(target) === "video" ? videoDateTags : imageDateTags;
            const shifted = await metadataTool.shiftTags(
              target,
              tags,
              resolveVideoTimeShift(shift.value, target, localOffset)
            );
            if (isErr(shifted)) {
              failed++;
              logger.error({ error: shifted.error })`${target} 平移時間失敗`;
              continue;
            }
            logger.info({
              source: transferred.value.coordinateSource,
            })`${target} → ${transferred.value.coordinates}`;
          }
        } finally {
          await dispose(metadataTool);
        }

        if (failed > 0) process.exitCode = 1;
      }
    );
}

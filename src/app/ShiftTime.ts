import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { imageDateTags, videoDateTags } from "@/constants";
import { expandHome, kindOf } from "@/utils/helper";
import { parseTimeShift } from "@/utils/timeShift";

import { buildServices } from "./ServiceContext";

type ShiftTimeOptions = {
  hours?: string | number;
};

export function registerShiftTime(cli: CAC, baseLogger: Logger) {
  cli
    .command("shift-time <...files>", "平移影像或影片的時間標籤")
    .option("--hours <hours>", "平移小時數，負數請寫成 --hours=-8")
    .action(async (files: string[], options: ShiftTimeOptions) => {
      const logger = baseLogger.extend("shift-time", { emoji: "⏱️" });
      const hours = parseTimeShift(options.hours, "--hours");
      if (isErr(hours)) {
        logger.error(hours.error);
        process.exitCode = 1;
        return;
      }
      if (hours.value === 0) {
        logger.warn("--hours 為 0，不需處理");
        return;
      }

      const { metadataTool } = buildServices(logger);
      let failed = 0;

      try {
        for (const file of files.map(expandHome)) {
          const kind = kindOf(file);
          if (!kind) {
            logger.warn({ file })`不支援的檔案類型，略過 ${file}`;
            continue;
          }
          const tags = kind === "video" ? videoDateTags : imageDateTags;
          const result = await metadataTool.shiftTags(file, tags, hours.value);
          if (isErr(result)) {
            failed++;
            logger.error({ error: result.error })`${file} 平移失敗`;
            continue;
          }
          logger.info()`${file} 平移 ${hours.value} 小時`;
        }
      } finally {
        await dispose(metadataTool);
      }

      if (failed > 0) process.exitCode = 1;
    });
}

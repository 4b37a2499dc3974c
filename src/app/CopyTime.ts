import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { expandHome } from "@/utils/helper";

import { buildServices } from "./ServiceContext";

export function registerCopyTime(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "copy-time <original> <...targets>",
      "將原始影片的時間標籤與相機型號複製到轉檔後的檔案"
    )
    .action(async (original: string, targets: string[]) => {
      const logger = baseLogger.extend("copy-time", { emoji: "🕒" });
      const { metadataTool, bridge } = buildServices(logger);
      let failed = 0;

      try {
        for (const target of targets) {
          const result = await bridge.copyCreationTime(
            expandHome(original),
            expandHome(target)
          );
          if (isErr(result)) {
            failed++;
            logger.error({ error: result.error })`${target} 複製失敗`;
            continue;
          }
          logger.info({ tags: result.value.tags })`${target} 已更新`;
        }
      } finally {
        await dispose(metadataTool);
      }

      if (failed > 0) process.exitCode = 1;
    });
}

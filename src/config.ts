import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

export const getAppConfig = buildConfigFactoryEnv(
  t.Object({
    /** exiftool 單一任務逾時；函式庫要求一定要有，預設給足 30 分鐘 */
    MEDIA_FLOW_TASK_TIMEOUT_MS: t.Integer({ default: 1_800_000, minimum: 10 }),
    /** process 指令的預設輸出資料夾（相對於來源資料夾） */
    MEDIA_FLOW_OUTPUT_DIR: t.String({ default: "000hevc" }),
    MEDIA_FLOW_REPORT_DIR: t.String({ default: "dist/reports" }),
  })
);

export type AppConfig = ReturnType<typeof getAppConfig>;

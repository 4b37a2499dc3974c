import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { registerCopyGps } from "./app/CopyGps";
import { registerCopyTime } from "./app/CopyTime";
import { registerGeotag } from "./app/Geotag";
import { registerProcessConverted } from "./app/ProcessConverted";
import { registerShiftTime } from "./app/ShiftTime";

const logger = createDefaultLoggerFromEnv();
const cli = cac("media-flow");

registerCopyTime(cli, logger);
registerCopyGps(cli, logger);
registerShiftTime(cli, logger);
registerGeotag(cli, logger);
registerProcessConverted(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

try {
  if (cli.matchedCommand) {
    await cli.runMatchedCommand();
  } else {
    cli.outputHelp();
  }
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exitCode = 1;
} finally {
  await dispose(logger);
}

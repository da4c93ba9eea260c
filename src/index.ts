import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { registerCheck } from "./app/Check";
import { registerInspect } from "./app/Inspect";
import { registerProcess } from "./app/Process";

const logger = createDefaultLoggerFromEnv();
const cli = cac("naming-exif");

registerInspect(cli, logger);
registerCheck(cli, logger);
registerProcess(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  cli.outputHelp();
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exitCode = 1;
} finally {
  // 等 log 檔寫完再結束
  await dispose(logger);
}

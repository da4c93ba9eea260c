import type { CAC } from "cac";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import { FilenameInspectorDefault } from "@/services/FilenameInspector";

export function registerInspect(cli: CAC, baseLogger: Logger) {
  cli
    .command("inspect <filename>", "解析單一檔名，列出檢查結果與將寫入的欄位")
    .action((filename: string) => {
      const logger = baseLogger.extend("inspect");
      const result = new FilenameInspectorDefault().inspect(
        path.basename(filename)
      );

      switch (result.status) {
        case "UNPARSEABLE":
          logger.error({ emoji: "🚫" })`檔名不符合格式: ${result.fileName}`;
          process.exitCode = 1;
          return;
        case "INVALID":
          logger.warn({
            emoji: "⚠️",
            parsed: result.parsed,
            issues: result.issues.map((i) => i.message),
          })`檔名內容不合法: ${result.fileName}`;
          process.exitCode = 1;
          return;
        case "VALID":
          logger.info({
            emoji: "✅",
            parsed: result.parsed,
            tags: result.tags,
          })`檔名合法: ${result.fileName}`;
          return;
      }
    });
}

import type { CAC } from "cac";
import path from "node:path";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { processedDirName, supportedExtensions } from "@/constants";
import {
  type Inspection,
  FilenameInspectorDefault,
} from "@/services/FilenameInspector";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { expandHome } from "@/utils/helper";

type CheckOptions = {
  nonRecursive?: boolean;
};

export function registerCheck(cli: CAC, baseLogger: Logger) {
  cli
    .command("check <folder>", "檢查資料夾內的檔名，輸出不合法的清單")
    .option("--non-recursive", "只掃描單層，不遞迴", { default: false })
    .action(async (folder: string, options: CheckOptions) => {
      const logger = baseLogger.extend("check");
      const root = expandHome(folder);

      const scanner = new FileSystemScannerDefault();
      const scanRes = await scanner.scan(root, {
        recursive: !options.nonRecursive,
        allowExts: supportedExtensions,
        skipDirNames: [processedDirName],
      });
      if (isErr(scanRes)) {
        logger.error({ emoji: "❌", error: scanRes.error })`掃描來源目錄失敗`;
        process.exitCode = 1;
        return;
      }
      const files = scanRes.value;
      if (files.length === 0) {
        logger.warn("來源目錄沒有可檢查的檔案");
        return;
      }
      logger.info({ emoji: "🔎", count: files.length })`掃描完成`;

      const inspector = new FilenameInspectorDefault();
      const inspections = files.map((f) => ({
        file: path.relative(root, f),
        result: inspector.inspect(path.basename(f)),
      }));

      const report = buildCheckReport(inspections);
      const dumper = new DumpWriterDefault(logger, getAppConfig().REPORT_DIR);
      await dumper.dump("naming-check", report);

      if (report.summary.rejected > 0) {
        logger.warn({
          emoji: "⚠️",
          rejected: report.summary.rejected,
        })`有 ${report.summary.rejected} 個檔案不合法`;
        process.exitCode = 1;
      } else {
        logger.info({ emoji: "✅" })`所有檔名皆合法`;
      }
    });
}

export function buildCheckReport(
  inspections: Array<{ file: string; result: Inspection }>
) {
  const accepted: string[] = [];
  const rejected: Record<string, string[]> = {};

  for (const { file, result } of inspections) {
    switch (result.status) {
      case "VALID":
        accepted.push(file);
        break;
      case "INVALID":
        rejected[file] = result.issues.map((i) => i.message);
        break;
      case "UNPARSEABLE":
        rejected[file] = ["檔名不符合格式"];
        break;
    }
  }

  return {
    summary: {
      total: inspections.length,
      accepted: accepted.length,
      rejected: Object.keys(rejected).length,
    },
    accepted,
    rejected,
  };
}

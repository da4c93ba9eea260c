import type { CAC } from "cac";
import path from "node:path";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { processedDirName, supportedExtensions } from "@/constants";
import { NamingExifPlugin } from "@/plugin/NamingExifPlugin";
import { ExifServiceExifTool } from "@/services/ExifService";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { confirm, expandHome } from "@/utils/helper";

type ProcessOptions = {
  dryRun?: boolean;
  yes?: boolean;
  nonRecursive?: boolean;
};

export function registerProcess(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "process <folder>",
      "依檔名寫入日期與 identifier 到 EXIF/XMP，完成後搬到 processed/"
    )
    .option("--dry-run", "只列出將寫入的欄位，不修改檔案", { default: false })
    .option("--yes", "略過確認直接執行", { default: false })
    .option("--non-recursive", "只掃描單層，不遞迴", { default: false })
    .action(async (folder: string, options: ProcessOptions) => {
      const logger = baseLogger.extend("process");
      const root = expandHome(folder);
      const { REPORT_DIR, EXIFTOOL_MIN_VERSION } = getAppConfig();

      // 1) 掃描
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

      const exif = new ExifServiceExifTool();
      try {
        const plugin = new NamingExifPlugin({ logger, exif });

        // 2) 篩選可處理的檔案
        const candidates: string[] = [];
        for (const file of scanRes.value) {
          if (await plugin.canHandle(file)) candidates.push(file);
        }
        const skipped = scanRes.value.length - candidates.length;
        logger.info({
          emoji: "🔎",
          scanned: scanRes.value.length,
          candidates: candidates.length,
          skipped,
        })`掃描完成`;
        if (candidates.length === 0) {
          logger.info({ emoji: "✅" })`沒有需要處理的檔案`;
          return;
        }

        // 3) 確認
        const proceed =
          options.yes ||
          options.dryRun ||
          (await confirm(
            `將寫入 ${candidates.length} 個檔案的 metadata 並搬到 ${processedDirName}/，是否繼續？ [y/N] `
          ));
        if (!proceed) {
          logger.warn({ emoji: "⏹️" })`使用者取消`;
          return;
        }

        const config = {
          dryRun: options.dryRun ?? false,
          ...(EXIFTOOL_MIN_VERSION !== undefined
            ? { minExifToolVersion: EXIFTOOL_MIN_VERSION }
            : {}),
        };
        if (!(await plugin.initialize(config))) {
          process.exitCode = 1;
          return;
        }

        // 4) 逐檔處理，單檔失敗不影響其他檔案
        const failed: string[] = [];
        let succeeded = 0;
        for (const file of candidates) {
          if (await plugin.process(file, config)) {
            succeeded++;
          } else {
            failed.push(path.relative(root, file));
          }
        }

        const dumper = new DumpWriterDefault(logger, REPORT_DIR);
        await dumper.dump("naming-exif-process", {
          summary: { candidates: candidates.length, succeeded, failed: failed.length },
          dryRun: config.dryRun,
          failed,
        });

        if (failed.length > 0) {
          logger.warn({ emoji: "⚠️", succeeded, failed: failed.length })`部分檔案處理失敗`;
          process.exitCode = 1;
        } else {
          logger.info({ emoji: "✅", succeeded })`全部處理完成`;
        }
      } finally {
        await exif[Symbol.asyncDispose]();
      }
    });
}

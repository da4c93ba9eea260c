import { exiftool } from "exiftool-vendored";

import { type Result, err, ok } from "~shared/utils/Result";

import type { MetadataTags } from "@/services/MetadataFormatter";

import type { ExifService, VersionError, WriteError } from "./ExifService";

export class ExifServiceExifTool implements ExifService {
  async writeTags(
    filePath: string,
    tags: MetadataTags
  ): Promise<Result<void, WriteError>> {
    // 欄位名稱帶有 group 前綴（XMP-dc:、ExifIFD:），直接以參數形式交給 ExifTool
    const tagArgs = Object.entries(tags).map(
      ([name, value]) => `-${name}=${value}`
    );
    try {
      const result = await exiftool.write(
        filePath,
        {},
        {
          writeArgs: [...tagArgs, "-P", "-overwrite_original"],
        }
      );
      // 無法寫入的欄位只會變成 warning，檔案仍可能被標為已更新
      const warnings = result.warnings ?? [];
      if (warnings.length > 0 || result.updated === 0) {
        return err({
          type: "WRITE_FAILED",
          message: `寫入 metadata 不完整: ${filePath}: ${
            warnings.join("; ") || "沒有檔案被更新"
          }`,
        });
      }
      return ok();
    } catch (error) {
      return err({
        type: "WRITE_FAILED",
        message: `寫入 metadata 失敗: ${filePath}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      });
    }
  }

  async version(): Promise<Result<string, VersionError>> {
    try {
      return ok(await exiftool.version());
    } catch (error) {
      return err({
        type: "EXIFTOOL_UNAVAILABLE",
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async [Symbol.asyncDispose]() {
    await exiftool.end();
  }
}

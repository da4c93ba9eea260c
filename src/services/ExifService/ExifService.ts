import type { Result } from "~shared/utils/Result";

import type { MetadataTags } from "@/services/MetadataFormatter";

export type WriteError = { type: "WRITE_FAILED"; message: string };

export type VersionError = { type: "EXIFTOOL_UNAVAILABLE"; message: string };

export interface ExifService {
  /**
   * 一次寫入所有欄位，直接覆寫原檔並保留修改時間。
   */
  writeTags(filePath: string, tags: MetadataTags): Promise<Result<void, WriteError>>;

  /**
   * 取得 ExifTool 版本字串，例如 "12.76"。
   */
  version(): Promise<Result<string, VersionError>>;
}

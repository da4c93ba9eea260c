import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export type ScanOptions = {
  recursive?: boolean;
  allowExts?: readonly string[];
  /** 上層資料夾名稱在此清單中的檔案會被略過 */
  skipDirNames?: readonly string[];
};

export interface FileSystemScanner {
  /** 列出一般檔案，不含符號連結 */
  scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>>;
}

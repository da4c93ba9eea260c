import type { Result } from "~shared/utils/Result";

export type RelocateError =
  | { type: "DESTINATION_EXISTS"; message: string; destination: string }
  | { type: "MOVE_FAILED"; message: string };

export interface FileRelocator {
  /**
   * 將檔案搬到同層的 processed/ 資料夾，成功時回傳目標路徑。
   * 目標已存在時不覆蓋，原檔留在原處。
   */
  moveToProcessed(filePath: string): Promise<Result<string, RelocateError>>;
}

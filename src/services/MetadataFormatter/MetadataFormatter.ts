import type { ParsedFilename } from "@/services/FilenameParser";

/** 寫入檔案的欄位名稱 → 值 */
export type MetadataTags = Record<string, string>;

export interface MetadataFormatter {
  /** 只含日期，依已知精度退化為 YYYY-MM-DD、YYYY-MM、YYYY；年份為 0 時為 undefined */
  formatPartialDate(parsed: ParsedFilename): string | undefined;

  /** YYYY-MM-DDThh:mm:ss，僅限精確日期 */
  formatFullDateTime(parsed: ParsedFilename): string | undefined;

  /** YYYY:MM:DD hh:mm:ss，僅限精確日期 */
  formatNumericDateTime(parsed: ParsedFilename): string | undefined;

  newIdentifier(): string;

  /**
   * 產生要寫入的完整欄位。
   * 每次呼叫產生一個新的 identifier，寫入所有 identifier 欄位。
   */
  buildTags(parsed: ParsedFilename): MetadataTags;
}

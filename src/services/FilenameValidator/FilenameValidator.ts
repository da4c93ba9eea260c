import type { ParsedFilename } from "@/services/FilenameParser";

export type ValidationRule =
  | "MODIFIER"
  | "DATE_RANGE"
  | "TIME_RANGE"
  | "ZERO_CASCADE";

export interface ValidationIssue {
  rule: ValidationRule;
  /** 出錯的欄位，cascade 規則以 "day"、"time" 等描述受影響的部分 */
  field: "modifier" | "month" | "day" | "hour" | "minute" | "second" | "time";
  value: string | number;
  message: string;
}

export interface FilenameValidator {
  /**
   * 檢查所有規則並回傳全部問題，空陣列代表合法。
   * 順序固定：modifier → 日期範圍 → 時間範圍 → 零值連鎖。
   */
  validate(parsed: ParsedFilename): ValidationIssue[];
}

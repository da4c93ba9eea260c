export const supportedExtensions = [".tiff", ".tif", ".jpg", ".jpeg"] as const;

/** 處理完成的檔案會搬到同層的此資料夾 */
export const processedDirName = "processed";

/**
 * 日期可信度。
 * E 為精確日期，只有 E 會寫入含時間的欄位。
 */
export const validModifiers = ["A", "B", "C", "E", "F"] as const;

export const exactModifier = "E";

/** 每月天數上限，二月固定 29 */
export const daysInMonth = [
  31, 29, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31,
] as const;

/**
 * 從檔名解析出的結構化資料。
 * 數值欄位尚未檢查範圍，交給 FilenameValidator 處理。
 */
export type ParsedFilename = Readonly<{
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  /** 日期可信度，已轉為大寫 */
  modifier: string;
  group: string;
  subgroup: string;
  /** 流水號，保留前導零 */
  sequence: string;
  /** 副檔名，已轉為小寫，不含 "." */
  extension: string;
}>;

export interface FilenameParser {
  /**
   * 解析 `YYYY.MM.DD.HH.NN.SS.X.GGG.SSS.NNNNNN(.suffix)*.ext` 格式的檔名。
   * 不符合格式時回傳 undefined，不會回傳部分解析的結果。
   */
  parse(fileName: string): ParsedFilename | undefined;
}

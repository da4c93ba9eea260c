import type { FilenameParser, ParsedFilename } from "./FilenameParser";

const DIGITS_RE = /^\d+$/;
const LETTER_RE = /^[a-z]$/i;
const LETTERS_RE = /^[a-z]+$/i;

/** 年月日時分秒、modifier、group、subgroup、sequence */
const REQUIRED_FIELD_COUNT = 10;

function toInt(token: string) {
  if (!DIGITS_RE.test(token)) return undefined;
  const n = Number(token);
  return Number.isSafeInteger(n) ? n : undefined;
}

/**
 * 以 "." 切分後逐欄檢查：
 * - 前 10 欄為固定位置
 * - 最後一欄為副檔名
 * - 中間其餘欄位（.A、.RAW、.WEB 等）僅要求非空，內容忽略
 */
export class FilenameParserDefault implements FilenameParser {
  parse(fileName: string): ParsedFilename | undefined {
    const tokens = fileName.split(".");
    if (tokens.length < REQUIRED_FIELD_COUNT + 1) return undefined;
    if (tokens.some((token) => token === "")) return undefined;

    const [y, mo, d, h, mi, s, modifier, group, subgroup, sequence] = tokens;
    const extension = tokens[tokens.length - 1];

    const year = toInt(y);
    const month = toInt(mo);
    const day = toInt(d);
    const hour = toInt(h);
    const minute = toInt(mi);
    const second = toInt(s);
    if (
      year === undefined ||
      month === undefined ||
      day === undefined ||
      hour === undefined ||
      minute === undefined ||
      second === undefined
    ) {
      return undefined;
    }
    if (!LETTER_RE.test(modifier)) return undefined;
    if (!DIGITS_RE.test(sequence)) return undefined;
    if (!LETTERS_RE.test(extension)) return undefined;

    return Object.freeze({
      year,
      month,
      day,
      hour,
      minute,
      second,
      modifier: modifier.toUpperCase(),
      group,
      subgroup,
      sequence,
      extension: extension.toLowerCase(),
    });
  }
}

import { describe, expect, test } from "vitest";

import { FilenameParserDefault } from "@/services/FilenameParser";
import type { ParsedFilename } from "@/services/FilenameParser";
import { FilenameValidatorDefault } from "@/services/FilenameValidator";

const parser = new FilenameParserDefault();
const validator = new FilenameValidatorDefault();

function record(overrides: Partial<ParsedFilename>): ParsedFilename {
  return {
    year: 1950,
    month: 6,
    day: 15,
    hour: 12,
    minute: 30,
    second: 45,
    modifier: "E",
    group: "FAM",
    subgroup: "POR",
    sequence: "000001",
    extension: "jpg",
    ...overrides,
  };
}

function validateName(name: string) {
  const parsed = parser.parse(name);
  if (!parsed) throw new Error(`無法解析測試檔名: ${name}`);
  return validator.validate(parsed);
}

describe("FilenameValidatorDefault", () => {
  test.each([
    "1950.06.15.12.30.45.E.FAM.POR.000001.jpg",
    "1965.08.00.00.00.00.C.TRV.LND.000002.jpg",
    "1970.00.00.00.00.00.C.FAM.GRP.000004.jpg",
    "0000.00.00.00.00.00.F.UNK.UNK.000009.tif",
    "1999.12.31.23.59.59.A.X.Y.1.jpeg",
  ])("合法檔名 %s 沒有問題", (name) => {
    expect(validateName(name)).toEqual([]);
  });

  test("二月 30 日不合法（上限 29）", () => {
    const issues = validateName("1950.02.30.00.00.00.E.FAM.POR.000002.tiff");
    expect(issues).toEqual([
      {
        rule: "DATE_RANGE",
        field: "day",
        value: 30,
        message: "日期無效：30 不在 2 月範圍內（須為 00-29）",
      },
    ]);
  });

  test("月份為 00 但日期不為 00", () => {
    const issues = validateName("1950.00.15.00.00.00.C.FAM.POR.000004.tiff");
    expect(issues).toEqual([
      {
        rule: "ZERO_CASCADE",
        field: "day",
        value: 15,
        message: "月份為 00 但日期為 15（月份為 00 時日期也必須為 00）",
      },
    ]);
  });

  test.each([1950, 1951, 1900, 2000, 1])(
    "任何年份的 2 月 29 日都接受（%i 年）",
    (year) => {
      expect(validator.validate(record({ year, month: 2, day: 29 }))).toEqual(
        []
      );
    }
  );

  test("依月份檢查天數上限", () => {
    const issues = validator.validate(record({ month: 4, day: 31 }));
    expect(issues.map((i) => i.message)).toEqual([
      "日期無效：31 不在 4 月範圍內（須為 00-30）",
    ]);
  });

  test("月份超出範圍時日期只檢查 31 以內", () => {
    expect(
      validator.validate(record({ month: 13, day: 31 })).map((i) => i.field)
    ).toEqual(["month"]);
    expect(
      validator.validate(record({ month: 13, day: 32 })).map((i) => i.message)
    ).toEqual(["月份無效：13（須為 00-12）", "日期無效：32（須為 00-31）"]);
  });

  test("modifier 不在允許清單", () => {
    const issues = validator.validate(record({ modifier: "D" }));
    expect(issues).toEqual([
      {
        rule: "MODIFIER",
        field: "modifier",
        value: "D",
        message: "modifier 無效：'D'（須為 A, B, C, E, F 其中之一）",
      },
    ]);
  });

  test("時間超出範圍", () => {
    const issues = validator.validate(
      record({ hour: 24, minute: 60, second: 60 })
    );
    expect(issues.map((i) => i.message)).toEqual([
      "hour 無效：24（須為 00-23）",
      "minute 無效：60（須為 00-59）",
      "second 無效：60（須為 00-59）",
    ]);
  });

  test("收集所有問題，不提前結束，且順序固定", () => {
    const issues = validateName("1950.13.00.25.00.30.Z.F.G.1.jpg");
    expect(issues.map((i) => [i.rule, i.field])).toEqual([
      ["MODIFIER", "modifier"],
      ["DATE_RANGE", "month"],
      ["TIME_RANGE", "hour"],
      ["ZERO_CASCADE", "time"],
      ["ZERO_CASCADE", "second"],
    ]);
    expect(issues[3].message).toBe(
      "日期為 00 但時間為 25:00:30（日期為 00 時時間必須為 00:00:00）"
    );
  });

  describe("零值連鎖", () => {
    test("月份為 00 時，日期與時間不為 00 都會回報，與 modifier 是否合法無關", () => {
      const issues = validator.validate(
        record({ month: 0, day: 5, hour: 1, minute: 2, second: 3, modifier: "Q" })
      );
      expect(issues.map((i) => [i.rule, i.field])).toEqual([
        ["MODIFIER", "modifier"],
        ["ZERO_CASCADE", "day"],
        ["ZERO_CASCADE", "time"],
      ]);
      expect(issues[2].message).toBe(
        "月份為 00 但時間為 01:02:03（月份為 00 時時間必須為 00:00:00）"
      );
    });

    test("月份與日期皆為 00 且有時間時，兩條規則各回報一次", () => {
      const issues = validator.validate(
        record({ month: 0, day: 0, hour: 10, minute: 0, second: 0 })
      );
      expect(issues.map((i) => i.message)).toEqual([
        "月份為 00 但時間為 10:00:00（月份為 00 時時間必須為 00:00:00）",
        "日期為 00 但時間為 10:00:00（日期為 00 時時間必須為 00:00:00）",
      ]);
    });

    test("小時為 00 但分鐘不為 00", () => {
      const issues = validator.validate(
        record({ hour: 0, minute: 30, second: 0 })
      );
      expect(issues).toEqual([
        {
          rule: "ZERO_CASCADE",
          field: "time",
          value: "30:00",
          message:
            "小時為 00 但分秒為 30:00（小時為 00 時分秒也必須為 00）",
        },
      ]);
    });

    test("分鐘為 00 但秒數不為 00", () => {
      const issues = validator.validate(record({ minute: 0, second: 7 }));
      expect(issues.map((i) => i.message)).toEqual([
        "分鐘為 00 但秒數為 07（分鐘為 00 時秒數也必須為 00）",
      ]);
    });
  });
});

import { describe, expect, test } from "vitest";

import { buildCheckReport } from "@/app/Check";
import { FilenameInspectorDefault } from "@/services/FilenameInspector";

const inspector = new FilenameInspectorDefault();

describe("buildCheckReport", () => {
  test("依結果分組並統計", () => {
    const files = [
      "a/1950.06.15.12.30.45.E.FAM.POR.000001.jpg",
      "a/invalid_name.jpg",
      "b/1950.00.15.00.00.00.C.FAM.POR.000004.tiff",
    ];
    const report = buildCheckReport(
      files.map((file) => ({
        file,
        result: inspector.inspect(file.split("/")[1]),
      }))
    );
    expect(report).toEqual({
      summary: { total: 3, accepted: 1, rejected: 2 },
      accepted: ["a/1950.06.15.12.30.45.E.FAM.POR.000001.jpg"],
      rejected: {
        "a/invalid_name.jpg": ["檔名不符合格式"],
        "b/1950.00.15.00.00.00.C.FAM.POR.000004.tiff": [
          "月份為 00 但日期為 15（月份為 00 時日期也必須為 00）",
        ],
      },
    });
  });
});

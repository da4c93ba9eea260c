import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { beforeEach, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { FileRelocatorDefault } from "@/services/FileRelocator";
import { exists } from "@/utils/helper";

const tmpDir = "test/tmp/relocator";
const fileName = "1950.06.15.12.30.45.E.FAM.POR.000001.jpg";

describe("FileRelocatorDefault", () => {
  beforeEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });
    await writeFile(join(tmpDir, fileName), "new");
  });

  test("搬到同層 processed/，自動建立資料夾", async () => {
    const relocator = new FileRelocatorDefault();
    const result = await relocator.moveToProcessed(join(tmpDir, fileName));

    expectOk(result);
    expect(result.value).toBe(join(tmpDir, "processed", fileName));
    expect(await exists(join(tmpDir, fileName))).toBe(false);
    expect(await readFile(result.value, "utf8")).toBe("new");
  });

  test("目標已存在時不覆蓋，原檔保留", async () => {
    await mkdir(join(tmpDir, "processed"), { recursive: true });
    await writeFile(join(tmpDir, "processed", fileName), "old");

    const relocator = new FileRelocatorDefault();
    const result = await relocator.moveToProcessed(join(tmpDir, fileName));

    expectErr(result);
    expect(result.error).toEqual({
      type: "DESTINATION_EXISTS",
      message: `目標已存在: ${join(tmpDir, "processed", fileName)}`,
      destination: join(tmpDir, "processed", fileName),
    });
    expect(await readFile(join(tmpDir, fileName), "utf8")).toBe("new");
    expect(await readFile(join(tmpDir, "processed", fileName), "utf8")).toBe(
      "old"
    );
  });

  test("來源不存在時回傳 MOVE_FAILED", async () => {
    const relocator = new FileRelocatorDefault();
    const result = await relocator.moveToProcessed(join(tmpDir, "missing.jpg"));
    expectErr(result);
    expect(result.error.type).toBe("MOVE_FAILED");
  });
});

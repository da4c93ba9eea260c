import { exiftool } from "exiftool-vendored";
import { copyFile, mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { ExifServiceExifTool } from "@/services/ExifService";
import { FilenameParserDefault } from "@/services/FilenameParser";
import { MetadataFormatterDefault } from "@/services/MetadataFormatter";

const tmpDir = "test/tmp/exif";
const fixture = "test/fixture/blank.jpg";

// 啟動 perl 版 ExifTool 需要一點時間
const timeout = 30_000;

async function copyFixture(name: string) {
  const target = join(tmpDir, name);
  await copyFile(fixture, target);
  return target;
}

describe("ExifServiceExifTool", () => {
  const service = new ExifServiceExifTool();

  beforeAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });
  });

  afterAll(async () => {
    await service[Symbol.asyncDispose]();
  });

  test("能取得 ExifTool 版本", { timeout }, async () => {
    const result = await service.version();
    expectOk(result);
    expect(parseFloat(result.value)).toBeGreaterThanOrEqual(11);
  });

  test("寫入的五個欄位都能讀回", { timeout }, async () => {
    const fileName = "1950.06.15.12.30.45.E.FAM.POR.000001.jpg";
    const parsed = new FilenameParserDefault().parse(fileName);
    expect(parsed).toBeDefined();
    if (!parsed) return;
    const tags = new MetadataFormatterDefault(() => "test-id").buildTags(parsed);
    const filePath = await copyFixture(fileName);

    expectOk(await service.writeTags(filePath, tags));

    const raw = await exiftool.readRaw(filePath, ["-G1"]);
    expect(raw["XMP-dc:Identifier"]).toBe("test-id");
    expect(raw["XMP-xmpMM:DocumentID"]).toBe("test-id");
    expect([raw["XMP-dc:Date"]].flat()).toEqual(["1950:06:15"]);
    expect(raw["XMP-photoshop:DateCreated"]).toBe("1950:06:15 12:30:45");
    expect(raw["ExifIFD:DateTimeOriginal"]).toBe("1950:06:15 12:30:45");
  });

  test("不存在的欄位回傳 WRITE_FAILED", { timeout }, async () => {
    const filePath = await copyFixture("unknown-tag.jpg");
    const result = await service.writeTags(filePath, {
      "XMP-dc:NoSuchTag": "x",
    });
    expectErr(result);
    expect(result.error.type).toBe("WRITE_FAILED");
  });

  test("部分欄位無法寫入時也算失敗", { timeout }, async () => {
    const filePath = await copyFixture("partly-writable.jpg");
    const result = await service.writeTags(filePath, {
      "XMP-dc:Identifier": "test-id",
      "XMP:Iptc4xmpCore:DateCreated": "1950-06-15",
    });
    expectErr(result);
    expect(result.error.type).toBe("WRITE_FAILED");
    expect(result.error.message).toContain("Iptc4xmpCore:DateCreated");
  });
});

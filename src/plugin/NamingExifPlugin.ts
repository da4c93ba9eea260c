import { type Static, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { processedDirName, supportedExtensions } from "@/constants";
import type { ExifService } from "@/services/ExifService";
import {
  type FileRelocator,
  FileRelocatorDefault,
} from "@/services/FileRelocator";
import {
  type FilenameParser,
  FilenameParserDefault,
  type ParsedFilename,
} from "@/services/FilenameParser";
import {
  type FilenameValidator,
  FilenameValidatorDefault,
} from "@/services/FilenameValidator";
import {
  type MetadataFormatter,
  MetadataFormatterDefault,
  type MetadataTags,
} from "@/services/MetadataFormatter";
import { isSymlink } from "@/utils/helper";

import type { FileProcessorPlugin, PluginConfig } from "./FileProcessorPlugin";

const namingExifConfigSchema = t.Object({
  /** 只輸出將寫入的欄位，不寫檔也不搬移 */
  dryRun: t.Optional(t.Boolean()),
  minExifToolVersion: t.Optional(t.Number({ minimum: 0 })),
});

export type NamingExifConfig = Static<typeof namingExifConfigSchema>;

const defaultMinExifToolVersion = 11;

export type NamingExifPluginDeps = {
  logger: Logger;
  exif: ExifService;
  parser?: FilenameParser;
  validator?: FilenameValidator;
  formatter?: MetadataFormatter;
  relocator?: FileRelocator;
};

export class NamingExifPlugin implements FileProcessorPlugin {
  readonly name = "naming_exif";
  readonly version = "0.1.0";

  private readonly logger: Logger;
  private readonly exif: ExifService;
  private readonly parser: FilenameParser;
  private readonly validator: FilenameValidator;
  private readonly formatter: MetadataFormatter;
  private readonly relocator: FileRelocator;
  private exifToolChecked = false;

  constructor(deps: NamingExifPluginDeps) {
    this.logger = deps.logger.extend(this.name);
    this.exif = deps.exif;
    this.parser = deps.parser ?? new FilenameParserDefault();
    this.validator = deps.validator ?? new FilenameValidatorDefault();
    this.formatter = deps.formatter ?? new MetadataFormatterDefault();
    this.relocator = deps.relocator ?? new FileRelocatorDefault();
  }

  async canHandle(filePath: string): Promise<boolean> {
    // 不存在的路徑也視為無法處理
    if ((await isSymlink(filePath)) !== false) return false;
    if (path.basename(path.dirname(filePath)) === processedDirName) {
      return false;
    }

    const ext = path.extname(filePath).toLowerCase();
    if (!supportedExtensions.some((e) => e === ext)) return false;

    const parsed = this.parser.parse(path.basename(filePath));
    if (!parsed) return false;
    return this.validator.validate(parsed).length === 0;
  }

  async initialize(config: PluginConfig): Promise<boolean> {
    const parsedConfig = this.readConfig(config);
    if (!parsedConfig) return false;

    if (!this.exifToolChecked) {
      const minVersion =
        parsedConfig.minExifToolVersion ?? defaultMinExifToolVersion;
      const versionRes = await this.exif.version();
      if (isErr(versionRes)) {
        this.logger.error({
          error: versionRes.error,
        })`找不到 ExifTool，請安裝 https://exiftool.org/ 並確認在 PATH 中`;
        return false;
      }
      const version = versionRes.value;
      if (!(parseFloat(version) >= minVersion)) {
        this.logger.error({
          version,
          minVersion,
        })`ExifTool 版本 ${version} 過舊，最低需求為 ${minVersion}`;
        return false;
      }
      this.logger.info({ event: "exiftool" })`偵測到 ExifTool ${version}`;
      this.exifToolChecked = true;
    }

    this.logger.info({ event: "initialized", emoji: "🔌" })`初始化完成`;
    return true;
  }

  async process(filePath: string, config: PluginConfig): Promise<boolean> {
    const parsedConfig = this.readConfig(config);
    if (!parsedConfig) return false;

    const fileName = path.basename(filePath);
    const logger = this.logger.append({ file: fileName });
    logger.info({ event: "start" })`處理檔案 ${filePath}`;

    // canHandle 已檢查過，這裡重新解析以取得資料
    const parsed = this.parser.parse(fileName);
    if (!parsed) {
      logger.error({ event: "parse" })`檔名無法解析: ${fileName}`;
      return false;
    }

    const issues = this.validator.validate(parsed);
    if (issues.length > 0) {
      logger.error({
        event: "validate",
        issues: issues.map((i) => i.message),
      })`檔名內容不合法: ${fileName}`;
      return false;
    }

    const tags = this.formatter.buildTags(parsed);
    if (parsedConfig.dryRun) {
      logger.info({ event: "dry-run", emoji: "🧪", tags })`試執行，不寫入也不搬移`;
      return true;
    }

    return this.writeAndMove(filePath, parsed, tags, logger);
  }

  private async writeAndMove(
    filePath: string,
    parsed: ParsedFilename,
    tags: MetadataTags,
    logger: Logger
  ) {
    const writeRes = await this.exif.writeTags(filePath, tags);
    if (isErr(writeRes)) {
      logger.error({ event: "write", error: writeRes.error })`寫入 metadata 失敗`;
      return false;
    }
    for (const [key, value] of Object.entries(tags)) {
      logger.debug({ event: "write" })`${key}: ${value}`;
    }
    logger.info({
      event: "write",
      modifier: parsed.modifier,
      fields: Object.keys(tags).length,
    })`已寫入 metadata`;

    const moveRes = await this.relocator.moveToProcessed(filePath);
    if (isErr(moveRes)) {
      logger.error({
        event: "move",
        error: moveRes.error,
      })`搬移到 ${processedDirName}/ 失敗，原檔保留`;
      return false;
    }

    logger.info({ event: "done", to: moveRes.value })`處理完成`;
    return true;
  }

  private readConfig(config: PluginConfig): NamingExifConfig | undefined {
    if (Value.Check(namingExifConfigSchema, config)) return config;
    const problems = [...Value.Errors(namingExifConfigSchema, config)].map(
      (e) => `${e.path || "/"}: ${e.message}`
    );
    this.logger.error({ event: "config", problems })`plugin 設定不合法`;
    return undefined;
  }
}

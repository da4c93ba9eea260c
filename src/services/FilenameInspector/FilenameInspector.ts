import type { ParsedFilename } from "@/services/FilenameParser";
import type { ValidationIssue } from "@/services/FilenameValidator";
import type { MetadataTags } from "@/services/MetadataFormatter";

export type Inspection =
  | { status: "UNPARSEABLE"; fileName: string }
  | {
      status: "INVALID";
      fileName: string;
      parsed: ParsedFilename;
      issues: ValidationIssue[];
    }
  | {
      status: "VALID";
      fileName: string;
      parsed: ParsedFilename;
      tags: MetadataTags;
    };

export interface FilenameInspector {
  /** 解析、檢查並產生欄位，不碰檔案 */
  inspect(fileName: string): Inspection;
}

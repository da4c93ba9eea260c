import { readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type {
  FileSystemScanner,
  ScanError,
  ScanOptions,
} from "./FileSystemScanner";

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>> {
    const allowExts = options?.allowExts ?? [];
    const isRecursive = options?.recursive ?? true;
    const skipDirNames = new Set(options?.skipDirNames ?? []);
    const lowerExts = allowExts.map((e) => {
      if (e.startsWith(".")) return e.toLowerCase();
      return `.${e.toLowerCase()}`;
    });
    const allowExtsSet = new Set(lowerExts);
    try {
      const files = await readdir(rootPath, {
        recursive: isRecursive,
        withFileTypes: true,
      });
      const fullPaths = files
        .filter((d) => {
          // 符號連結的 isFile() 為 false
          if (!d.isFile()) return false;
          if (skipDirNames.has(path.basename(d.parentPath))) return false;
          if (allowExts.length === 0) return true;
          const ext = path.extname(d.name).toLowerCase();
          return allowExtsSet.has(ext);
        })
        .map((d) => path.join(d.parentPath, d.name))
        .sort((a, b) => a.localeCompare(b));
      return ok(fullPaths);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}

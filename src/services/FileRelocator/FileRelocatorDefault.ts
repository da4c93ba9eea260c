import { mkdir, rename } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { processedDirName } from "@/constants";
import { exists } from "@/utils/helper";

import type { FileRelocator, RelocateError } from "./FileRelocator";

export class FileRelocatorDefault implements FileRelocator {
  constructor(private readonly dirName: string = processedDirName) {}

  async moveToProcessed(
    filePath: string
  ): Promise<Result<string, RelocateError>> {
    const targetDir = path.join(path.dirname(filePath), this.dirName);
    const destination = path.join(targetDir, path.basename(filePath));
    try {
      await mkdir(targetDir, { recursive: true });
      // 防覆蓋
      if (await exists(destination)) {
        return err({
          type: "DESTINATION_EXISTS",
          message: `目標已存在: ${destination}`,
          destination,
        });
      }
      await rename(filePath, destination);
      return ok(destination);
    } catch (error) {
      return err({
        type: "MOVE_FAILED",
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

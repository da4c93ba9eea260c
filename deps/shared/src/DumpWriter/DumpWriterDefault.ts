import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  constructor(
    private readonly logger: Logger,
    private readonly dir = "dist/reports",
    private readonly now: () => Date = () => new Date()
  ) {}

  async dump(name: string, data: unknown): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const fileName = `${name}-${format(this.now(), "yyyyMMdd-HHmmss")}.json`;
    const filePath = path.join(this.dir, fileName);
    await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
    this.logger.info({ emoji: "📝", event: "dump" })`報告已寫入 ${filePath}`;
    return filePath;
  }
}

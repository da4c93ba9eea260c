import { type Options, type RotatingFileStream, createStream } from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

export type RfsTransportOptions = {
  filename: string;
  rfs?: Options;
};

/** 以 JSON Lines 寫入檔案，超過大小時輪替 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;
  private failure: Error | undefined;

  constructor(options: RfsTransportOptions) {
    this.stream = createStream(options.filename, {
      size: "10M",
      ...options.rfs,
    });
    // 寫檔失敗只回報一次，之後的紀錄直接略過，console 輸出不受影響
    this.stream.on("error", (error) => {
      if (this.failure) return;
      this.failure = error;
      console.error(`無法寫入 log 檔 ${options.filename}: ${error.message}`);
    });
  }

  write(record: LogRecord) {
    if (this.failure) return;
    const line = {
      time: record.time,
      level: record.level,
      path: record.path.join(":"),
      event: record.event,
      msg: record.msg,
      ...record.context,
      err: record.err,
    };
    this.stream.write(JSON.stringify(line) + "\n");
  }

  async [Symbol.asyncDispose]() {
    if (this.failure || this.stream.destroyed) return;
    await new Promise<void>((resolve) => this.stream.end(() => resolve()));
  }
}

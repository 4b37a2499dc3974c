import {
  type Options,
  type RotatingFileStream,
  createStream,
} from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

/**
 * 以 JSON Lines 寫入輪替檔案。預設每日輪替、單檔 10MB、保留 14 份。
 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: { filename: string; rfs?: Options }) {
    this.stream = createStream(options.filename, {
      interval: "1d",
      size: "10M",
      maxFiles: 14,
      ...options.rfs,
    });
  }

  write(record: LogRecord) {
    this.stream.write(`${JSON.stringify(record)}\n`);
  }

  async [Symbol.asyncDispose]() {
    await new Promise<void>((resolve, reject) => {
      this.stream.once("error", reject);
      this.stream.end(() => resolve());
    });
  }
}

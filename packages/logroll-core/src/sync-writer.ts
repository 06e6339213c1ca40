/**
 * logroll - 同步写入
 *
 * 每次 writeLine 持锁完成一次 FileSink.write，同一时刻只有一个调用在写文件。
 * 并发调用之间按获得锁的顺序写入，失败以 LogWriteError 返回给调用方。
 */

import type { LineSink, WriterStats } from "./types.js";
import { LogWriteError, describeError } from "./errors.js";
import { Mutex } from "./mutex.js";

export class SyncWriter {
  private readonly sink: LineSink;
  private readonly lock = new Mutex();
  private readonly sinkPath: string;
  private written = 0;
  private failed = 0;

  constructor(sink: LineSink, sinkPath: string) {
    this.sink = sink;
    this.sinkPath = sinkPath;
  }

  async writeLine(line: string): Promise<void> {
    await this.lock.runExclusive(async () => {
      try {
        await this.sink.write(line);
        this.written++;
      } catch (err) {
        this.failed++;
        if (err instanceof LogWriteError) throw err;
        throw new LogWriteError(`Failed to write log file ${this.sinkPath}: ${describeError(err)}`, this.sinkPath, "WRITE_FAILED", err);
      }
    });
  }

  /** 等待已排队的写入全部完成 */
  async flush(): Promise<void> {
    await this.lock.runExclusive(async () => undefined);
  }

  stats(): WriterStats {
    return {
      mode: "sync",
      enqueued: 0,
      written: this.written,
      dropped: 0,
      failed: this.failed,
      lost: 0,
      pending: this.lock.pending,
      capacity: 0,
    };
  }

  /** 等待进行中的写入完成后关闭 sink */
  async close(): Promise<void> {
    await this.lock.runExclusive(() => this.sink.close());
  }
}

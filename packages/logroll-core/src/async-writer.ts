/**
 * logroll - 异步（队列）写入
 *
 * 调用方只把渲染好的行放进有界队列就返回，唯一的消费者循环独占 sink 顺序写入。
 *
 * 溢出策略：丢弃并计数（drop-newest 或 drop-oldest），enqueueLine 从不等待。
 * 写入失败同样只计数并上报，调用方早已返回，无从得知。
 * drain 在超时内等待队列排空；超时后剩余行丢失，计入 lost 并上报。
 */

import type { DrainResult, LineSink, OverflowPolicy, WriterStats } from "./types.js";
import { BoundedQueue } from "./bounded-queue.js";
import { describeError } from "./errors.js";
import { reportInternal } from "./diagnostics.js";

export interface AsyncWriterOptions {
  capacity: number;
  overflow: OverflowPolicy;
  /** 仅用于诊断信息 */
  sinkPath: string;
}

export class AsyncWriter {
  private readonly sink: LineSink;
  private readonly queue: BoundedQueue<string>;
  private readonly sinkPath: string;
  private readonly consumer: Promise<void>;

  private wake: (() => void) | null = null;
  private idleWaiters: Array<() => void> = [];
  private writing = false;
  private accepting = true;
  private stopRequested = false;
  private overflowing = false;
  private drainPromise: Promise<DrainResult> | null = null;

  private enqueued = 0;
  private written = 0;
  private dropped = 0;
  private failed = 0;
  private lost = 0;

  constructor(sink: LineSink, opts: AsyncWriterOptions) {
    this.sink = sink;
    this.queue = new BoundedQueue<string>(opts.capacity, opts.overflow);
    this.sinkPath = opts.sinkPath;
    this.consumer = this.consume();
  }

  /**
   * 入队一行，立即返回。
   * 返回 false 表示有行被丢弃（本行，或 drop-oldest 下被挤掉的旧行），或写入器已关闭。
   */
  enqueueLine(line: string): boolean {
    if (!this.accepting) {
      this.dropped++;
      return false;
    }

    const result = this.queue.push(line);
    if (result === "dropped-newest") {
      this.noteOverflow();
      return false;
    }

    this.enqueued++;
    if (result === "dropped-oldest") {
      this.noteOverflow();
    } else {
      this.overflowing = false;
    }
    this.signal();
    return result === "accepted";
  }

  /** 等待当前队列全部写完（不关闭） */
  flush(): Promise<void> {
    if (this.queue.isEmpty && !this.writing) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** 停止接收新行，在 timeoutMs 内等待排空，然后关闭 sink。重复调用返回同一个结果。 */
  drain(timeoutMs: number): Promise<DrainResult> {
    if (!this.drainPromise) {
      this.drainPromise = this.runDrain(timeoutMs);
    }
    return this.drainPromise;
  }

  stats(): WriterStats {
    return {
      mode: "async",
      enqueued: this.enqueued,
      written: this.written,
      dropped: this.dropped,
      failed: this.failed,
      lost: this.lost,
      pending: this.queue.size,
      capacity: this.queue.capacity,
    };
  }

  // ── 内部方法 ──

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private noteOverflow(): void {
    this.dropped++;
    if (!this.overflowing) {
      this.overflowing = true;
      reportInternal(`Log queue for ${this.sinkPath} is full (capacity ${this.queue.capacity}), dropping lines`);
    }
  }

  private async consume(): Promise<void> {
    try {
      while (!this.stopRequested) {
        const line = this.queue.shift();
        if (line === undefined) {
          this.notifyIdle();
          if (!this.accepting) break;
          await new Promise<void>((resolve) => {
            this.wake = resolve;
          });
          continue;
        }

        this.writing = true;
        try {
          await this.sink.write(line);
          this.written++;
        } catch (err) {
          this.failed++;
          reportInternal(`Dropped log line for ${this.sinkPath}: ${describeError(err)}`);
        } finally {
          this.writing = false;
        }
      }
    } finally {
      this.notifyIdle();
      try {
        await this.sink.close();
      } catch (err) {
        reportInternal(`Failed to close ${this.sinkPath}: ${describeError(err)}`);
      }
    }
  }

  private async runDrain(timeoutMs: number): Promise<DrainResult> {
    this.accepting = false;
    this.signal();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), timeoutMs);
    });
    const outcome = await Promise.race([this.consumer.then(() => "done" as const), timedOut]);
    clearTimeout(timer);

    if (outcome === "done") {
      return { drained: true, lost: 0 };
    }

    this.stopRequested = true;
    const lost = this.queue.clear();
    this.lost += lost;
    reportInternal(`Drain of ${this.sinkPath} timed out after ${timeoutMs}ms, ${lost} buffered line(s) lost`);
    this.signal();
    return { drained: false, lost };
  }
}

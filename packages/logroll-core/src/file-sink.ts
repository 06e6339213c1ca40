/**
 * logroll - 文件写入与轮转
 *
 * 功能：
 * - 持有唯一的活动文件句柄和缓存的文件大小
 * - 写入前检查大小，需要时按 RotationPolicy 的计划轮转
 * - 轮转失败不影响后续写入：继续追加到当前（可能超限的）活动文件
 *
 * FileSink 本身不加锁，只能由 SyncWriter（持锁）或 AsyncWriter 的唯一消费者调用。
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { LineSink } from "./types.js";
import { LogWriteError, LoggerInitError, RotationError, describeError, errnoCode } from "./errors.js";
import { reportInternal } from "./diagnostics.js";
import { activePath, describeStep, parseBackupSuffix, planRotation, shouldRotate } from "./rotation-policy.js";
import type { RotationStep } from "./rotation-policy.js";

/** 打开的活动文件 */
export interface SinkFile {
  write(buffer: Uint8Array, offset: number, length: number): Promise<{ bytesWritten: number }>;
  sync(): Promise<void>;
  size(): Promise<number>;
  close(): Promise<void>;
}

/** FileSink 用到的文件系统操作，测试时可替换 */
export interface FileSystemOps {
  mkdir(dir: string): Promise<void>;
  openAppend(filePath: string): Promise<SinkFile>;
  rename(from: string, to: string): Promise<void>;
  unlink(filePath: string): Promise<void>;
  readdir(dir: string): Promise<string[]>;
}

export const nodeFileSystem: FileSystemOps = {
  async mkdir(dir) {
    await fs.mkdir(dir, { recursive: true });
  },
  async openAppend(filePath) {
    const fh = await fs.open(filePath, "a");
    return {
      write: (buffer, offset, length) => fh.write(buffer, offset, length),
      sync: () => fh.sync(),
      size: async () => (await fh.stat()).size,
      close: () => fh.close(),
    };
  },
  rename: (from, to) => fs.rename(from, to),
  unlink: (filePath) => fs.unlink(filePath),
  readdir: (dir) => fs.readdir(dir),
};

export interface FileSinkOptions {
  dir: string;
  /** 文件基名（不含 .log） */
  fileName: string;
  maxSize: number;
  maxFiles: number;
  instantFlush: boolean;
  fs?: FileSystemOps;
}

export class FileSink implements LineSink {
  private readonly dir: string;
  private readonly fileName: string;
  private readonly basePath: string;
  private readonly maxSize: number;
  private readonly maxFiles: number;
  private readonly instantFlush: boolean;
  private readonly fs: FileSystemOps;

  private file: SinkFile | null = null;
  private currentSize = 0;
  private closed = false;
  /** 处于连续轮转失败中时只上报第一次 */
  private rotationFailing = false;
  /** 轮转失败后写入的字节数，再写满 maxSize 才重试 */
  private bytesSinceRotationFailure = 0;

  private constructor(opts: FileSinkOptions) {
    this.dir = opts.dir;
    this.fileName = opts.fileName;
    this.basePath = path.join(opts.dir, opts.fileName);
    this.maxSize = opts.maxSize;
    this.maxFiles = opts.maxFiles;
    this.instantFlush = opts.instantFlush;
    this.fs = opts.fs ?? nodeFileSystem;
  }

  /** 创建目录（仅此一次）并打开活动文件 */
  static async open(opts: FileSinkOptions): Promise<FileSink> {
    const sink = new FileSink(opts);
    try {
      await sink.fs.mkdir(sink.dir);
    } catch (err) {
      throw new LoggerInitError(`Cannot create log directory ${sink.dir}: ${describeError(err)}`, "DIRECTORY_UNAVAILABLE", err);
    }
    try {
      await sink.openActive();
    } catch (err) {
      throw new LoggerInitError(`Cannot open log file ${sink.path}: ${describeError(err)}`, "FILE_OPEN_FAILED", err);
    }
    return sink;
  }

  /** 活动文件路径 */
  get path(): string {
    return activePath(this.basePath);
  }

  /** 缓存的活动文件大小（字节） */
  get size(): number {
    return this.currentSize;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async write(line: string): Promise<void> {
    if (this.closed) {
      throw new LogWriteError(`Log sink ${this.path} is closed`, this.path, "SINK_CLOSED");
    }
    const buf = Buffer.from(line + "\n", "utf-8");

    // 空文件不轮转：超大的单行直接写进去，下一次写入再轮转
    if (this.currentSize > 0 && shouldRotate(this.currentSize, buf.byteLength, this.maxSize) && this.rotationDue()) {
      await this.rotate();
    }

    let file: SinkFile;
    try {
      file = await this.ensureOpen();
    } catch (err) {
      throw new LogWriteError(`Cannot open log file ${this.path}: ${describeError(err)}`, this.path, "WRITE_FAILED", err);
    }

    try {
      let offset = 0;
      while (offset < buf.byteLength) {
        const { bytesWritten } = await file.write(buf, offset, buf.byteLength - offset);
        offset += bytesWritten;
        this.currentSize += bytesWritten;
        if (this.rotationFailing) this.bytesSinceRotationFailure += bytesWritten;
      }
      if (this.instantFlush) {
        await file.sync();
      }
    } catch (err) {
      throw new LogWriteError(`Failed to write log file ${this.path}: ${describeError(err)}`, this.path, "WRITE_FAILED", err);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.closeFile();
  }

  // ── 内部方法 ──

  private async openActive(): Promise<SinkFile> {
    const file = await this.fs.openAppend(this.path);
    try {
      this.currentSize = await file.size();
    } catch (err) {
      reportInternal(`Could not read size of ${this.path}, counting from zero: ${describeError(err)}`);
      this.currentSize = 0;
    }
    this.file = file;
    return file;
  }

  private rotationDue(): boolean {
    return !this.rotationFailing || this.bytesSinceRotationFailure >= this.maxSize;
  }

  private async ensureOpen(): Promise<SinkFile> {
    return this.file ?? this.openActive();
  }

  private async closeFile(): Promise<void> {
    const file = this.file;
    this.file = null;
    if (!file) return;
    try {
      await file.close();
    } catch (err) {
      reportInternal(`Failed to close ${this.path}: ${describeError(err)}`);
    }
  }

  private async listBackups(): Promise<number[]> {
    const entries = await this.fs.readdir(this.dir);
    const suffixes: number[] = [];
    for (const name of entries) {
      const n = parseBackupSuffix(name, this.fileName);
      if (n !== null) suffixes.push(n);
    }
    return suffixes;
  }

  private async runStep(step: RotationStep): Promise<void> {
    try {
      if (step.kind === "delete") {
        await this.fs.unlink(step.path);
      } else {
        await this.fs.rename(step.from, step.to);
      }
    } catch (err) {
      // 源文件已不存在：跳过这一步
      if (errnoCode(err) === "ENOENT") return;
      throw new RotationError(describeStep(step), err);
    }
  }

  /**
   * 关闭活动文件，按计划逐步删除/重命名。
   * 任何一步失败即停止剩余步骤（避免低序号文件覆盖尚未移走的高序号文件），
   * 然后由 ensureOpen 以追加模式重新打开活动文件。
   * 失败后不在每一行都重跑计划，而是再写满 maxSize 字节后重试。
   */
  private async rotate(): Promise<void> {
    await this.closeFile();
    try {
      const steps = planRotation(this.basePath, await this.listBackups(), this.maxFiles);
      for (const step of steps) {
        await this.runStep(step);
      }
      this.currentSize = 0;
      this.rotationFailing = false;
    } catch (err) {
      const failure = err instanceof RotationError ? err : new RotationError(`scan ${this.dir}`, err);
      if (!this.rotationFailing) {
        reportInternal(failure.message, { path: this.path, step: failure.step });
      }
      this.rotationFailing = true;
      this.bytesSinceRotationFailure = 0;
    }
  }
}

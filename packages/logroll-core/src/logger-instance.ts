/**
 * logroll - Logger 实例
 *
 * 绑定 Formatter + (SyncWriter | AsyncWriter) + 最低级别过滤。
 * 同一个实例对象可以在任意多处共享，所有引用共用同一个 FileSink / 队列。
 */

import path from "node:path";
import type { DrainResult, LogLevel, LoggerInstanceConfig, WriterStats } from "./types.js";
import { createRecord, formatRecord, levelEnabled } from "./formatter.js";
import { FileSink } from "./file-sink.js";
import type { FileSystemOps } from "./file-sink.js";
import { SyncWriter } from "./sync-writer.js";
import { AsyncWriter } from "./async-writer.js";
import { createConsoleTransport } from "./console-transport.js";
import type { ConsoleStreams, ConsoleTransport } from "./console-transport.js";
import { activePath } from "./rotation-policy.js";
import { describeError } from "./errors.js";
import { reportInternal } from "./diagnostics.js";

/** fatal 使用的退出码 */
export const FATAL_EXIT_CODE = 1;

export interface LoggerInstance {
  readonly name: string;
  /** 活动文件的绝对路径 */
  readonly filePath: string;
  readonly mode: "sync" | "async";
  readonly isShutdown: boolean;
  /** 同步模式：写入完成后 resolve，失败 reject LogWriteError；异步模式：入队后 resolve */
  log(level: LogLevel, message: string): Promise<void>;
  debug(message: string): Promise<void>;
  info(message: string): Promise<void>;
  warn(message: string): Promise<void>;
  error(message: string): Promise<void>;
  /** 无视级别写入 "FATAL: " 消息，落盘（或尽力排空队列）后终止进程 */
  fatal(message: string): Promise<void>;
  /** 等待已提交的行写完 */
  flush(): Promise<void>;
  stats(): WriterStats;
  /** 同步模式关闭文件；异步模式在超时内排空队列后关闭。幂等。 */
  shutdown(timeoutMs?: number): Promise<DrainResult>;
}

export interface LoggerInstanceOptions {
  fs?: FileSystemOps;
  /** fatal 的终止动作，默认 process.exit */
  terminate?: (code: number) => void;
  consoleStreams?: ConsoleStreams;
  /** perProcessDir 时使用的进程名，默认取入口脚本名 */
  processName?: string;
}

type Delivery = { mode: "sync"; writer: SyncWriter } | { mode: "async"; writer: AsyncWriter };

/** 当前进程名：入口脚本的文件名（去扩展名） */
export function defaultProcessName(): string {
  const entry = process.argv[1] ?? process.execPath;
  const base = path.basename(entry, path.extname(entry));
  return base || "unknown";
}

export function resolveLogDirectory(config: LoggerInstanceConfig, processName?: string): string {
  const dir = path.resolve(config.dir);
  return config.perProcessDir ? path.join(dir, processName ?? defaultProcessName()) : dir;
}

/** 实例的活动文件绝对路径，用于判断两个实例是否写同一个文件 */
export function resolveActivePath(config: LoggerInstanceConfig, processName?: string): string {
  return activePath(path.join(resolveLogDirectory(config, processName), config.fileName));
}

export async function openLoggerInstance(
  config: LoggerInstanceConfig,
  options: LoggerInstanceOptions = {},
): Promise<LoggerInstance> {
  const sink = await FileSink.open({
    dir: resolveLogDirectory(config, options.processName),
    fileName: config.fileName,
    maxSize: config.maxSize,
    maxFiles: config.maxFiles,
    instantFlush: config.instantFlush,
    fs: options.fs,
  });

  const delivery: Delivery = config.async
    ? {
        mode: "async",
        writer: new AsyncWriter(sink, {
          capacity: config.queueCapacity,
          overflow: config.overflow,
          sinkPath: sink.path,
        }),
      }
    : { mode: "sync", writer: new SyncWriter(sink, sink.path) };

  const echo: ConsoleTransport | null = config.console ? createConsoleTransport(options.consoleStreams) : null;
  const terminate = options.terminate ?? ((code: number) => process.exit(code));

  let shutdownPromise: Promise<DrainResult> | null = null;

  async function emit(level: LogLevel, message: string): Promise<void> {
    const line = formatRecord(createRecord(level, message));
    if (echo) {
      try {
        echo.write(level, line);
      } catch (err) {
        reportInternal(`Console echo failed: ${describeError(err)}`);
      }
    }
    if (delivery.mode === "sync") {
      await delivery.writer.writeLine(line);
    } else {
      delivery.writer.enqueueLine(line);
    }
  }

  async function log(level: LogLevel, message: string): Promise<void> {
    if (shutdownPromise) return;
    if (!levelEnabled(level, config.level)) return;
    await emit(level, message);
  }

  function shutdown(timeoutMs: number = config.drainTimeoutMs): Promise<DrainResult> {
    if (!shutdownPromise) {
      shutdownPromise =
        delivery.mode === "sync"
          ? delivery.writer.close().then(() => ({ drained: true, lost: 0 }))
          : delivery.writer.drain(timeoutMs);
    }
    return shutdownPromise;
  }

  const instance: LoggerInstance = {
    name: config.instanceName,
    filePath: sink.path,
    mode: delivery.mode,
    get isShutdown() {
      return shutdownPromise !== null;
    },
    log,
    debug: (message) => log("debug", message),
    info: (message) => log("info", message),
    warn: (message) => log("warn", message),
    error: (message) => log("error", message),
    async fatal(message) {
      if (!shutdownPromise) {
        try {
          await emit("error", `FATAL: ${message}`);
        } catch (err) {
          reportInternal(`Fatal message could not be written to ${sink.path}: ${describeError(err)}`);
        }
        if (delivery.mode === "async") {
          await shutdown();
        }
      } else {
        reportInternal(`Fatal message for ${sink.path} arrived after shutdown and was not written: ${message}`);
        await shutdownPromise;
      }
      terminate(FATAL_EXIT_CODE);
    },
    flush: () => delivery.writer.flush(),
    stats: () => delivery.writer.stats(),
    shutdown,
  };

  return instance;
}

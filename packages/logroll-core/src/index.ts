/**
 * logroll core
 *
 * 进程内的分级文件日志写入路径：
 * - 按大小轮转，保留有限个备份
 * - 同步（持锁写入）或异步（有界队列 + 单消费者）两种投递方式
 * - 多个实例互相独立，各自一套文件
 */

export {
  openLoggerInstance,
  resolveActivePath,
  resolveLogDirectory,
  defaultProcessName,
  FATAL_EXIT_CODE,
  type LoggerInstance,
  type LoggerInstanceOptions,
} from "./logger-instance.js";
export type {
  LogLevel,
  LogRecord,
  LineSink,
  OverflowPolicy,
  LoggerInstanceConfig,
  WriterStats,
  DrainResult,
} from "./types.js";
export { LOG_LEVEL_WEIGHT, LOG_LEVELS } from "./types.js";
export { formatRecord, formatTimestamp, createRecord, currentThreadTag, computeThreadTag, levelEnabled } from "./formatter.js";
export {
  shouldRotate,
  planRotation,
  activePath,
  backupPath,
  parseBackupSuffix,
  type RotationStep,
} from "./rotation-policy.js";
export { FileSink, nodeFileSystem, type FileSinkOptions, type FileSystemOps, type SinkFile } from "./file-sink.js";
export { SyncWriter } from "./sync-writer.js";
export { AsyncWriter, type AsyncWriterOptions } from "./async-writer.js";
export { BoundedQueue, type PushResult } from "./bounded-queue.js";
export { Mutex, type Release } from "./mutex.js";
export { createConsoleTransport, type ConsoleStreams, type ConsoleTransport } from "./console-transport.js";
export {
  LogrollError,
  LogConfigError,
  LoggerInitError,
  LogWriteError,
  RotationError,
  describeError,
  type LogrollErrorCode,
  type LoggerInitErrorCode,
} from "./errors.js";
export { reportInternal, setDiagnosticsReporter, type DiagnosticsReporter } from "./diagnostics.js";

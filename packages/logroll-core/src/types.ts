/**
 * logroll - 类型定义
 *
 * debug/info/warn/error 四个级别；fatal 不是独立级别，
 * 而是 error + "FATAL: " 前缀。
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** 日志级别权重，用于比较 */
export const LOG_LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** 单条日志记录，只在调用点存在，渲染成行后即丢弃 */
export interface LogRecord {
  timestamp: Date;
  /** 线程标识哈希（0-9999） */
  threadTag: number;
  level: LogLevel;
  message: string;
}

/** 异步模式队列满时的处理策略 */
export type OverflowPolicy = "drop-newest" | "drop-oldest";

/** 按行写入的目标（FileSink 实现它；测试可注入替身） */
export interface LineSink {
  write(line: string): Promise<void>;
  close(): Promise<void>;
}

/**
 * 已校验的实例配置
 *
 * 由 @logroll/config 负责默认值与校验，core 只读使用。
 */
export interface LoggerInstanceConfig {
  /** 日志目录 */
  dir: string;
  /** 文件基名（不含 .log） */
  fileName: string;
  /** 单文件大小阈值（字节），写入前检查，超过则轮转 */
  maxSize: number;
  /** 保留的备份数 */
  maxFiles: number;
  /** 是否使用队列异步写入 */
  async: boolean;
  /** 每次写入后是否 fsync */
  instantFlush: boolean;
  /** 实例名 */
  instanceName: string;
  /** 最低输出级别 */
  level: LogLevel;
  /** 异步队列容量 */
  queueCapacity: number;
  overflow: OverflowPolicy;
  /** 关闭/fatal 时等待队列排空的上限 */
  drainTimeoutMs: number;
  /** 是否放到 <dir>/<进程名>/ 子目录 */
  perProcessDir: boolean;
  /** 是否同时输出到控制台 */
  console: boolean;
}

/** 异步写入统计 */
export interface WriterStats {
  mode: "sync" | "async";
  /** 成功入队的行数 */
  enqueued: number;
  /** 已写入文件的行数 */
  written: number;
  /** 因队列满丢弃的行数 */
  dropped: number;
  /** 写入失败被丢弃的行数 */
  failed: number;
  /** 关闭超时时仍在队列中而丢失的行数 */
  lost: number;
  pending: number;
  capacity: number;
}

/** 队列排空结果 */
export interface DrainResult {
  drained: boolean;
  lost: number;
}

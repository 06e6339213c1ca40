/**
 * logroll 配置 - Zod 验证 Schema 与默认值
 */

import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { LOG_LEVELS, LogConfigError } from "@logroll/core";
import type { LogLevel, LoggerInstanceConfig, OverflowPolicy } from "@logroll/core";

// ============================================================================
// 默认值
// ============================================================================

export const DEFAULT_LOG_DIR = path.join(os.homedir(), ".logroll", "logs");
export const DEFAULT_MAX_FILE_SIZE = 20 * 1024 * 1024; // 20MB
export const DEFAULT_MAX_FILES = 5;
export const DEFAULT_FILE_NAME = "record";
export const DEFAULT_INSTANCE_NAME = "default";
export const DEFAULT_QUEUE_CAPACITY = 8192;
export const DEFAULT_DRAIN_TIMEOUT_MS = 5000;

const OVERFLOW_POLICIES = ["drop-newest", "drop-oldest"] as const satisfies readonly OverflowPolicy[];

// ============================================================================
// Schema
// ============================================================================

/**
 * 文件基名：不能含路径分隔符，结尾的 .log 会被去掉
 * （"app1.log" 与 "app1" 得到同一个活动文件 app1.log）
 */
const FileNameSchema = z
  .string()
  .trim()
  .min(1, "must not be empty")
  .refine((s) => !/[\\/]/.test(s), "must not contain path separators")
  .transform((s) => s.replace(/\.log$/i, ""))
  .refine((s) => s.length > 0, "must not be just an extension");

export const LogConfigSchema = z.object({
  dir: z.string().trim().min(1, "must not be empty").default(DEFAULT_LOG_DIR),
  fileName: FileNameSchema.default(DEFAULT_FILE_NAME),
  maxSize: z.number().int("must be an integer").positive("must be positive").default(DEFAULT_MAX_FILE_SIZE),
  maxFiles: z.number().int("must be an integer").positive("must be positive").default(DEFAULT_MAX_FILES),
  async: z.boolean().default(true),
  instantFlush: z.boolean().default(false),
  instanceName: z.string().trim().min(1, "must not be empty").default(DEFAULT_INSTANCE_NAME),
  level: z.enum(LOG_LEVELS).default("debug"),
  queueCapacity: z.number().int().positive("must be positive").default(DEFAULT_QUEUE_CAPACITY),
  overflow: z.enum(OVERFLOW_POLICIES).default("drop-newest"),
  drainTimeoutMs: z.number().int().nonnegative("must not be negative").default(DEFAULT_DRAIN_TIMEOUT_MS),
  perProcessDir: z.boolean().default(false),
  console: z.boolean().default(false),
});

/** 调用方可传的配置（全部可选） */
export type LogConfigInput = z.input<typeof LogConfigSchema>;

/** 校验并补全默认值后的配置 */
export type ResolvedLogConfig = z.output<typeof LogConfigSchema>;

/**
 * 校验配置，返回可直接交给 core 的结果
 *
 * @throws {LogConfigError} 列出所有不合法字段
 */
export function resolveLogConfig(input: LogConfigInput = {}): LoggerInstanceConfig {
  const parsed = LogConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new LogConfigError(
      parsed.error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message)),
    );
  }
  return parsed.data;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

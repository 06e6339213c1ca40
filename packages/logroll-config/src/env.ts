/**
 * logroll 配置 - 从环境变量读取
 *
 * LOGROLL_DIR / LOGROLL_FILE_NAME / LOGROLL_MAX_SIZE（"10MB" 之类）/ LOGROLL_MAX_FILES /
 * LOGROLL_ASYNC / LOGROLL_INSTANT_FLUSH / LOGROLL_LEVEL / LOGROLL_INSTANCE / LOGROLL_CONSOLE
 *
 * 未设置的变量不覆盖；显式传入的 overrides 优先级最高。
 */

import { LogConfigError } from "@logroll/core";
import type { LoggerInstanceConfig } from "@logroll/core";
import { isLogLevel, resolveLogConfig } from "./schema.js";
import type { LogConfigInput } from "./schema.js";

const SIZE_FACTORS: Record<string, number> = {
  b: 1,
  kb: 1024,
  mb: 1024 * 1024,
  gb: 1024 * 1024 * 1024,
};

/** 解析 "10MB"、"512kb"、"1.5GB" 等为字节数，无法识别返回 null */
export function parseSizeToBytes(s: string): number | null {
  const m = s.trim().match(/^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb)?$/i);
  if (!m) return null;
  const n = Number(m[1]);
  const unit = (m[2] ?? "b").toLowerCase();
  return Math.floor(n * (SIZE_FACTORS[unit] ?? 1));
}

function parseBool(name: string, raw: string, issues: string[]): boolean | undefined {
  const v = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  issues.push(`${name}: expected a boolean, got "${raw}"`);
  return undefined;
}

function parseCount(name: string, raw: string, issues: string[]): number | undefined {
  if (!/^\d+$/.test(raw.trim())) {
    issues.push(`${name}: expected a whole number, got "${raw}"`);
    return undefined;
  }
  return Number(raw.trim());
}

export type EnvSource = Record<string, string | undefined>;

/** 只读取环境变量，返回未校验的字段 */
export function readLogConfigEnv(env: EnvSource = process.env): LogConfigInput {
  const input: LogConfigInput = {};
  const issues: string[] = [];

  if (env.LOGROLL_DIR) input.dir = env.LOGROLL_DIR;
  if (env.LOGROLL_FILE_NAME) input.fileName = env.LOGROLL_FILE_NAME;
  if (env.LOGROLL_INSTANCE) input.instanceName = env.LOGROLL_INSTANCE;

  if (env.LOGROLL_MAX_SIZE) {
    const bytes = parseSizeToBytes(env.LOGROLL_MAX_SIZE);
    if (bytes === null) issues.push(`LOGROLL_MAX_SIZE: cannot parse size "${env.LOGROLL_MAX_SIZE}"`);
    else input.maxSize = bytes;
  }
  if (env.LOGROLL_MAX_FILES) input.maxFiles = parseCount("LOGROLL_MAX_FILES", env.LOGROLL_MAX_FILES, issues);
  if (env.LOGROLL_ASYNC) input.async = parseBool("LOGROLL_ASYNC", env.LOGROLL_ASYNC, issues);
  if (env.LOGROLL_INSTANT_FLUSH) input.instantFlush = parseBool("LOGROLL_INSTANT_FLUSH", env.LOGROLL_INSTANT_FLUSH, issues);
  if (env.LOGROLL_CONSOLE) input.console = parseBool("LOGROLL_CONSOLE", env.LOGROLL_CONSOLE, issues);

  if (env.LOGROLL_LEVEL) {
    const level = env.LOGROLL_LEVEL.trim().toLowerCase();
    if (isLogLevel(level)) input.level = level;
    else issues.push(`LOGROLL_LEVEL: unknown level "${env.LOGROLL_LEVEL}"`);
  }

  if (issues.length > 0) throw new LogConfigError(issues);
  return input;
}

/** 环境变量 + overrides，校验后返回完整配置 */
export function logConfigFromEnv(env: EnvSource = process.env, overrides: LogConfigInput = {}): LoggerInstanceConfig {
  return resolveLogConfig({ ...readLogConfigEnv(env), ...overrides });
}

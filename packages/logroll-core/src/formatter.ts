/**
 * logroll - 行格式化
 *
 * 输出格式（逐字节固定）：
 *   YYYY-MM-DD HH:MM:SS.mmm [LEVEL][TTTT] MESSAGE
 * 换行符由 FileSink 追加。
 */

import crypto from "node:crypto";
import { threadId } from "node:worker_threads";
import type { LogLevel, LogRecord } from "./types.js";
import { LOG_LEVEL_WEIGHT } from "./types.js";

/** 级别字段宽度（"ERROR" / "DEBUG" 的长度） */
export const LEVEL_WIDTH = 5;

/** 线程标识哈希取模，保证固定 4 位 */
const THREAD_TAG_MODULUS = 10_000;

let cachedThreadTag: number | null = null;

/** 当前线程的稳定标识：pid + worker threadId 的 sha1 取模 */
export function currentThreadTag(): number {
  if (cachedThreadTag === null) {
    cachedThreadTag = computeThreadTag(process.pid, threadId);
  }
  return cachedThreadTag;
}

export function computeThreadTag(pid: number, tid: number): number {
  const digest = crypto.createHash("sha1").update(`${pid}:${tid}`).digest();
  return digest.readUInt32BE(0) % THREAD_TAG_MODULUS;
}

/** 本地时区，毫秒精度 */
export function formatTimestamp(d: Date): string {
  const year = d.getFullYear();
  const month = String(d.getMonth() + 1).padStart(2, "0");
  const day = String(d.getDate()).padStart(2, "0");
  const hh = String(d.getHours()).padStart(2, "0");
  const mm = String(d.getMinutes()).padStart(2, "0");
  const ss = String(d.getSeconds()).padStart(2, "0");
  const ms = String(d.getMilliseconds()).padStart(3, "0");
  return `${year}-${month}-${day} ${hh}:${mm}:${ss}.${ms}`;
}

export function formatRecord(record: LogRecord): string {
  const level = record.level.toUpperCase().padEnd(LEVEL_WIDTH);
  const tag = String(record.threadTag).padStart(4, "0");
  return `${formatTimestamp(record.timestamp)} [${level}][${tag}] ${record.message}`;
}

export function createRecord(level: LogLevel, message: string, now: Date = new Date()): LogRecord {
  return {
    timestamp: now,
    threadTag: currentThreadTag(),
    level,
    message,
  };
}

/** level 是否达到最低输出级别 minimum */
export function levelEnabled(level: LogLevel, minimum: LogLevel): boolean {
  return LOG_LEVEL_WEIGHT[level] >= LOG_LEVEL_WEIGHT[minimum];
}

/**
 * logroll - 按实例名记录日志
 *
 * 未登记的实例名静默忽略；fatal 无论实例是否存在都会终止进程。
 */

import type { LogLevel } from "@logroll/core";
import { LoggerRegistry, defaultRegistry } from "./registry.js";

export interface CallSite {
  log(name: string, level: LogLevel, message: string): Promise<void>;
  debug(name: string, message: string): Promise<void>;
  info(name: string, message: string): Promise<void>;
  warn(name: string, message: string): Promise<void>;
  error(name: string, message: string): Promise<void>;
  fatal(name: string, message: string): Promise<void>;
}

export function createCallSite(registry: LoggerRegistry): CallSite {
  async function log(name: string, level: LogLevel, message: string): Promise<void> {
    const instance = registry.get(name);
    if (!instance) return;
    await instance.log(level, message);
  }

  return {
    log,
    debug: (name, message) => log(name, "debug", message),
    info: (name, message) => log(name, "info", message),
    warn: (name, message) => log(name, "warn", message),
    error: (name, message) => log(name, "error", message),
    async fatal(name, message) {
      const instance = registry.get(name);
      if (instance) {
        await instance.fatal(message);
      } else {
        registry.terminate(1);
      }
    },
  };
}

const defaultCallSite = createCallSite(defaultRegistry);

export const log = defaultCallSite.log;
export const debug = defaultCallSite.debug;
export const info = defaultCallSite.info;
export const warn = defaultCallSite.warn;
export const error = defaultCallSite.error;
export const fatal = defaultCallSite.fatal;

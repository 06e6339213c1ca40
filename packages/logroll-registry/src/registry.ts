/**
 * logroll - 实例注册表
 *
 * 按实例名保存 Logger 实例。重复的实例名、或两个实例写同一个活动文件，
 * 都会在 init 时被拒绝，避免同一路径出现两套互相独立的轮转历史。
 * 关闭后的实例会从表中移除，名字和路径可以重新使用。
 */

import { LoggerInitError, openLoggerInstance, resolveActivePath } from "@logroll/core";
import type { DrainResult, LoggerInstance, LoggerInstanceOptions } from "@logroll/core";
import { resolveLogConfig } from "@logroll/config";
import type { LogConfigInput } from "@logroll/config";

export class LoggerRegistry {
  private readonly instances = new Map<string, LoggerInstance>();
  /** 正在打开中的实例：name → 活动文件路径 */
  private readonly opening = new Map<string, string>();
  private readonly options: LoggerInstanceOptions;

  constructor(options: LoggerInstanceOptions = {}) {
    this.options = options;
  }

  /**
   * 校验配置、打开实例并登记，返回实例名
   *
   * @throws {LogConfigError} 配置不合法
   * @throws {LoggerInitError} 目录/文件不可用，或实例名、路径冲突
   */
  async init(input: LogConfigInput = {}): Promise<string> {
    const config = resolveLogConfig(input);
    const name = config.instanceName;
    const filePath = resolveActivePath(config, this.options.processName);

    if (this.instances.has(name) || this.opening.has(name)) {
      throw new LoggerInitError(`Logger instance "${name}" is already initialised`, "DUPLICATE_INSTANCE");
    }
    const owner = this.ownerOf(filePath);
    if (owner !== undefined) {
      throw new LoggerInitError(`Log file ${filePath} is already used by instance "${owner}"`, "PATH_IN_USE");
    }

    this.opening.set(name, filePath);
    try {
      const instance = await openLoggerInstance(config, this.options);
      this.instances.set(name, instance);
    } finally {
      this.opening.delete(name);
    }
    return name;
  }

  get(name: string): LoggerInstance | undefined {
    return this.instances.get(name);
  }

  has(name: string): boolean {
    return this.instances.has(name);
  }

  list(): string[] {
    return [...this.instances.keys()];
  }

  /** 关闭并移除一个实例；不存在时返回 false */
  async shutdown(name: string, timeoutMs?: number): Promise<boolean> {
    const instance = this.instances.get(name);
    if (!instance) return false;
    this.instances.delete(name);
    await instance.shutdown(timeoutMs);
    return true;
  }

  /** 关闭全部实例（异步实例并行排空），返回每个实例的排空结果 */
  async shutdownAll(timeoutMs?: number): Promise<Record<string, DrainResult>> {
    const entries = [...this.instances.entries()];
    this.instances.clear();
    const results = await Promise.all(entries.map(([, instance]) => instance.shutdown(timeoutMs)));
    const out: Record<string, DrainResult> = {};
    entries.forEach(([name], i) => {
      out[name] = results[i];
    });
    return out;
  }

  /** 未知实例上的 fatal 直接终止 */
  terminate(code: number): void {
    if (this.options.terminate) {
      this.options.terminate(code);
    } else {
      process.exit(code);
    }
  }

  private ownerOf(filePath: string): string | undefined {
    for (const [name, instance] of this.instances) {
      if (instance.filePath === filePath) return name;
    }
    for (const [name, openingPath] of this.opening) {
      if (openingPath === filePath) return name;
    }
    return undefined;
  }
}

/** 进程级默认注册表 */
export const defaultRegistry = new LoggerRegistry();

export function initLogger(input: LogConfigInput = {}): Promise<string> {
  return defaultRegistry.init(input);
}

export function getLogger(name: string): LoggerInstance | undefined {
  return defaultRegistry.get(name);
}

export function hasLogger(name: string): boolean {
  return defaultRegistry.has(name);
}

export function listLoggers(): string[] {
  return defaultRegistry.list();
}

export function shutdownLogger(name: string, timeoutMs?: number): Promise<boolean> {
  return defaultRegistry.shutdown(name, timeoutMs);
}

export function shutdownAll(timeoutMs?: number): Promise<Record<string, DrainResult>> {
  return defaultRegistry.shutdownAll(timeoutMs);
}

/**
 * logroll 配置 - 链式构建器
 *
 * 只收集字段，build() 时统一交给 Schema 校验并补默认值。
 */

import type { LogLevel, LoggerInstanceConfig, OverflowPolicy } from "@logroll/core";
import { resolveLogConfig } from "./schema.js";
import type { LogConfigInput } from "./schema.js";

export class LogConfigBuilder {
  private readonly input: LogConfigInput;

  constructor(input: LogConfigInput = {}) {
    this.input = { ...input };
  }

  withDir(dir: string): this {
    this.input.dir = dir;
    return this;
  }

  withFileName(fileName: string): this {
    this.input.fileName = fileName;
    return this;
  }

  /** 单文件大小阈值（字节） */
  withMaxSize(bytes: number): this {
    this.input.maxSize = bytes;
    return this;
  }

  withMaxFiles(count: number): this {
    this.input.maxFiles = count;
    return this;
  }

  withAsync(isAsync: boolean): this {
    this.input.async = isAsync;
    return this;
  }

  withInstantFlush(instantFlush: boolean): this {
    this.input.instantFlush = instantFlush;
    return this;
  }

  withInstanceName(name: string): this {
    this.input.instanceName = name;
    return this;
  }

  withLevel(level: LogLevel): this {
    this.input.level = level;
    return this;
  }

  withQueueCapacity(capacity: number): this {
    this.input.queueCapacity = capacity;
    return this;
  }

  withOverflow(policy: OverflowPolicy): this {
    this.input.overflow = policy;
    return this;
  }

  withDrainTimeout(ms: number): this {
    this.input.drainTimeoutMs = ms;
    return this;
  }

  withPerProcessDir(enabled: boolean): this {
    this.input.perProcessDir = enabled;
    return this;
  }

  withConsole(enabled: boolean): this {
    this.input.console = enabled;
    return this;
  }

  /** 当前收集到的原始字段（未校验） */
  toInput(): LogConfigInput {
    return { ...this.input };
  }

  /** @throws {LogConfigError} */
  build(): LoggerInstanceConfig {
    return resolveLogConfig(this.input);
  }
}

export function logConfig(input: LogConfigInput = {}): LogConfigBuilder {
  return new LogConfigBuilder(input);
}

/**
 * logroll - 进程退出时排空日志
 *
 * beforeExit：关闭全部实例（异步实例排空队列）。
 * 信号（默认 SIGINT / SIGTERM）：排空后以 128 + 信号编号退出。
 */

import os from "node:os";
import type { EventEmitter } from "node:events";
import { describeError, reportInternal } from "@logroll/core";
import { LoggerRegistry, defaultRegistry } from "./registry.js";

export interface ShutdownHookOptions {
  registry?: LoggerRegistry;
  signals?: NodeJS.Signals[];
  /** 每个实例排空的超时，默认用实例自己的 drainTimeoutMs */
  timeoutMs?: number;
  /** 监听对象，默认 process */
  target?: EventEmitter;
  exit?: (code: number) => void;
}

/** 安装监听，返回卸载函数 */
export function installShutdownHooks(options: ShutdownHookOptions = {}): () => void {
  const registry = options.registry ?? defaultRegistry;
  const target: EventEmitter = options.target ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const signals = options.signals ?? ["SIGINT", "SIGTERM"];

  let draining: Promise<void> | null = null;
  const drainAll = (): Promise<void> => {
    if (!draining) {
      draining = registry.shutdownAll(options.timeoutMs).then(
        () => undefined,
        (err) => reportInternal(`Shutdown drain failed: ${describeError(err)}`),
      );
    }
    return draining;
  };

  const onBeforeExit = () => {
    void drainAll();
  };

  const signalHandlers = signals.map((signal) => {
    const handler = () => {
      void drainAll().then(() => exit(128 + os.constants.signals[signal]));
    };
    target.once(signal, handler);
    return { signal, handler };
  });
  target.once("beforeExit", onBeforeExit);

  return () => {
    target.removeListener("beforeExit", onBeforeExit);
    for (const { signal, handler } of signalHandlers) {
      target.removeListener(signal, handler);
    }
  };
}

/**
 * logroll 注册表模块
 *
 * 实例注册、按名字记录日志、进程退出时排空。
 */

export {
  LoggerRegistry,
  defaultRegistry,
  initLogger,
  getLogger,
  hasLogger,
  listLoggers,
  shutdownLogger,
  shutdownAll,
} from "./registry.js";
export { createCallSite, log, debug, info, warn, error, fatal, type CallSite } from "./call-site.js";
export { installShutdownHooks, type ShutdownHookOptions } from "./shutdown-hooks.js";

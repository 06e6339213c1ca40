/**
 * logroll 配置模块
 *
 * Schema 校验 + 默认值、链式构建器、环境变量读取。
 */

export {
  LogConfigSchema,
  resolveLogConfig,
  isLogLevel,
  DEFAULT_LOG_DIR,
  DEFAULT_MAX_FILE_SIZE,
  DEFAULT_MAX_FILES,
  DEFAULT_FILE_NAME,
  DEFAULT_INSTANCE_NAME,
  DEFAULT_QUEUE_CAPACITY,
  DEFAULT_DRAIN_TIMEOUT_MS,
  type LogConfigInput,
  type ResolvedLogConfig,
} from "./schema.js";
export { LogConfigBuilder, logConfig } from "./builder.js";
export { parseSizeToBytes, readLogConfigEnv, logConfigFromEnv, type EnvSource } from "./env.js";

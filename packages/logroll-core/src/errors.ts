/**
 * logroll - 错误分类
 *
 * - 配置错误：init 时拒绝，不会进入写入路径
 * - 初始化错误：目录/文件不可用、实例名或路径冲突
 * - 写入错误：同步模式返回给调用方，异步模式计数后丢弃
 * - 轮转错误：只上报，继续写当前文件
 */

export type LogrollErrorCode =
  | "INVALID_CONFIG"
  | "DIRECTORY_UNAVAILABLE"
  | "FILE_OPEN_FAILED"
  | "DUPLICATE_INSTANCE"
  | "PATH_IN_USE"
  | "WRITE_FAILED"
  | "SINK_CLOSED"
  | "ROTATION_FAILED";

export class LogrollError extends Error {
  readonly code: LogrollErrorCode;
  override readonly cause?: unknown;

  constructor(message: string, code: LogrollErrorCode, cause?: unknown) {
    super(message);
    this.name = "LogrollError";
    this.code = code;
    this.cause = cause;
  }
}

export class LogConfigError extends LogrollError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid log config: ${issues.join("; ")}`, "INVALID_CONFIG");
    this.name = "LogConfigError";
    this.issues = issues;
  }
}

export type LoggerInitErrorCode = Extract<
  LogrollErrorCode,
  "DIRECTORY_UNAVAILABLE" | "FILE_OPEN_FAILED" | "DUPLICATE_INSTANCE" | "PATH_IN_USE"
>;

export class LoggerInitError extends LogrollError {
  constructor(message: string, code: LoggerInitErrorCode, cause?: unknown) {
    super(message, code, cause);
    this.name = "LoggerInitError";
  }
}

export class LogWriteError extends LogrollError {
  readonly path: string;

  constructor(message: string, path: string, code: "WRITE_FAILED" | "SINK_CLOSED" = "WRITE_FAILED", cause?: unknown) {
    super(message, code, cause);
    this.name = "LogWriteError";
    this.path = path;
  }
}

export class RotationError extends LogrollError {
  /** 失败的那一步（如 "rename a.1.log -> a.2.log"） */
  readonly step: string;

  constructor(step: string, cause?: unknown) {
    super(`Rotation failed at ${step}: ${describeError(cause)}`, "ROTATION_FAILED", cause);
    this.name = "RotationError";
    this.step = step;
  }
}

/** 把任意抛出值转成一行可读文本 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const code = "code" in err ? err.code : undefined;
    return typeof code === "string" && !err.message.includes(code) ? `${code}: ${err.message}` : err.message;
  }
  return String(err);
}

/** 读取 Node 系统错误码（ENOENT、EACCES 等） */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  const code = err.code;
  return typeof code === "string" ? code : undefined;
}

/**
 * logroll - 控制台回显
 *
 * 开启 console 配置时，每条写入文件的行也彩色输出到终端。
 * error 走 stderr，其余走 stdout。
 */

import type { LogLevel } from "./types.js";

/** ANSI 颜色码 */
const COLORS = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  gray: "\x1b[90m",
} as const;

const LEVEL_COLOR: Record<LogLevel, string> = {
  error: COLORS.red,
  warn: COLORS.yellow,
  info: COLORS.blue,
  debug: COLORS.gray,
};

export function colorize(level: LogLevel, text: string): string {
  return `${LEVEL_COLOR[level]}${text}${COLORS.reset}`;
}

export interface ConsoleStreams {
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
}

export interface ConsoleTransport {
  write(level: LogLevel, line: string): void;
}

export function createConsoleTransport(streams: ConsoleStreams = process): ConsoleTransport {
  return {
    write(level, line) {
      const colored = colorize(level, line) + "\n";
      if (level === "error") {
        streams.stderr.write(colored);
      } else {
        streams.stdout.write(colored);
      }
    },
  };
}

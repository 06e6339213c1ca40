/**
 * logroll - 内部诊断输出
 *
 * 轮转失败、异步写入失败、队列溢出等无法返回给调用方的情况，
 * 统一从这里上报。默认写 stderr，宿主可注入自己的 reporter。
 */

export type DiagnosticsReporter = (message: string, data?: unknown) => void;

let reporter: DiagnosticsReporter | null = null;

export function setDiagnosticsReporter(next: DiagnosticsReporter | null): void {
  reporter = next;
}

export function reportInternal(message: string, data?: unknown): void {
  if (reporter) {
    reporter(message, data);
    return;
  }
  let line = `[logroll] ${message}`;
  if (data !== undefined) {
    try {
      line += " " + (typeof data === "string" ? data : JSON.stringify(data));
    } catch {
      line += " [object]";
    }
  }
  process.stderr.write(line + "\n");
}

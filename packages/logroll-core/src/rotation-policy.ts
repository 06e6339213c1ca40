/**
 * logroll - 轮转策略（纯函数）
 *
 * 活动文件：{base}.log
 * 备份文件：{base}.{N}.log，N=1 永远是最近一次轮转出来的文件
 *
 * 轮转计划必须从最大后缀往下处理，否则低序号文件会先覆盖高序号文件。
 */

export type RotationStep =
  | { kind: "delete"; path: string }
  | { kind: "rename"; from: string; to: string };

/** 写入前检查：当前大小加上这一行是否超过阈值。单行超过阈值时仍整行写入。 */
export function shouldRotate(currentSize: number, incomingSize: number, maxSize: number): boolean {
  return currentSize + incomingSize > maxSize;
}

export function activePath(basePath: string): string {
  return `${basePath}.log`;
}

export function backupPath(basePath: string, n: number): string {
  return `${basePath}.${n}.log`;
}

/**
 * 从目录项中识别备份文件后缀
 *
 * parseBackupSuffix("t.3.log", "t") === 3；不匹配返回 null。
 */
export function parseBackupSuffix(fileName: string, baseName: string): number | null {
  const prefix = `${baseName}.`;
  if (!fileName.startsWith(prefix) || !fileName.endsWith(".log")) return null;
  const middle = fileName.slice(prefix.length, fileName.length - ".log".length);
  if (!/^[1-9]\d*$/.test(middle)) return null;
  return Number(middle);
}

/**
 * 计算下一次轮转的删除/重命名步骤
 *
 * 只平移从 1 开始连续的那一段备份，段顶达到 maxFiles 时删除段顶。
 * 例：maxFiles=3，已有 1、2、3 →
 *   delete 3, rename 2→3, rename 1→2, rename active→1
 * 缺口之后的备份原地保留，轮转会逐步填上缺口；
 * 超出 maxFiles 的旧备份（配置变小后遗留）一并删除。
 */
export function planRotation(basePath: string, existingBackups: readonly number[], maxFiles: number): RotationStep[] {
  const steps: RotationStep[] = [];
  const present = new Set(existingBackups.filter((n) => n >= 1));

  let run = 0;
  while (present.has(run + 1)) run++;

  const stale = [...present].filter((n) => n > run && n > maxFiles).sort((a, b) => b - a);
  for (const n of stale) {
    steps.push({ kind: "delete", path: backupPath(basePath, n) });
  }

  for (let n = run; n >= 1; n--) {
    if (n + 1 > maxFiles) {
      steps.push({ kind: "delete", path: backupPath(basePath, n) });
    } else {
      steps.push({ kind: "rename", from: backupPath(basePath, n), to: backupPath(basePath, n + 1) });
    }
  }

  steps.push({ kind: "rename", from: activePath(basePath), to: backupPath(basePath, 1) });
  return steps;
}

export function describeStep(step: RotationStep): string {
  return step.kind === "delete" ? `delete ${step.path}` : `rename ${step.from} -> ${step.to}`;
}

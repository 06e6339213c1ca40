/**
 * 基于 Promise 链的互斥锁
 *
 * 按 acquire 顺序（FIFO）依次获得锁；release 只能调用一次。
 */

export type Release = () => void;

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private held = false;
  private waiting = 0;

  get locked(): boolean {
    return this.held;
  }

  /** 排队中的等待者数量（不含当前持有者） */
  get pending(): number {
    return this.waiting;
  }

  async acquire(): Promise<Release> {
    let unlock: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);

    this.waiting++;
    await previous;
    this.waiting--;
    this.held = true;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held = false;
      unlock();
    };
  }

  /** 持锁执行 fn，任何退出路径都会释放 */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

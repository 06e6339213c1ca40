/**
 * 固定容量的 FIFO 环形缓冲区
 *
 * 满时按策略丢弃最新（拒绝本次 push）或最旧（挤掉队头），容量永不增长。
 */

import type { OverflowPolicy } from "./types.js";

export type PushResult = "accepted" | "dropped-newest" | "dropped-oldest";

export class BoundedQueue<T> {
  private readonly items: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(
    readonly capacity: number,
    private readonly overflow: OverflowPolicy = "drop-newest",
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.items = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  get isEmpty(): boolean {
    return this.count === 0;
  }

  push(item: T): PushResult {
    if (this.count === this.capacity) {
      if (this.overflow === "drop-newest") return "dropped-newest";
      // 挤掉队头，新元素放到原队头的位置之后
      this.items[this.head] = undefined;
      this.head = (this.head + 1) % this.capacity;
      this.count--;
      this.items[(this.head + this.count) % this.capacity] = item;
      this.count++;
      return "dropped-oldest";
    }
    this.items[(this.head + this.count) % this.capacity] = item;
    this.count++;
    return "accepted";
  }

  shift(): T | undefined {
    if (this.count === 0) return undefined;
    const item = this.items[this.head];
    this.items[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return item;
  }

  /** 清空并返回被清掉的元素数 */
  clear(): number {
    const removed = this.count;
    this.items.fill(undefined);
    this.head = 0;
    this.count = 0;
    return removed;
  }

  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.items[(this.head + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }
}

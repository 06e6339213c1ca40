import { describe, it, expect } from "vitest";
import { BoundedQueue } from "./bounded-queue.js";

describe("BoundedQueue", () => {
    it("should keep FIFO order across wrap-around", () => {
        const q = new BoundedQueue<string>(3);
        q.push("a");
        q.push("b");
        expect(q.shift()).toBe("a");
        q.push("c");
        q.push("d");
        expect(q.toArray()).toEqual(["b", "c", "d"]);
        expect(q.shift()).toBe("b");
        expect(q.shift()).toBe("c");
        expect(q.shift()).toBe("d");
        expect(q.shift()).toBeUndefined();
    });

    it("should reject new items when full under drop-newest", () => {
        const q = new BoundedQueue<string>(2, "drop-newest");
        expect(q.push("a")).toBe("accepted");
        expect(q.push("b")).toBe("accepted");
        expect(q.push("c")).toBe("dropped-newest");
        expect(q.size).toBe(2);
        expect(q.toArray()).toEqual(["a", "b"]);
    });

    it("should evict the oldest item when full under drop-oldest", () => {
        const q = new BoundedQueue<string>(2, "drop-oldest");
        q.push("a");
        q.push("b");
        expect(q.push("c")).toBe("dropped-oldest");
        expect(q.push("d")).toBe("dropped-oldest");
        expect(q.size).toBe(2);
        expect(q.toArray()).toEqual(["c", "d"]);
    });

    it("should report how many items clear removed", () => {
        const q = new BoundedQueue<number>(4);
        q.push(1);
        q.push(2);
        expect(q.clear()).toBe(2);
        expect(q.isEmpty).toBe(true);
    });

    it("should refuse a non-positive capacity", () => {
        expect(() => new BoundedQueue<string>(0)).toThrow(RangeError);
    });
});

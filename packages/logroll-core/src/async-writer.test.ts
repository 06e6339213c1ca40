import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { AsyncWriter } from "./async-writer.js";
import { setDiagnosticsReporter } from "./diagnostics.js";
import type { LineSink } from "./types.js";

/** 写入会卡在 gate 上，直到 open() 被调用 */
function createGate() {
    let release: () => void = () => undefined;
    const promise = new Promise<void>((resolve) => {
        release = resolve;
    });
    return { promise, open: () => release() };
}

class RecordingSink implements LineSink {
    readonly lines: string[] = [];
    closed = false;

    constructor(
        private readonly gate: Promise<void> = Promise.resolve(),
        private readonly failOn: string | null = null,
    ) { }

    async write(line: string): Promise<void> {
        await this.gate;
        if (line === this.failOn) throw new Error("EIO: i/o error");
        this.lines.push(line);
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}

describe("AsyncWriter", () => {
    let reports: string[];

    beforeEach(() => {
        reports = [];
        setDiagnosticsReporter((message) => reports.push(message));
    });

    afterEach(() => {
        setDiagnosticsReporter(null);
    });

    it("should write lines in enqueue order", async () => {
        const sink = new RecordingSink();
        const writer = new AsyncWriter(sink, { capacity: 1000, overflow: "drop-newest", sinkPath: "/virtual/a.log" });
        const expected = Array.from({ length: 100 }, (_, i) => `line ${i}`);

        for (const line of expected) writer.enqueueLine(line);
        await expect(writer.drain(1000)).resolves.toEqual({ drained: true, lost: 0 });

        expect(sink.lines).toEqual(expected);
        expect(sink.closed).toBe(true);
        expect(writer.stats()).toMatchObject({ mode: "async", enqueued: 100, written: 100, pending: 0 });
    });

    it("should return immediately and drop the newest lines while the consumer is stalled", async () => {
        const gate = createGate();
        const sink = new RecordingSink(gate.promise);
        const writer = new AsyncWriter(sink, { capacity: 3, overflow: "drop-newest", sinkPath: "/virtual/a.log" });

        const accepted = ["a", "b", "c", "d", "e"].map((line) => writer.enqueueLine(line));

        expect(accepted).toEqual([true, true, true, false, false]);
        expect(writer.stats()).toMatchObject({ enqueued: 3, dropped: 2, pending: 3, capacity: 3 });
        expect(reports).toEqual(["Log queue for /virtual/a.log is full (capacity 3), dropping lines"]);

        gate.open();
        await writer.drain(1000);
        expect(sink.lines).toEqual(["a", "b", "c"]);
    });

    it("should evict the oldest pending line under drop-oldest", async () => {
        const sink = new RecordingSink();
        const writer = new AsyncWriter(sink, { capacity: 2, overflow: "drop-oldest", sinkPath: "/virtual/a.log" });

        expect(writer.enqueueLine("a")).toBe(true);
        expect(writer.enqueueLine("b")).toBe(true);
        expect(writer.enqueueLine("c")).toBe(false);

        await writer.drain(1000);
        expect(sink.lines).toEqual(["b", "c"]);
        expect(writer.stats()).toMatchObject({ enqueued: 3, written: 2, dropped: 1 });
    });

    it("should count and report failed writes without stopping", async () => {
        const sink = new RecordingSink(Promise.resolve(), "bad");
        const writer = new AsyncWriter(sink, { capacity: 10, overflow: "drop-newest", sinkPath: "/virtual/a.log" });

        writer.enqueueLine("ok1");
        writer.enqueueLine("bad");
        writer.enqueueLine("ok2");
        await writer.drain(1000);

        expect(sink.lines).toEqual(["ok1", "ok2"]);
        expect(writer.stats()).toMatchObject({ written: 2, failed: 1 });
        expect(reports).toEqual(["Dropped log line for /virtual/a.log: EIO: i/o error"]);
    });

    it("should report lines lost when the drain times out", async () => {
        const gate = createGate();
        const sink = new RecordingSink(gate.promise);
        const writer = new AsyncWriter(sink, { capacity: 10, overflow: "drop-newest", sinkPath: "/virtual/a.log" });

        writer.enqueueLine("a");
        writer.enqueueLine("b");
        writer.enqueueLine("c");

        await expect(writer.drain(20)).resolves.toEqual({ drained: false, lost: 2 });
        expect(writer.stats()).toMatchObject({ lost: 2, pending: 0 });
        expect(reports).toEqual(["Drain of /virtual/a.log timed out after 20ms, 2 buffered line(s) lost"]);

        gate.open();
    });

    it("should refuse lines after drain and return the same result twice", async () => {
        const sink = new RecordingSink();
        const writer = new AsyncWriter(sink, { capacity: 10, overflow: "drop-newest", sinkPath: "/virtual/a.log" });

        const first = writer.drain(1000);
        expect(writer.enqueueLine("late")).toBe(false);
        expect(writer.drain(5)).toBe(first);
        await first;

        expect(sink.lines).toEqual([]);
        expect(writer.stats().dropped).toBe(1);
    });

    it("should resolve flush once pending lines are written", async () => {
        const sink = new RecordingSink();
        const writer = new AsyncWriter(sink, { capacity: 10, overflow: "drop-newest", sinkPath: "/virtual/a.log" });

        writer.enqueueLine("one");
        writer.enqueueLine("two");
        await writer.flush();

        expect(sink.lines).toEqual(["one", "two"]);
        expect(sink.closed).toBe(false);
        expect(writer.enqueueLine("three")).toBe(true);
        await writer.drain(1000);
        expect(sink.lines).toEqual(["one", "two", "three"]);
    });
});

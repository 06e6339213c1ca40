import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { LoggerRegistry } from "./registry.js";
import { createCallSite } from "./call-site.js";

describe("call site", () => {
    let dir: string;
    let terminate: ReturnType<typeof vi.fn>;
    let registry: LoggerRegistry;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "logroll_callsite_"));
        terminate = vi.fn();
        registry = new LoggerRegistry({ terminate: (code) => terminate(code) });
    });

    afterEach(async () => {
        await registry.shutdownAll();
        await fs.rm(dir, { recursive: true, force: true }).catch(() => { });
    });

    it("should route messages to the named instance", async () => {
        await registry.init({ dir, fileName: "svc", instanceName: "svc", async: false });
        const site = createCallSite(registry);

        await site.info("svc", "started");
        await site.log("svc", "warn", "slow");
        await registry.shutdown("svc");

        const lines = (await fs.readFile(path.join(dir, "svc.log"), "utf-8")).trim().split("\n");
        expect(lines).toHaveLength(2);
        expect(lines[0]).toContain("[INFO ]");
        expect(lines[0].endsWith("] started")).toBe(true);
        expect(lines[1]).toContain("[WARN ]");
    });

    it("should ignore unknown instance names", async () => {
        const site = createCallSite(registry);
        await expect(site.error("missing", "nobody listens")).resolves.toBeUndefined();
        expect(await fs.readdir(dir)).toEqual([]);
    });

    it("should terminate on fatal even without an instance", async () => {
        const site = createCallSite(registry);
        await site.fatal("missing", "boom");
        expect(terminate).toHaveBeenCalledWith(1);
    });

    it("should write the fatal line through a known instance", async () => {
        await registry.init({ dir, fileName: "svc", instanceName: "svc", async: true });
        const site = createCallSite(registry);

        await site.fatal("svc", "corrupt state");

        expect(terminate).toHaveBeenCalledWith(1);
        const content = await fs.readFile(path.join(dir, "svc.log"), "utf-8");
        expect(content.trimEnd().endsWith("] FATAL: corrupt state")).toBe(true);
    });
});

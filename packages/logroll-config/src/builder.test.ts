import { describe, it, expect } from "vitest";
import { LogConfigError } from "@logroll/core";
import { LogConfigBuilder, logConfig } from "./builder.js";

describe("LogConfigBuilder", () => {
    it("should chain every setter into one validated config", () => {
        const config = new LogConfigBuilder()
            .withDir("/var/log/demo")
            .withFileName("app2.log")
            .withMaxSize(4096)
            .withMaxFiles(3)
            .withAsync(false)
            .withInstantFlush(true)
            .withInstanceName("app2")
            .withLevel("warn")
            .withQueueCapacity(16)
            .withOverflow("drop-oldest")
            .withDrainTimeout(250)
            .withPerProcessDir(true)
            .withConsole(true)
            .build();

        expect(config).toEqual({
            dir: "/var/log/demo",
            fileName: "app2",
            maxSize: 4096,
            maxFiles: 3,
            async: false,
            instantFlush: true,
            instanceName: "app2",
            level: "warn",
            queueCapacity: 16,
            overflow: "drop-oldest",
            drainTimeoutMs: 250,
            perProcessDir: true,
            console: true,
        });
    });

    it("should validate on build, not on set", () => {
        const builder = logConfig({ instanceName: "bad" }).withMaxFiles(-1);
        expect(builder.toInput()).toEqual({ instanceName: "bad", maxFiles: -1 });
        expect(() => builder.build()).toThrow(LogConfigError);
    });
});

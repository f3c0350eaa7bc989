import { describe, it, expect } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createLogger } from "../../src/logger.js";

describe("createLogger", () => {
  it("creates a logger with default level", () => {
    const logger = createLogger();
    expect(logger.level).toBe("info");
  });

  it("creates a logger with custom level", () => {
    expect(createLogger({ level: "debug" }).level).toBe("debug");
  });

  it("keeps the level on child loggers", () => {
    const child = createLogger({ level: "warn" }).child({ component: "aggregator" });
    expect(child.level).toBe("warn");
  });

  it("writes JSON lines to the log file", () => {
    const tempDir = mkdtempSync(join(tmpdir(), "usagedash-log-"));
    const file = join(tempDir, "state", "usagedash.log");
    try {
      const logger = createLogger({ level: "info", file });
      logger.child({ component: "test" }).info({ files: 2 }, "scan finished");
      logger.debug("not written");
      logger.flush();

      const lines = readFileSync(file, "utf8").trim().split("\n");
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? "")).toMatchObject({
        level: 30,
        app: "usagedash",
        component: "test",
        files: 2,
        msg: "scan finished",
      });
    } finally {
      rmSync(tempDir, { recursive: true, force: true });
    }
  });
});

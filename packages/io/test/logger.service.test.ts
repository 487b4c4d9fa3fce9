import fs from "fs/promises";
import os from "os";
import path from "path";
import { describe, expect, it, vi } from "vitest";
import { LoggerService } from "../src/logger.service";

describe("LoggerService", () => {
  it("notifies listeners when logs are written", () => {
    const service = new LoggerService();
    service.configure({ level: "silent" });
    const listener = vi.fn();
    const unregister = service.registerListener(listener);

    const logger = service.getLogger("resolver");
    logger.warn({ document: "rbc-options" }, "migrated");

    expect(listener).toHaveBeenCalledWith({
      level: "warn",
      args: [{ document: "rbc-options" }, "migrated"],
    });

    unregister();
  });

  it("notifies listeners for loggers created with withBindings", () => {
    const service = new LoggerService();
    service.configure({ level: "silent" });
    const listener = vi.fn();
    const unregister = service.registerListener(listener);

    service.withBindings({ command: "resolve" }).debug("bound log");

    expect(listener).toHaveBeenCalledWith({ level: "debug", args: ["bound log"] });

    unregister();
  });

  it("stops notifying after unregistering", () => {
    const service = new LoggerService();
    service.configure({ level: "silent" });
    const listener = vi.fn();

    service.registerListener(listener)();
    service.getLogger().info("ignored");

    expect(listener).not.toHaveBeenCalled();
  });

  it("reuses the root logger for identical configuration", () => {
    const service = new LoggerService();

    const first = service.configure({ level: "silent" });
    const second = service.configure({ level: "silent" });
    const third = service.configure({ level: "error" });

    expect(second).toBe(first);
    expect(third).not.toBe(first);
    expect(third.level).toBe("error");
  });

  it("applies the configured level to scoped loggers", () => {
    const service = new LoggerService();
    service.configure({ level: "warn" });

    expect(service.getLogger("cli").level).toBe("warn");
    expect(service.getLogger("cli").isLevelEnabled("debug")).toBe(false);
  });

  it("creates the directory of a file destination", async () => {
    const workspace = await fs.mkdtemp(path.join(os.tmpdir(), "strata-logs-"));
    const logFile = path.join(workspace, "nested", "strata.log");
    const service = new LoggerService();

    service.configure({
      level: "info",
      destination: { type: "file", path: logFile, pretty: false },
    });

    const stats = await fs.stat(path.dirname(logFile));
    expect(stats.isDirectory()).toBe(true);
  });
});

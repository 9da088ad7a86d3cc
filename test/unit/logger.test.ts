import { vi, describe, it, expect, afterEach } from "vitest";
import { createLogger, formatLine, isLogLevel, setLogLevel } from "../../src/logger.js";

afterEach(() => {
  setLogLevel("info");
  vi.restoreAllMocks();
});

describe("formatLine", () => {
  const now = new Date("2026-03-01T12:00:00.000Z");

  it("prefixes timestamp, level and component", () => {
    expect(formatLine("warn", "sequencer", "step skipped", undefined, now)).toBe(
      "[2026-03-01T12:00:00.000Z] [WARN] [sequencer] step skipped",
    );
  });

  it("appends meta as JSON", () => {
    expect(formatLine("info", "finder", "searching", { title: "안녕" }, now)).toBe(
      '[2026-03-01T12:00:00.000Z] [INFO] [finder] searching {"title":"안녕"}',
    );
  });

  it("omits empty meta", () => {
    expect(formatLine("info", "cli", "done", {}, now)).toBe("[2026-03-01T12:00:00.000Z] [INFO] [cli] done");
  });
});

describe("createLogger", () => {
  it("drops messages below the minimum level", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const log = createLogger("test");
    log.debug("hidden");
    log.info("shown");
    expect(write).toHaveBeenCalledOnce();
    expect(String(write.mock.calls[0]?.[0])).toMatch(/\[INFO\] \[test\] shown\n$/);
  });

  it("writes debug messages once the level is lowered", () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    setLogLevel("debug");
    createLogger("test").debug("visible");
    expect(write).toHaveBeenCalledOnce();
  });
});

describe("isLogLevel", () => {
  it("accepts the four levels only", () => {
    expect(["debug", "info", "warn", "error"].every(isLogLevel)).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});

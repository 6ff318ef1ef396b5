import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect } from "vitest";
import { createLogger, fileStamp, formatLine } from "../src/utils/logger.js";

describe("fileStamp", () => {
  it("formats local time as YYYYMMDDHHmmss", () => {
    expect(fileStamp(new Date(2026, 0, 2, 3, 4, 5))).toBe("20260102030405");
    expect(fileStamp(new Date(2025, 11, 31, 23, 59, 58))).toBe("20251231235958");
  });
});

describe("formatLine", () => {
  it("renders timestamp, name, level and message", () => {
    expect(
      formatLine({
        timestamp: "2026-01-02 03:04:05",
        label: "groq",
        level: "info",
        message: "Retry 1/10 in 2.50s",
      }),
    ).toBe("2026-01-02 03:04:05 - groq - INFO - Retry 1/10 in 2.50s");
  });

  it("appends structured fields as JSON", () => {
    expect(
      formatLine({
        timestamp: "t",
        label: "openai",
        level: "error",
        message: "failed",
        attempt: 2,
      }),
    ).toBe('t - openai - ERROR - failed {"attempt":2}');
  });
});

describe("createLogger", () => {
  it("returns a logger exposing every level", () => {
    const logger = createLogger({ name: "test", silent: true });
    expect(typeof logger.debug).toBe("function");
    expect(typeof logger.info).toBe("function");
    expect(typeof logger.warn).toBe("function");
    expect(typeof logger.error).toBe("function");
    expect(() => logger.info("quiet", { attempt: 1 })).not.toThrow();
  });

  it("creates the log directory only when asked", () => {
    // The file transport keeps its stream open, so the temp dir is left behind.
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "chat-logs-"));
    const logDir = path.join(tmpDir, "log");

    createLogger({ name: "test", silent: true });
    expect(fs.existsSync(logDir)).toBe(false);

    createLogger({ name: "test", silent: true, logDir });
    expect(fs.existsSync(logDir)).toBe(true);
  });
});

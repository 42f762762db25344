import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Logger } from "./logger";
import type { LogLevel } from "../types";

function capture(level: LogLevel) {
  const lines: Array<[LogLevel, string]> = [];
  const logger = new Logger(level, [(lvl, line) => lines.push([lvl, line])]);
  return { logger, lines };
}

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes timestamped lines with the level", () => {
    const { logger, lines } = capture("debug");

    logger.info("Starting process...");

    expect(lines).toHaveLength(1);
    expect(lines[0][0]).toBe("info");
    expect(lines[0][1]).toMatch(
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z - INFO - Starting process\.\.\.$/,
    );
  });

  it("drops messages below the configured level", () => {
    const { logger, lines } = capture("warn");

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(lines.map(([level]) => level)).toEqual(["warn", "error"]);
  });

  it("appends the error stack", () => {
    const { logger, lines } = capture("info");
    const error = new Error("boom");

    logger.error("Upload aborted", error);

    expect(lines[0][1]).toContain(" - ERROR - Upload aborted\nError: boom");
  });

  it("appends to a log file", async () => {
    const dir = await mkdtemp(join(tmpdir(), "media-migrator-log-"));
    const file = join(dir, "process.log");

    try {
      const first = Logger.toFile("info", file);
      first.info("first run");
      await first.close();

      const second = Logger.toFile("info", file);
      second.warn("second run");
      await second.close();

      const content = await readFile(file, "utf-8");
      const lines = content.trimEnd().split("\n");
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/ - INFO - first run$/);
      expect(lines[1]).toMatch(/ - WARN - second run$/);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("echoes file lines to the console when asked", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const dir = await mkdtemp(join(tmpdir(), "media-migrator-log-"));
    const file = join(dir, "process.log");

    try {
      const logger = Logger.toFile("info", file, true);
      logger.info("both sinks");
      await logger.close();

      expect(log).toHaveBeenCalledTimes(1);
      expect(log.mock.calls[0][0]).toMatch(/ - INFO - both sinks$/);
      expect(await readFile(file, "utf-8")).toMatch(/ - INFO - both sinks\n$/);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("falls back to the console when the log file cannot be opened", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const dir = await mkdtemp(join(tmpdir(), "media-migrator-log-"));

    try {
      const logger = Logger.toFile("info", join(dir, "missing", "process.log"));
      logger.info("before");
      await logger.close();
      logger.info("after");

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toMatch(
        / - WARN - Cannot write log file .*process\.log: ENOENT.*; logging to console$/,
      );
      expect(log).toHaveBeenCalledTimes(1);
      expect(log.mock.calls[0][0]).toMatch(/ - INFO - after$/);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

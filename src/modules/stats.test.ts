import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import chalk from "chalk";
import { stats } from "./stats";
import { JsonRecordSource, Logger, Tracker, loadDefaultConfig } from "../utils";

describe("stats", () => {
  const level = chalk.level;

  beforeEach(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    chalk.level = level;
    vi.restoreAllMocks();
  });

  it("summarizes uploads and failures", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const tracker = new Tracker();
    tracker.setTotalRecords(2);
    tracker.recordOutcome("http://x/a.png", {
      status: "success",
      message: "Uploaded successfully",
      response: "{}",
      attempts: 1,
    });
    tracker.recordOutcome("http://x/b.png", {
      status: "error",
      stage: "fetch",
      message: "bad status: 404",
      attempts: 0,
      cause: { reason: "bad status", code: 404 },
    });

    await stats({
      config: await loadDefaultConfig(),
      source: new JsonRecordSource("unused.json"),
      logger: new Logger("error", []),
      tracker,
      reportPath: "reports/report-1.json",
    });

    const lines = log.mock.calls.map(([line]) => String(line));
    expect(lines).toContain(`   ${"━".repeat(24)} 50% (1/2)`);
    expect(lines).toContain(`   ◉ ${"Uploaded".padEnd(18)} 1`);
    expect(lines).toContain(`   ◉ ${"Fetch failed".padEnd(18)} 1`);
    expect(lines).toContain(`   ◉ ${"Upload attempts".padEnd(18)} 1`);
    expect(lines).toContain(`   ✖ ${"Fetch failures".padEnd(18)} 1`);
    expect(lines).toContain("   reports/report-1.json");
  });
});

import { describe, expect, it } from "vitest";

import { buildReport, resolveExitStatus, summarizeOutcomes } from "./aggregator.js";
import {
  createOutcome,
  recordOutcome,
  type OutcomeStatus,
  type RecordedOutcome,
} from "./plugin.js";

function outcome(name: string, status: OutcomeStatus, durationMs?: number): RecordedOutcome {
  return recordOutcome(
    createOutcome(
      { name, targetOperation: "op" },
      { passed: status === "passed", message: status, durationMs },
    ),
    status,
  );
}

describe("summarizeOutcomes", () => {
  it("counts skipped outcomes as failures and sums durations", () => {
    const summary = summarizeOutcomes([
      outcome("A", "passed", 10),
      outcome("B", "failed", 25.5),
      outcome("C", "skipped"),
      outcome("D", "passed", 4.5),
    ]);

    expect(summary).toEqual({ total: 4, passed: 2, failed: 2, skipped: 1, durationMs: 40 });
  });

  it("handles an empty run", () => {
    expect(summarizeOutcomes([])).toEqual({
      total: 0,
      passed: 0,
      failed: 0,
      skipped: 0,
      durationMs: 0,
    });
  });
});

describe("resolveExitStatus", () => {
  const clean = { total: 2, passed: 2, failed: 0, skipped: 0, durationMs: 0 };

  it("is zero exactly when nothing failed", () => {
    const oneFailed = { ...clean, passed: 1, failed: 1 };
    expect(resolveExitStatus(clean)).toBe(0);
    expect(resolveExitStatus(oneFailed)).toBe(1);
  });
});

describe("buildReport", () => {
  it("keeps outcomes in execution order and records run metadata", () => {
    const tests = [outcome("B", "passed", 1), outcome("A", "failed", 2)];

    const report = buildReport(tests, {
      target: "http://localhost:8000/mcp",
      timestamp: "2026-01-01T00:00:00.000Z",
    });

    expect(report).toEqual({
      timestamp: "2026-01-01T00:00:00.000Z",
      target: "http://localhost:8000/mcp",
      cancelled: false,
      summary: { total: 2, passed: 1, failed: 1, skipped: 0, durationMs: 3 },
      tests,
      exitStatus: 1,
    });
  });

  it("marks a cancelled run without failing it when every outcome passed", () => {
    const report = buildReport([outcome("A", "passed", 1)], {
      cancelled: true,
      cancelReason: "SIGINT",
    });

    expect(report.cancelled).toBe(true);
    expect(report.cancelReason).toBe("SIGINT");
    expect(report.exitStatus).toBe(0);
  });

  it("stamps the current time when none is given", () => {
    const report = buildReport([]);

    expect(Number.isNaN(Date.parse(report.timestamp))).toBe(false);
    expect(report.exitStatus).toBe(0);
    expect("target" in report).toBe(false);
  });
});

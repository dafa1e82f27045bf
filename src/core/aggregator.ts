import type { RecordedOutcome } from "./plugin.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReportSummary = {
  total: number;
  passed: number;
  failed: number;
  /** Subset of `failed` that never ran because a hard dependency failed. */
  skipped: number;
  durationMs: number;
};

export type Report = {
  timestamp: string;
  target?: string;
  /** How the session reached the server, e.g. "http". */
  transport?: string;
  cancelled: boolean;
  cancelReason?: string;
  summary: ReportSummary;
  tests: RecordedOutcome[];
  exitStatus: number;
};

export type BuildReportOptions = {
  cancelled?: boolean;
  cancelReason?: string;
  target?: string;
  transport?: string;
  timestamp?: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function summarizeOutcomes(outcomes: readonly RecordedOutcome[]): ReportSummary {
  const total = outcomes.length;
  const passed = outcomes.filter((outcome) => outcome.passed).length;

  return {
    total,
    passed,
    failed: total - passed,
    skipped: outcomes.filter((outcome) => outcome.status === "skipped").length,
    durationMs: outcomes.reduce((sum, outcome) => sum + (outcome.durationMs ?? 0), 0),
  };
}

/** Cancellation is carried by `Report.cancelled`, not by the status. */
export function resolveExitStatus(summary: Pick<ReportSummary, "failed">): number {
  return summary.failed === 0 ? 0 : 1;
}

export function buildReport(
  outcomes: readonly RecordedOutcome[],
  options: BuildReportOptions = {},
): Report {
  const summary = summarizeOutcomes(outcomes);
  const cancelled = options.cancelled ?? false;

  const report: Report = {
    timestamp: options.timestamp ?? isoNow(),
    cancelled,
    summary,
    tests: [...outcomes],
    exitStatus: resolveExitStatus(summary),
  };

  if (options.target !== undefined) report.target = options.target;
  if (options.transport !== undefined) report.transport = options.transport;
  if (options.cancelReason !== undefined) report.cancelReason = options.cancelReason;

  return report;
}

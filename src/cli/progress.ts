import type { Report } from "../core/aggregator.js";
import { createAnsiFormatter, type AnsiFormatter } from "../core/error-format.js";
import type { ExecutorHooks } from "../core/executor.js";
import type { OutcomeStatus, Plugin, RecordedOutcome } from "../core/plugin.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProgressOptions = {
  useColor: boolean;
  log?: (line: string) => void;
};

const RULE = "=".repeat(70);

const STATUS_LABELS: Record<OutcomeStatus, { text: string; style: "green" | "red" | "yellow" }> = {
  passed: { text: "PASS", style: "green" },
  failed: { text: "FAIL", style: "red" },
  skipped: { text: "SKIP", style: "yellow" },
};

// =============================================================================
// PRINTER
// =============================================================================

export class ProgressPrinter {
  private readonly format: AnsiFormatter;
  private readonly log: (line: string) => void;

  constructor(options: ProgressOptions) {
    this.format = createAnsiFormatter(options.useColor);
    this.log = options.log ?? ((line) => console.log(line));
  }

  heading(title: string): void {
    this.log(RULE);
    this.log(title);
    this.log(RULE);
    this.log("");
  }

  pluginList(plugins: readonly Plugin[]): void {
    this.log(`Running ${plugins.length} plugin(s) in order:`);
    for (const plugin of plugins) {
      this.log(`  - ${plugin.name} (${plugin.targetOperation}): ${plugin.description}`);
    }
    this.log("");
  }

  warnings(messages: readonly string[]): void {
    for (const message of messages) {
      this.log(this.format(`Warning: ${message}`, ["yellow"]));
    }
    if (messages.length > 0) this.log("");
  }

  hooks(): ExecutorHooks {
    return {
      onOutcome: (outcome) => this.outcome(outcome),
    };
  }

  outcome(outcome: RecordedOutcome): void {
    const label = STATUS_LABELS[outcome.status];
    this.log(`  ${outcome.pluginName}... ${this.format(label.text, [label.style])}`);

    if (outcome.durationMs !== undefined) {
      this.log(`    Duration: ${outcome.durationMs.toFixed(1)}ms`);
    }
    this.log(`    ${outcome.message}`);
    if (outcome.error !== undefined) {
      this.log(this.format(`    Error: ${outcome.error}`, ["red"]));
    }
    this.log("");
  }

  summary(report: Report, plannedCount: number): void {
    const { summary } = report;

    this.heading("Test Summary");
    this.log(`Total:  ${summary.total} tests`);
    this.log(this.format(`Passed: ${summary.passed}`, ["green"]));
    const skippedNote = summary.skipped > 0 ? ` (${summary.skipped} skipped)` : "";
    this.log(this.format(`Failed: ${summary.failed}${skippedNote}`, ["red"]));
    this.log("");

    if (report.cancelled) {
      this.log(
        this.format(`Run cancelled after ${summary.total} of ${plannedCount} plugin(s)`, [
          "yellow",
        ]),
      );
      return;
    }

    if (summary.failed === 0) {
      this.log(this.format("All tests passed!", ["green"]));
    } else {
      this.log(this.format(`${summary.failed} test(s) failed`, ["red"]));
    }
  }

  line(text: string, styles: Parameters<AnsiFormatter>[1] = []): void {
    this.log(this.format(text, styles));
  }
}

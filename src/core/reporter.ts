/*
Purpose: serialize a Report to JSON or JUnit XML and read JSON reports back.
Assumptions: reports list outcomes in execution order; that order is kept as-is.
Usage: await writeReport(report, "results.xml", "junit");
*/

import path from "node:path";

import { z } from "zod";

import type { Report } from "./aggregator.js";
import { formatZodIssues } from "./error-format.js";
import { ReportError } from "./errors.js";
import { createOutcome, recordOutcome } from "./plugin.js";
import { writeTextFile } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export const REPORT_FORMATS = ["json", "junit"] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export type JUnitOptions = {
  suiteName?: string;
  classnamePrefix?: string;
};

export const DEFAULT_SUITE_NAME = "MCP Automated Tests";
export const DEFAULT_CLASSNAME_PREFIX = "mcp.tools";

const SerializedTestSchema = z.object({
  pluginName: z.string(),
  targetOperation: z.string(),
  status: z.enum(["passed", "failed", "skipped"]),
  passed: z.boolean(),
  message: z.string(),
  error: z.string().nullable(),
  durationMs: z.number().nullable(),
});

const SerializedReportSchema = z.object({
  timestamp: z.string(),
  target: z.string().optional(),
  transport: z.string().optional(),
  cancelled: z.boolean(),
  cancelReason: z.string().optional(),
  exitStatus: z.number().int(),
  summary: z.object({
    total: z.number().int().nonnegative(),
    passed: z.number().int().nonnegative(),
    failed: z.number().int().nonnegative(),
    skipped: z.number().int().nonnegative(),
    durationMs: z.number().nonnegative(),
  }),
  tests: z.array(SerializedTestSchema),
});

type SerializedReport = z.infer<typeof SerializedReportSchema>;

// =============================================================================
// JSON
// =============================================================================

export function formatJsonReport(report: Report): string {
  const serialized: SerializedReport = {
    timestamp: report.timestamp,
    target: report.target,
    transport: report.transport,
    cancelled: report.cancelled,
    cancelReason: report.cancelReason,
    exitStatus: report.exitStatus,
    summary: { ...report.summary },
    tests: report.tests.map((outcome) => ({
      pluginName: outcome.pluginName,
      targetOperation: outcome.targetOperation,
      status: outcome.status,
      passed: outcome.passed,
      message: outcome.message,
      error: outcome.error ?? null,
      durationMs: outcome.durationMs ?? null,
    })),
  };

  return `${JSON.stringify(serialized, null, 2)}\n`;
}

export function parseJsonReport(raw: string): Report {
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    throw new ReportError("Report is not valid JSON.", err);
  }

  const parsed = SerializedReportSchema.safeParse(doc);
  if (!parsed.success) {
    const details = formatZodIssues(parsed.error.issues);
    throw new ReportError(`Report does not match the expected shape:\n${details}`, parsed.error);
  }

  const data = parsed.data;
  const report: Report = {
    timestamp: data.timestamp,
    cancelled: data.cancelled,
    exitStatus: data.exitStatus,
    summary: data.summary,
    tests: data.tests.map((test) =>
      recordOutcome(
        createOutcome(
          { name: test.pluginName, targetOperation: test.targetOperation },
          {
            passed: test.passed,
            message: test.message,
            error: test.error ?? undefined,
            durationMs: test.durationMs ?? undefined,
          },
        ),
        test.status,
      ),
    ),
  };

  if (data.target !== undefined) report.target = data.target;
  if (data.transport !== undefined) report.transport = data.transport;
  if (data.cancelReason !== undefined) report.cancelReason = data.cancelReason;

  return report;
}

// =============================================================================
// JUNIT
// =============================================================================

export function formatJUnitReport(report: Report, options: JUnitOptions = {}): string {
  const suiteName = options.suiteName ?? DEFAULT_SUITE_NAME;
  const prefix = options.classnamePrefix ?? DEFAULT_CLASSNAME_PREFIX;

  const lines: string[] = ['<?xml version="1.0" encoding="utf-8"?>'];

  lines.push(
    `<testsuite${formatAttributes([
      ["name", suiteName],
      ["tests", String(report.summary.total)],
      ["failures", String(report.summary.failed)],
      ["errors", "0"],
      ["time", formatSeconds(report.summary.durationMs)],
      ["timestamp", report.timestamp],
    ])}>`,
  );

  const properties: Array<[string, string]> = [];
  if (report.transport !== undefined) properties.push(["transport", report.transport]);
  if (report.target !== undefined) properties.push(["url", report.target]);
  if (report.cancelled) properties.push(["cancelled", "true"]);

  if (properties.length > 0) {
    lines.push("  <properties>");
    for (const [name, value] of properties) {
      lines.push(`    <property${formatAttributes([["name", name], ["value", value]])} />`);
    }
    lines.push("  </properties>");
  }

  for (const outcome of report.tests) {
    const caseAttributes = formatAttributes([
      ["name", outcome.pluginName],
      ["classname", `${prefix}.${outcome.targetOperation}`],
      ["time", formatSeconds(outcome.durationMs)],
    ]);

    if (outcome.passed) {
      lines.push(`  <testcase${caseAttributes} />`);
      continue;
    }

    lines.push(`  <testcase${caseAttributes}>`);
    const failureAttributes = formatAttributes([["message", outcome.message]]);
    if (outcome.error !== undefined) {
      lines.push(`    <failure${failureAttributes}>${escapeXmlText(outcome.error)}</failure>`);
    } else {
      lines.push(`    <failure${failureAttributes} />`);
    }
    lines.push("  </testcase>");
  }

  lines.push("</testsuite>");
  return `${lines.join("\n")}\n`;
}

// =============================================================================
// OUTPUT
// =============================================================================

export function formatReport(
  report: Report,
  format: ReportFormat,
  options: JUnitOptions = {},
): string {
  return format === "junit" ? formatJUnitReport(report, options) : formatJsonReport(report);
}

export async function writeReport(
  report: Report,
  filePath: string,
  format: ReportFormat,
  options: JUnitOptions = {},
): Promise<void> {
  await writeTextFile(filePath, formatReport(report, format, options));
}

/** Explicit format wins; otherwise a `.xml` file means JUnit. */
export function resolveReportFormat(filePath: string, explicit?: ReportFormat): ReportFormat {
  if (explicit) return explicit;
  return path.extname(filePath).toLowerCase() === ".xml" ? "junit" : "json";
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatSeconds(durationMs: number | undefined): string {
  return ((durationMs ?? 0) / 1000).toFixed(3);
}

function formatAttributes(pairs: Array<[string, string]>): string {
  return pairs.map(([name, value]) => ` ${name}="${escapeXmlAttribute(value)}"`).join("");
}

// Characters XML 1.0 cannot carry at all.
const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

export function escapeXmlText(value: string): string {
  return value
    .replace(INVALID_XML_CHARS, "")
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

export function escapeXmlAttribute(value: string): string {
  return escapeXmlText(value)
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;")
    .replace(/\n/g, "&#10;")
    .replace(/\r/g, "&#13;")
    .replace(/\t/g, "&#9;");
}

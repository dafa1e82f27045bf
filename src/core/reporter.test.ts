import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { buildReport, type Report } from "./aggregator.js";
import { ReportError } from "./errors.js";
import {
  createOutcome,
  recordOutcome,
  type OutcomeFields,
  type OutcomeStatus,
} from "./plugin.js";
import {
  escapeXmlAttribute,
  escapeXmlText,
  formatJUnitReport,
  formatJsonReport,
  parseJsonReport,
  resolveReportFormat,
  writeReport,
} from "./reporter.js";

function recorded(name: string, status: OutcomeStatus, fields: Omit<OutcomeFields, "passed">) {
  return recordOutcome(
    createOutcome(
      { name, targetOperation: `op_${name.toLowerCase()}` },
      { ...fields, passed: status === "passed" },
    ),
    status,
  );
}

function sampleReport(): Report {
  return buildReport(
    [
      recorded("A", "passed", { message: "A ok", durationMs: 12 }),
      recorded("B", "failed", {
        message: "bad <value>",
        error: `expected "x" & got 'y'`,
        durationMs: 1500,
      }),
      recorded("C", "skipped", { message: "skipped — failed dependency: B" }),
    ],
    { target: "http://localhost:8000/mcp", timestamp: "2026-01-01T00:00:00.000Z" },
  );
}

describe("formatJUnitReport", () => {
  it("renders one testcase per outcome with failures for failed and skipped ones", () => {
    expect(formatJUnitReport(sampleReport())).toBe(
      [
        '<?xml version="1.0" encoding="utf-8"?>',
        '<testsuite name="MCP Automated Tests" tests="3" failures="2" errors="0"' +
          ' time="1.512" timestamp="2026-01-01T00:00:00.000Z">',
        "  <properties>",
        '    <property name="url" value="http://localhost:8000/mcp" />',
        "  </properties>",
        '  <testcase name="A" classname="mcp.tools.op_a" time="0.012" />',
        '  <testcase name="B" classname="mcp.tools.op_b" time="1.500">',
        `    <failure message="bad &lt;value&gt;">expected "x" &amp; got 'y'</failure>`,
        "  </testcase>",
        '  <testcase name="C" classname="mcp.tools.op_c" time="0.000">',
        '    <failure message="skipped — failed dependency: B" />',
        "  </testcase>",
        "</testsuite>",
        "",
      ].join("\n"),
    );
  });

  it("uses the configured suite name and classname prefix", () => {
    const xml = formatJUnitReport(sampleReport(), {
      suiteName: "Nightly",
      classnamePrefix: "acme.smoke",
    });

    expect(xml).toContain('<testsuite name="Nightly" ');
    expect(xml).toContain('<testcase name="A" classname="acme.smoke.op_a" time="0.012" />');
  });

  it("lists the transport before the url", () => {
    const report = buildReport([], {
      target: "http://localhost:8000/mcp",
      transport: "http",
      timestamp: "2026-01-01T00:00:00.000Z",
    });

    expect(formatJUnitReport(report).split("\n").slice(2, 6)).toEqual([
      "  <properties>",
      '    <property name="transport" value="http" />',
      '    <property name="url" value="http://localhost:8000/mcp" />',
      "  </properties>",
    ]);
  });

  it("records cancellation as a suite property", () => {
    const report = buildReport([], { cancelled: true, timestamp: "2026-01-01T00:00:00.000Z" });

    expect(formatJUnitReport(report).split("\n").slice(2, 5)).toEqual([
      "  <properties>",
      '    <property name="cancelled" value="true" />',
      "  </properties>",
    ]);
  });
});

describe("XML escaping", () => {
  it("escapes markup in text", () => {
    expect(escapeXmlText("a < b && c > d")).toBe("a &lt; b &amp;&amp; c &gt; d");
  });

  it("escapes quotes and whitespace controls in attributes", () => {
    expect(escapeXmlAttribute(`say "hi"\n\t'now'`)).toBe(
      "say &quot;hi&quot;&#10;&#9;&apos;now&apos;",
    );
  });

  it("drops characters XML cannot represent", () => {
    expect(escapeXmlText("bell\u0007 ok")).toBe("bell ok");
  });
});

describe("JSON reports", () => {
  it("serializes absent fields as null", () => {
    const doc: unknown = JSON.parse(formatJsonReport(sampleReport()));

    expect(doc).toMatchObject({
      timestamp: "2026-01-01T00:00:00.000Z",
      target: "http://localhost:8000/mcp",
      cancelled: false,
      exitStatus: 1,
      summary: { total: 3, passed: 1, failed: 2, skipped: 1, durationMs: 1512 },
    });
    expect(doc).toHaveProperty("tests.2", {
      pluginName: "C",
      targetOperation: "op_c",
      status: "skipped",
      passed: false,
      message: "skipped — failed dependency: B",
      error: null,
      durationMs: null,
    });
  });

  it("ends with a newline", () => {
    expect(formatJsonReport(sampleReport()).endsWith("}\n")).toBe(true);
  });

  it("reads back what it writes", () => {
    const report = sampleReport();

    expect(parseJsonReport(formatJsonReport(report))).toEqual(report);
  });

  it("keeps the transport", () => {
    const report = { ...sampleReport(), transport: "http" };

    expect(JSON.parse(formatJsonReport(report))).toHaveProperty("transport", "http");
    expect(parseJsonReport(formatJsonReport(report)).transport).toBe("http");
  });

  it("rejects malformed input", () => {
    expect(() => parseJsonReport("{not json")).toThrowError(ReportError);
    expect(() => parseJsonReport('{"timestamp": 1}')).toThrowError(
      /Report does not match the expected shape/,
    );
  });
});

describe("resolveReportFormat", () => {
  it("infers JUnit from an .xml extension", () => {
    expect(resolveReportFormat("out/results.XML")).toBe("junit");
    expect(resolveReportFormat("out/results.json")).toBe("json");
    expect(resolveReportFormat("out/results")).toBe("json");
  });

  it("lets an explicit format win", () => {
    expect(resolveReportFormat("results.xml", "json")).toBe("json");
  });
});

describe("writeReport", () => {
  it("creates missing directories", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "mcp-smoke-report-"));
    const reportPath = path.join(tmpDir, "nested", "results.xml");

    await writeReport(sampleReport(), reportPath, "junit");

    const written = fs.readFileSync(reportPath, "utf8");
    expect(written.startsWith('<?xml version="1.0" encoding="utf-8"?>\n<testsuite ')).toBe(true);
  });
});

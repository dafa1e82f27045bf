import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";

import {
  createFakeSession,
  textResult,
  type FakeSessionData,
} from "../__tests__/helpers/fakes.js";
import type { ConnectedSession, ConnectSessionOptions } from "../core/session.js";

import { runCommand } from "./run.js";

const connectMock = vi.hoisted(() =>
  vi.fn<(options: ConnectSessionOptions) => Promise<ConnectedSession>>(),
);

vi.mock("../core/session.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../core/session.js")>()),
  connectMcpSession: (options: ConnectSessionOptions) => connectMock(options),
}));

vi.mock("./signal-handlers.js", () => ({
  createRunStopSignalHandler: () => {
    const controller = new AbortController();
    return {
      signal: controller.signal,
      cleanup: () => undefined,
      isStopped: () => false,
    };
  },
}));

const tempDirs: string[] = [];
const originalUrl = process.env.MCP_HTTP_URL;

beforeEach(() => {
  delete process.env.MCP_HTTP_URL;
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;

  if (originalUrl !== undefined) process.env.MCP_HTTP_URL = originalUrl;
  connectMock.mockReset();
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

// =============================================================================
// HELPERS
// =============================================================================

const CHECKS_ONLY = `
log_dir: logs
builtins:
  list_resources: false
  read_resource: false
  list_prompts: false
checks:
  - name: echo-check
    tool: echo
    expect_contains: [hello]
  - name: after-echo
    tool: echo
    depends_on: [echo-check]
`;

function makeProject(configYaml: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "mcp-smoke-run-"));
  tempDirs.push(dir);
  fs.writeFileSync(path.join(dir, "mcp-smoke.yaml"), configYaml, "utf8");
  return dir;
}

function connectTo(data: FakeSessionData): { close: Mock<() => Promise<void>> } {
  const close = vi.fn<() => Promise<void>>(async () => undefined);
  connectMock.mockImplementation(async (options) => ({
    session: createFakeSession(data),
    server: { name: "fixture-server", version: "1.2.3" },
    endpoint: `${options.url}/mcp`,
    close,
  }));
  return { close };
}

function readLogTypes(logPath: string): string[] {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => {
      const event: unknown = JSON.parse(line);
      return typeof event === "object" && event !== null && "type" in event
        ? String(event.type)
        : "";
    });
}

// =============================================================================
// TESTS
// =============================================================================

describe("runCommand", () => {
  it("runs the configured plugins, writes a JUnit report and returns 1 on failure", async () => {
    const cwd = makeProject(CHECKS_ONLY);
    const { close } = connectTo({
      tools: [{ name: "echo" }],
      toolResults: { echo: textResult("goodbye") },
    });

    const exitStatus = await runCommand({ cwd, output: "results.xml", runId: "run-1" });

    expect(exitStatus).toBe(1);
    expect(connectMock).toHaveBeenCalledWith({ url: "http://localhost:8000", headers: {} });
    expect(close).toHaveBeenCalledOnce();

    const xml = fs.readFileSync(path.join(cwd, "results.xml"), "utf8");
    expect(xml).toContain('<testsuite name="MCP Automated Tests" tests="3" failures="2" ');
    expect(xml).toContain('<property name="transport" value="http" />');
    expect(xml).toContain('<property name="url" value="http://localhost:8000/mcp" />');
    expect(xml).toContain('<failure message="Missing expected content: hello" />');
    expect(xml).toContain('<failure message="skipped — failed dependency: echo-check" />');

    const types = readLogTypes(path.join(cwd, "logs", "run-1.jsonl"));
    expect(types[0]).toBe("run.start");
    expect(types[types.length - 1]).toBe("run.end");
  });

  it("returns 0 and writes JSON when every plugin passes", async () => {
    const cwd = makeProject(CHECKS_ONLY);
    connectTo({ tools: [{ name: "echo" }], toolResults: { echo: textResult("hello there") } });

    const exitStatus = await runCommand({
      cwd,
      url: "http://override.test:9000",
      output: "out/report.json",
      runId: "run-2",
    });

    expect(exitStatus).toBe(0);
    expect(connectMock).toHaveBeenCalledWith({ url: "http://override.test:9000", headers: {} });

    const reportPath = path.join(cwd, "out", "report.json");
    const doc: unknown = JSON.parse(fs.readFileSync(reportPath, "utf8"));
    expect(doc).toMatchObject({
      target: "http://override.test:9000/mcp",
      exitStatus: 0,
      summary: { total: 3, passed: 3, failed: 0, skipped: 0 },
    });
  });

  it("honours --only when selecting plugins", async () => {
    const cwd = makeProject(CHECKS_ONLY);
    connectTo({ tools: [{ name: "echo" }], toolResults: { echo: textResult("hello") } });

    await runCommand({ cwd, only: ["list-*"], output: "r.json", runId: "run-3" });

    const doc: unknown = JSON.parse(fs.readFileSync(path.join(cwd, "r.json"), "utf8"));
    expect(doc).toHaveProperty("tests.length", 1);
    expect(doc).toHaveProperty("tests.0.pluginName", "list-tools");
  });

  it("prints graph warnings with the plugin list before any plugin runs", async () => {
    const cwd = makeProject(`
log_dir: logs
builtins:
  list_resources: false
  read_resource: false
  list_prompts: false
checks:
  - name: echo-check
    tool: echo
    run_after: [ghost]
`);
    connectTo({ tools: [{ name: "echo" }], toolResults: { echo: textResult("hi") } });
    vi.stubEnv("NO_COLOR", "1");
    const lines: string[] = [];
    vi.mocked(console.log).mockImplementation((line: unknown) => {
      lines.push(String(line));
    });

    await runCommand({ cwd, runId: "run-warn" });

    const warningAt = lines.indexOf(
      'Warning: echo-check references unknown soft dependency "ghost" (treated as satisfied)',
    );
    expect(warningAt).toBeGreaterThan(lines.indexOf("Running 2 plugin(s) in order:"));
    expect(warningAt).toBeLessThan(lines.indexOf("  list-tools... PASS"));
    expect(lines.filter((line) => line.startsWith("Warning:"))).toHaveLength(1);
  });

  it("rejects an invalid graph in strict mode before connecting", async () => {
    const cwd = makeProject(`
checks:
  - name: orphan
    tool: echo
    depends_on: [ghost]
`);

    await expect(runCommand({ cwd, strict: true, runId: "run-4" })).rejects.toMatchObject({
      title: "Plugin dependency graph invalid.",
    });
    expect(connectMock).not.toHaveBeenCalled();
  });

  it("fails when no plugin matches the selection", async () => {
    const cwd = makeProject(CHECKS_ONLY);

    await expect(runCommand({ cwd, only: ["nothing-*"] })).rejects.toMatchObject({
      title: "No plugins selected.",
      message: "No plugin name matches nothing-*.",
    });
    expect(connectMock).not.toHaveBeenCalled();
  });

  it("closes the log when the connection fails", async () => {
    const cwd = makeProject(CHECKS_ONLY);
    connectMock.mockRejectedValue(new Error("connection refused"));

    await expect(runCommand({ cwd, runId: "run-5" })).rejects.toThrowError("connection refused");
    expect(fs.existsSync(path.join(cwd, "logs", "run-5.jsonl"))).toBe(true);
  });
});

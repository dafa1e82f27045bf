import { Command, InvalidArgumentError, Option } from "commander";

import { REPORT_FORMATS, type ReportFormat } from "../core/reporter.js";

import { planCommand } from "./plan.js";
import { runCommand } from "./run.js";

type GlobalFlags = {
  config?: string;
  debug?: boolean;
};

type RunFlags = {
  url?: string;
  output?: string;
  format?: ReportFormat;
  timeout?: number;
  strict?: boolean;
  only: string[];
  runId?: string;
};

type PlanFlags = {
  strict?: boolean;
  only: string[];
};

export function buildCli(): Command {
  const program = new Command();

  program
    .name("mcp-smoke")
    .description("Dependency-aware smoke tests for MCP servers")
    .version("0.1.0")
    .option("--config <path>", "Config file (defaults to ./mcp-smoke.yaml when present)")
    .option("--debug", "Show error details and stack traces", false);

  program
    .command("run")
    .description("Connect to a server and run every selected plugin")
    .option("-u, --url <url>", "Server URL (default: config url or $MCP_HTTP_URL)")
    .option("-o, --output <path>", "Write the report to this file")
    .addOption(
      new Option("-f, --format <format>", "Report format (default: from file extension)").choices(
        REPORT_FORMATS,
      ),
    )
    .option("--timeout <ms>", "Default per-plugin timeout in milliseconds", parsePositiveInt)
    .option("--strict", "Reject unknown dependencies and cycles")
    .option("--only <glob>", "Only run plugins whose name matches (repeatable)", collect, [])
    .option("--run-id <id>", "Run ID used for the log file (default: timestamp)")
    .action(async (opts: RunFlags) => {
      const globals = program.opts<GlobalFlags>();
      process.exitCode = await runCommand({
        config: globals.config,
        url: opts.url,
        output: opts.output,
        format: opts.format,
        timeout: opts.timeout,
        strict: opts.strict,
        only: opts.only,
        runId: opts.runId,
        debug: globals.debug,
      });
    });

  program
    .command("plan")
    .description("Print the resolved run order without connecting")
    .option("--strict", "Reject unknown dependencies and cycles")
    .option("--only <glob>", "Only include plugins whose name matches (repeatable)", collect, [])
    .action((opts: PlanFlags) => {
      const globals = program.opts<GlobalFlags>();
      planCommand({ config: globals.config, strict: opts.strict, only: opts.only });
    });

  return program;
}

// =============================================================================
// OPTION PARSERS
// =============================================================================

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

export { buildReport, summarizeOutcomes } from "./core/aggregator.js";
export type { Report, ReportSummary } from "./core/aggregator.js";
export { executePlugins } from "./core/executor.js";
export type {
  ExecutionResult,
  ExecutorHooks,
  ExecutorOptions,
  HookFailure,
} from "./core/executor.js";
export { createOutcome, timedOutcome } from "./core/plugin.js";
export type { Outcome, OutcomeStatus, Plugin, RecordedOutcome } from "./core/plugin.js";
export {
  formatJUnitReport,
  formatJsonReport,
  parseJsonReport,
  writeReport,
} from "./core/reporter.js";
export { resolveRunOrder } from "./core/resolver.js";
export { connectMcpSession } from "./core/session.js";
export type { Session } from "./core/session.js";
export { runSuite } from "./core/suite.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(program: Command): void {
  program.configureOutput({
    outputError: (_message: string, _write: (chunk: string) => void) => undefined,
  });

  program.exitOverride();
}

function isHelpOrVersionExit(error: unknown): boolean {
  if (!(error instanceof CommanderError)) {
    return false;
  }

  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

// Global options are parsed before any subcommand runs, so this is set for action errors.
function resolveDebugEnabled(program: Command): boolean {
  return program.opts<{ debug?: boolean }>().debug === true;
}

function resolveExitCode(error: unknown): number {
  if (error && typeof error === "object" && "exitCode" in error) {
    const exitCode = error.exitCode;
    if (typeof exitCode === "number" && Number.isFinite(exitCode)) {
      return exitCode;
    }
  }

  return 1;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = resolveExitCode(error);
      return;
    }

    const debug = resolveDebugEnabled(program);
    console.error(renderCliError(error, { debug }));
    const exitCode = resolveExitCode(error);
    process.exitCode = exitCode === 0 ? 1 : exitCode;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
  } catch {
    return false;
  }
}

// Allow `node dist/src/index.js` and the npm bin symlink
if (isDirectExecution()) {
  void main(process.argv);
}

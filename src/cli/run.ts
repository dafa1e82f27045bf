import path from "node:path";

import type { ProjectConfig } from "../core/config.js";
import { resolveProjectConfig } from "../core/config-loader.js";
import { resolveColorEnabled } from "../core/error-format.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { JsonlLogger } from "../core/logger.js";
import type { Plugin } from "../core/plugin.js";
import { resolveReportFormat, writeReport, type ReportFormat } from "../core/reporter.js";
import { formatGraphWarnings, resolveRunOrder } from "../core/resolver.js";
import { MCP_TRANSPORT, connectMcpSession, type ConnectedSession } from "../core/session.js";
import { runSuite } from "../core/suite.js";
import { defaultRunId } from "../core/utils.js";
import { createPlugins, selectPlugins } from "../plugins/index.js";

import { ProgressPrinter } from "./progress.js";
import { createRunStopSignalHandler } from "./signal-handlers.js";

// =============================================================================
// TYPES
// =============================================================================

export type SelectionOptions = {
  config?: string;
  strict?: boolean;
  only?: string[];
  cwd?: string;
};

export type RunCommandOptions = SelectionOptions & {
  url?: string;
  output?: string;
  format?: ReportFormat;
  timeout?: number;
  runId?: string;
  /** Adds stack traces to log-write warnings. */
  debug?: boolean;
};

export type RunSelection = {
  config: ProjectConfig;
  configPath: string | null;
  plugins: Plugin[];
};

// =============================================================================
// COMMAND
// =============================================================================

/** Resolves config, builds the plugin list and runs it; returns the exit status. */
export async function runCommand(opts: RunCommandOptions): Promise<number> {
  const { config, plugins } = loadRunSelection(opts);
  const settings = applyRunOverrides(config, opts);

  // Strict graph problems surface before any connection is made.
  const planned = resolveRunOrder(plugins, { strict: settings.strict_dependencies });

  const runId = opts.runId ?? defaultRunId();
  const logPath = path.join(settings.log_dir, `${runId}.jsonl`);
  const logger = new JsonlLogger(logPath, { runId, debug: opts.debug });
  const printer = new ProgressPrinter({
    useColor: resolveColorEnabled({ stream: process.stdout }),
  });
  const stop = createRunStopSignalHandler({
    onSignal: (signal) =>
      printer.line(`Received ${signal}; stopping after the current plugin.`, ["yellow"]),
  });

  let connection: ConnectedSession | undefined;

  try {
    printer.heading("MCP Server - Automated Test Suite");
    printer.line(`Connecting to: ${settings.url}`, ["blue"]);

    connection = await connectMcpSession({ url: settings.url, headers: settings.headers });
    printer.line("Connected to server", ["green"]);
    printer.line(`   Name: ${connection.server.name}`);
    printer.line(`   Version: ${connection.server.version}`);
    printer.line("");
    printer.pluginList(planned.order);
    printer.warnings(formatGraphWarnings(planned));

    const { report, order } = await runSuite(plugins, connection.session, {
      timeoutMs: settings.timeout_ms,
      pluginTimeouts: settings.plugin_timeouts,
      strict: settings.strict_dependencies,
      signal: stop.signal,
      target: connection.endpoint,
      transport: MCP_TRANSPORT,
      events: logger,
      hooks: printer.hooks(),
    });

    printer.summary(report, order.length);

    const reportPath = settings.report.path;
    if (reportPath !== null) {
      const format = resolveReportFormat(reportPath, settings.report.format);
      await writeReport(report, reportPath, format, {
        suiteName: settings.report.suite_name,
        classnamePrefix: settings.report.classname_prefix,
      });
      printer.line("");
      printer.line(`Test results saved to: ${reportPath}`, ["green"]);
    }
    printer.line(`Run log: ${logPath}`, ["dim"]);

    return report.exitStatus;
  } finally {
    stop.cleanup();
    logger.close();
    if (connection) {
      await connection.close();
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function loadRunSelection(opts: SelectionOptions): RunSelection {
  const { config, configPath } = resolveProjectConfig({
    explicitConfigPath: opts.config,
    cwd: opts.cwd,
  });

  const plugins = selectPlugins(createPlugins(config), opts.only ?? []);
  if (plugins.length === 0) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.plugin,
      title: "No plugins selected.",
      message:
        opts.only && opts.only.length > 0
          ? `No plugin name matches ${opts.only.join(", ")}.`
          : "Every built-in is disabled and no checks are configured.",
      hint: "Run `mcp-smoke plan` to list available plugins.",
    });
  }

  return { config, configPath, plugins };
}

export function applyRunOverrides(config: ProjectConfig, opts: RunCommandOptions): ProjectConfig {
  const cwd = opts.cwd ?? process.cwd();

  return {
    ...config,
    url: opts.url ?? config.url,
    timeout_ms: opts.timeout ?? config.timeout_ms,
    strict_dependencies: opts.strict ?? config.strict_dependencies,
    report: {
      ...config.report,
      path: opts.output !== undefined ? path.resolve(cwd, opts.output) : config.report.path,
      format: opts.format ?? config.report.format,
    },
  };
}

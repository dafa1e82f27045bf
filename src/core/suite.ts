import { buildReport, type Report } from "./aggregator.js";
import { formatErrorMessage } from "./error-format.js";
import { executePlugins, type ExecutorHooks } from "./executor.js";
import { logPluginEvent, type EventSink, type JsonObject } from "./logger.js";
import type { Plugin } from "./plugin.js";
import { formatGraphWarnings, resolveRunOrder } from "./resolver.js";
import type { Session } from "./session.js";

// =============================================================================
// TYPES
// =============================================================================

export type SuiteOptions = {
  timeoutMs: number;
  pluginTimeouts?: Readonly<Record<string, number>>;
  strict?: boolean;
  signal?: AbortSignal;
  /** Server URL recorded in the report. */
  target?: string;
  transport?: string;
  events?: EventSink;
  hooks?: ExecutorHooks;
};

export type SuiteResult = {
  report: Report;
  order: Plugin[];
  warnings: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runSuite(
  plugins: readonly Plugin[],
  session: Session,
  options: SuiteOptions,
): Promise<SuiteResult> {
  const events = options.events;
  const resolution = resolveRunOrder(plugins, { strict: options.strict });
  const warnings = formatGraphWarnings(resolution);

  for (const message of warnings) {
    events?.log({ type: "graph.warning", payload: { message } });
  }

  const startPayload: JsonObject = { plugins: resolution.order.map((plugin) => plugin.name) };
  if (options.target !== undefined) startPayload.target = options.target;
  events?.log({ type: "run.start", payload: startPayload });

  const execution = await executePlugins(resolution.order, session, {
    timeoutMs: options.timeoutMs,
    pluginTimeouts: options.pluginTimeouts,
    signal: options.signal,
    hooks: composeHooks(events ? createEventHooks(events) : {}, options.hooks ?? {}),
  });

  for (const failure of execution.hookFailures) {
    events?.log({
      type: "hook.error",
      plugin: failure.plugin,
      payload: { hook: failure.hook, error: failure.error },
    });
  }

  if (execution.cancelled) {
    const cancelPayload: JsonObject = {
      completed: execution.outcomes.length,
      remaining: resolution.order.length - execution.outcomes.length,
    };
    if (execution.cancelReason !== undefined) cancelPayload.reason = execution.cancelReason;
    events?.log({ type: "run.cancel", payload: cancelPayload });
  }

  const report = buildReport(execution.outcomes, {
    cancelled: execution.cancelled,
    cancelReason: execution.cancelReason,
    target: options.target,
    transport: options.transport,
  });

  events?.log({
    type: "run.end",
    payload: {
      total: report.summary.total,
      passed: report.summary.passed,
      failed: report.summary.failed,
      skipped: report.summary.skipped,
      cancelled: report.cancelled,
      exit_status: report.exitStatus,
    },
  });

  return { report, order: resolution.order, warnings };
}

// =============================================================================
// INTERNALS
// =============================================================================

function createEventHooks(events: EventSink): ExecutorHooks {
  return {
    onPluginStart(plugin) {
      logPluginEvent(events, "plugin.start", plugin.name, {
        target_operation: plugin.targetOperation,
      });
    },
    onOutcome(outcome) {
      const payload: JsonObject = {
        status: outcome.status,
        passed: outcome.passed,
        message: outcome.message,
      };
      if (outcome.error !== undefined) payload.error = outcome.error;
      if (outcome.durationMs !== undefined) payload.duration_ms = outcome.durationMs;
      logPluginEvent(events, "plugin.end", outcome.pluginName, payload);
    },
    onLateRejection(plugin, error) {
      logPluginEvent(events, "plugin.late_error", plugin.name, {
        error: formatErrorMessage(error),
      });
    },
  };
}

function composeHooks(...all: ExecutorHooks[]): ExecutorHooks {
  return {
    onPluginStart(plugin) {
      for (const hooks of all) hooks.onPluginStart?.(plugin);
    },
    onOutcome(outcome, plugin) {
      for (const hooks of all) hooks.onOutcome?.(outcome, plugin);
    },
    onLateRejection(plugin, error) {
      for (const hooks of all) hooks.onLateRejection?.(plugin, error);
    },
  };
}

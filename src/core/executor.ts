import { formatErrorMessage, formatZodIssues, normalizeAbortReason } from "./error-format.js";
import {
  OutcomeSchema,
  createOutcome,
  recordOutcome,
  type Outcome,
  type Plugin,
  type RecordedOutcome,
} from "./plugin.js";
import type { Session } from "./session.js";

// =============================================================================
// TYPES
// =============================================================================

export type ExecutorHooks = {
  onPluginStart?(plugin: Plugin): void;
  onOutcome?(outcome: RecordedOutcome, plugin: Plugin): void;
  /** A plugin that already timed out rejected afterwards. */
  onLateRejection?(plugin: Plugin, error: unknown): void;
};

export type ExecutorOptions = {
  /** Default per-plugin budget. */
  timeoutMs: number;
  /** Per-plugin budgets by name; these win over a plugin's own `timeoutMs`. */
  pluginTimeouts?: Readonly<Record<string, number>>;
  /** Checked between plugins only; a running plugin is never interrupted. */
  signal?: AbortSignal;
  hooks?: ExecutorHooks;
};

/** A hook call that threw; the run carries on without it. */
export type HookFailure = {
  hook: keyof ExecutorHooks;
  plugin: string;
  error: string;
};

export type ExecutionResult = {
  outcomes: RecordedOutcome[];
  cancelled: boolean;
  cancelReason?: string;
  /** A late-rejection hook that throws is appended after the result is returned. */
  hookFailures: HookFailure[];
};

export const SKIPPED_MESSAGE_PREFIX = "skipped — failed dependency: ";
export const TIMED_OUT_MESSAGE = "timed out";
export const FAULT_MESSAGE = "Unexpected exception during test";
export const INVALID_OUTCOME_PREFIX = "Plugin returned an invalid outcome: ";

const TIMED_OUT = Symbol("timed-out");

type StopController = {
  readonly reason: { signal?: string } | null;
  cleanup(): void;
};

// =============================================================================
// EXECUTOR
// =============================================================================

/**
 * Runs plugins one at a time in the given order, producing one outcome each.
 *
 * A plugin whose hard dependency failed or was skipped is skipped without
 * being invoked. Faults, timeouts and malformed results become failed
 * outcomes, and a throwing hook is recorded in `hookFailures`; neither stops
 * the run. Only `signal` ends it early.
 */
export async function executePlugins(
  order: readonly Plugin[],
  session: Session,
  options: ExecutorOptions,
): Promise<ExecutionResult> {
  const failed = new Set<string>();
  const outcomes: RecordedOutcome[] = [];
  const stop = buildStopController(options.signal);
  const hooks = options.hooks ?? {};
  const hookFailures: HookFailure[] = [];

  const callHook = (hook: keyof ExecutorHooks, plugin: Plugin, call: () => void): void => {
    try {
      call();
    } catch (err) {
      hookFailures.push({ hook, plugin: plugin.name, error: formatErrorMessage(err) });
    }
  };

  try {
    for (const plugin of order) {
      if (stop.reason) {
        return { outcomes, cancelled: true, cancelReason: stop.reason.signal, hookFailures };
      }

      const failedDeps = failedDependencies(plugin, failed);
      let outcome: RecordedOutcome;

      if (failedDeps.length > 0) {
        outcome = recordOutcome(
          createOutcome(plugin, {
            passed: false,
            message: `${SKIPPED_MESSAGE_PREFIX}${failedDeps.join(", ")}`,
          }),
          "skipped",
        );
      } else {
        callHook("onPluginStart", plugin, () => hooks.onPluginStart?.(plugin));
        const timeoutMs = resolveTimeout(plugin, options);
        const onLateRejection = (err: unknown): void =>
          callHook("onLateRejection", plugin, () => hooks.onLateRejection?.(plugin, err));
        outcome = recordOutcome(
          await invokeWithTimeout(plugin, session, timeoutMs, onLateRejection),
        );
      }

      if (!outcome.passed) {
        failed.add(plugin.name);
      }

      outcomes.push(outcome);
      callHook("onOutcome", plugin, () => hooks.onOutcome?.(outcome, plugin));
    }
  } finally {
    stop.cleanup();
  }

  return { outcomes, cancelled: false, hookFailures };
}

export function resolveTimeout(
  plugin: Pick<Plugin, "name" | "timeoutMs">,
  options: Pick<ExecutorOptions, "timeoutMs" | "pluginTimeouts">,
): number {
  const overrides = options.pluginTimeouts;
  // Own keys only: names such as "constructor" must not hit Object.prototype.
  const override =
    overrides !== undefined && Object.hasOwn(overrides, plugin.name)
      ? overrides[plugin.name]
      : undefined;
  return override ?? plugin.timeoutMs ?? options.timeoutMs;
}

// =============================================================================
// INTERNALS
// =============================================================================

function failedDependencies(plugin: Plugin, failed: ReadonlySet<string>): string[] {
  return [...new Set(plugin.hardDeps)].filter((dep) => failed.has(dep));
}

async function invokeWithTimeout(
  plugin: Plugin,
  session: Session,
  timeoutMs: number,
  onLateRejection: (err: unknown) => void,
): Promise<Outcome> {
  const startedAt = performance.now();
  const elapsed = (): number => performance.now() - startedAt;

  let timer: NodeJS.Timeout | undefined;
  const invocation = Promise.resolve().then(() => plugin.run(session));
  const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
  });

  try {
    const result = await Promise.race([invocation, deadline]);
    if (result === TIMED_OUT) {
      void invocation.catch(onLateRejection);
      return createOutcome(plugin, {
        passed: false,
        message: TIMED_OUT_MESSAGE,
        error: `No result within ${timeoutMs}ms`,
        durationMs: elapsed(),
      });
    }

    const checked = OutcomeSchema.safeParse(result);
    if (!checked.success) {
      return createOutcome(plugin, {
        passed: false,
        message: FAULT_MESSAGE,
        error: `${INVALID_OUTCOME_PREFIX}${formatZodIssues(checked.error.issues, "; ")}`,
        durationMs: elapsed(),
      });
    }
    return result;
  } catch (err) {
    return createOutcome(plugin, {
      passed: false,
      message: FAULT_MESSAGE,
      error: formatErrorMessage(err),
      durationMs: elapsed(),
    });
  } finally {
    clearTimeout(timer);
  }
}

function buildStopController(signal?: AbortSignal): StopController {
  let reason: { signal?: string } | null = null;

  const onAbort = (): void => {
    if (reason) return;
    reason = { signal: normalizeAbortReason(signal?.reason) };
  };

  if (signal) {
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort);
    }
  }

  return {
    get reason() {
      return reason;
    },
    cleanup() {
      if (signal) {
        signal.removeEventListener("abort", onAbort);
      }
    },
  };
}

import { z } from "zod";

import type { Session } from "./session.js";

// =============================================================================
// TYPES
// =============================================================================

/** Pass/fail record for a single plugin in a single run. */
export type Outcome = Readonly<{
  pluginName: string;
  targetOperation: string;
  passed: boolean;
  message: string;
  error?: string;
  durationMs?: number;
}>;

/** What a plugin's `run` must resolve to; checked at the executor boundary. */
export const OutcomeSchema = z.object({
  pluginName: z.string(),
  targetOperation: z.string(),
  passed: z.boolean(),
  message: z.string(),
  error: z.string().optional(),
  durationMs: z.number().optional(),
});

export type OutcomeStatus = "passed" | "failed" | "skipped";

/** An Outcome as the executor recorded it, with the terminal state it reached. */
export type RecordedOutcome = Outcome & Readonly<{ status: OutcomeStatus }>;

/**
 * A named test unit bound to one operation of the server under test.
 *
 * `hardDeps` must pass before this plugin runs; a failure there skips it.
 * `softOrder` only moves this plugin after the named ones.
 */
export interface Plugin {
  readonly name: string;
  readonly targetOperation: string;
  readonly description: string;
  readonly hardDeps: readonly string[];
  readonly softOrder: readonly string[];
  /** Overrides the run's default per-plugin timeout. */
  readonly timeoutMs?: number;
  run(session: Session): Promise<Outcome>;
}

// =============================================================================
// HELPERS
// =============================================================================

export type OutcomeFields = {
  passed: boolean;
  message: string;
  error?: string;
  durationMs?: number;
};

export function createOutcome(
  plugin: Pick<Plugin, "name" | "targetOperation">,
  fields: OutcomeFields,
): Outcome {
  const outcome: {
    pluginName: string;
    targetOperation: string;
    passed: boolean;
    message: string;
    error?: string;
    durationMs?: number;
  } = {
    pluginName: plugin.name,
    targetOperation: plugin.targetOperation,
    passed: fields.passed,
    message: fields.message,
  };

  if (fields.error !== undefined) outcome.error = fields.error;
  if (fields.durationMs !== undefined) outcome.durationMs = fields.durationMs;

  return Object.freeze(outcome);
}

export function recordOutcome(outcome: Outcome, status?: OutcomeStatus): RecordedOutcome {
  return Object.freeze({
    ...outcome,
    status: status ?? (outcome.passed ? "passed" : "failed"),
  });
}

/**
 * Runs `body` and stamps the elapsed time on whatever Outcome it produces.
 * A thrown error becomes a failed Outcome with `failureMessage`.
 */
export async function timedOutcome(
  plugin: Pick<Plugin, "name" | "targetOperation">,
  failureMessage: string,
  body: () => Promise<Omit<OutcomeFields, "durationMs">>,
): Promise<Outcome> {
  const startedAt = performance.now();

  try {
    const fields = await body();
    return createOutcome(plugin, { ...fields, durationMs: performance.now() - startedAt });
  } catch (err) {
    return createOutcome(plugin, {
      passed: false,
      message: failureMessage,
      error: err instanceof Error ? err.message : String(err),
      durationMs: performance.now() - startedAt,
    });
  }
}

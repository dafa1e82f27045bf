import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type RunEventType =
  | "graph.warning"
  | "run.start"
  | "plugin.start"
  | "plugin.end"
  | "plugin.late_error"
  | "hook.error"
  | "run.cancel"
  | "run.end";

/** One line of a run log. */
export type LogEvent = {
  ts: string;
  type: RunEventType;
  run_id: string;
  plugin?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: RunEventType;
  plugin?: string;
  payload?: JsonObject;
};

/** Anything that can receive run events; the suite runner only needs this much. */
export type EventSink = {
  log(event: LogEventInput): void;
};

export type JsonlLoggerOptions = {
  runId: string;
  /** Append stack traces to failure warnings. */
  debug?: boolean;
  warn?: (message: string) => void;
};

// =============================================================================
// LOGGER
// =============================================================================

/**
 * Appends run events to a JSON-lines file, one event per line.
 *
 * Logging never fails a run: the first write error is warned about, later
 * ones are only counted, and `close()` reports how many events were lost.
 */
export class JsonlLogger implements EventSink {
  readonly runId: string;
  private readonly fd: number;
  private readonly debug: boolean;
  private readonly warn: (message: string) => void;
  private dropped = 0;
  private closed = false;

  constructor(
    public readonly filePath: string,
    options: JsonlLoggerOptions,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fd = fs.openSync(filePath, "a");
    this.runId = options.runId;
    this.debug = options.debug ?? false;
    this.warn = options.warn ?? ((message) => console.warn(message));
  }

  log(event: LogEventInput): void {
    if (this.closed) return;

    try {
      fs.writeSync(this.fd, `${JSON.stringify(toLogEvent(event, this.runId))}\n`);
    } catch (err) {
      this.dropped += 1;
      if (this.dropped === 1) {
        this.warn(this.describeFailure(`could not write run events to ${this.filePath}`, err));
      }
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    if (this.dropped > 0) {
      this.warn(`Warning: ${this.dropped} run event(s) missing from ${this.filePath}`);
    }

    try {
      fs.closeSync(this.fd);
    } catch (err) {
      this.warn(this.describeFailure(`could not close ${this.filePath}`, err));
    }
  }

  private describeFailure(action: string, error: unknown): string {
    const message = `Warning: ${action}: ${formatErrorMessage(error)}`;
    const stack = error instanceof Error ? error.stack : undefined;
    return this.debug && stack ? `${message}\n${stack}` : message;
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function toLogEvent(event: LogEventInput, runId: string, at: Date = new Date()): LogEvent {
  const result: LogEvent = { ts: at.toISOString(), type: event.type, run_id: runId };

  if (event.plugin !== undefined) {
    result.plugin = event.plugin;
  }
  if (event.payload && Object.keys(event.payload).length > 0) {
    result.payload = event.payload;
  }

  return result;
}

export function logPluginEvent(
  sink: EventSink,
  type: Extract<RunEventType, `plugin.${string}`>,
  plugin: string,
  payload: JsonObject = {},
): void {
  sink.log({ type, plugin, payload });
}

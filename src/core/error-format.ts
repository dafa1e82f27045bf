/*
Purpose: shared error formatting helpers for logs, outcomes and CLI output.
Assumptions: callers only need string representations; color is opt-in.
Usage: formatErrorMessage(err), formatErrorLines(err, { mode: "debug" }).
*/

import type { ZodIssue } from "zod";

import {
  ConfigError,
  PluginGraphError,
  ReportError,
  SessionError,
  SmokeError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type UserFacingErrorCode,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "green" | "yellow" | "blue" | "cyan" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

type SmokeErrorDescription = {
  code: UserFacingErrorCode;
  title: string;
  hint?: string;
};

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  green: [32, 39],
  yellow: [33, 39],
  blue: [34, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function normalizeAbortReason(reason: unknown): string | undefined {
  if (reason === undefined || reason === null) return undefined;
  if (typeof reason === "string") return reason;
  if (reason instanceof Error) return reason.message;

  if (typeof reason === "object") {
    if ("signal" in reason && typeof reason.signal === "string") return reason.signal;
    if ("type" in reason && typeof reason.type === "string") return reason.type;
  }

  return String(reason);
}

export function formatZodIssues(issues: readonly ZodIssue[], separator = "\n"): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        const received = JSON.stringify(issue.received);
        return `${location}: Expected one of ${options}, received ${received}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join(separator);
}

// =============================================================================
// LINES
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];
  const debug = options.mode === "debug";

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
    if (debug) {
      lines.push({ kind: "code", text: error.code });
    }
  } else if (error instanceof SmokeError) {
    const description = describeSmokeError(error);
    lines.push({ kind: "title", text: description.title });
    lines.push({ kind: "message", text: error.message });
    if (description.hint) lines.push({ kind: "hint", text: description.hint });
    if (debug) {
      lines.push({ kind: "code", text: description.code });
    }
  } else {
    lines.push({ kind: "title", text: resolveTitle(error) });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
  }

  if (!debug) {
    return lines;
  }

  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });
  }

  const cause = resolveCause(error);
  if (cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(cause) });
  }

  if (error instanceof Error && error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(input: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (input.useColor === false) return false;
  if (!input.stream?.isTTY) return false;
  if (process.env.NO_COLOR !== undefined) return false;
  return true;
}

export function createAnsiFormatter(useColor: boolean): AnsiFormatter {
  if (!useColor) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function describeSmokeError(error: SmokeError): SmokeErrorDescription {
  if (error instanceof ConfigError) {
    return {
      code: USER_FACING_ERROR_CODES.config,
      title: "Invalid configuration.",
      hint: "Run `mcp-smoke plan` to check the config without connecting.",
    };
  }
  if (error instanceof SessionError) {
    return {
      code: USER_FACING_ERROR_CODES.session,
      title: "MCP session failed.",
      hint: "Check that the server is running and the URL points at its MCP endpoint.",
    };
  }
  if (error instanceof PluginGraphError) {
    return {
      code: USER_FACING_ERROR_CODES.plugin,
      title: "Plugin dependency graph invalid.",
    };
  }
  if (error instanceof ReportError) {
    return {
      code: USER_FACING_ERROR_CODES.report,
      title: "Report unreadable.",
      hint: "Reports are read back from the JSON format only.",
    };
  }
  return { code: USER_FACING_ERROR_CODES.unknown, title: "Smoke run failed." };
}

function resolveTitle(error: unknown): string {
  if (error instanceof Error && error.name && error.name !== "Error") {
    return `${error.name}.`;
  }
  return "Unexpected error.";
}

function resolveCause(error: unknown): unknown {
  if (error && typeof error === "object" && "cause" in error) {
    return error.cause ?? undefined;
  }
  return undefined;
}

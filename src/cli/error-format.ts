/*
Purpose: render a failed mcp-smoke invocation for stderr.
Assumptions: command-line mistakes arrive as CommanderError; everything else goes
  through the shared line formatter.
Usage: console.error(renderCliError(err, { debug }));
*/

import { CommanderError } from "commander";

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LineStyle = {
  label?: string;
  labelStyles: AnsiStyle[];
  textStyles: AnsiStyle[];
};

const LINE_STYLES: Record<Exclude<ErrorFormatLineKind, "stack">, LineStyle> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  message: { labelStyles: [], textStyles: [] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
};

const USAGE_HINT = "Run `mcp-smoke --help` for usage.";

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const debug = options.debug ?? false;
  const lines =
    error instanceof CommanderError
      ? commandLineErrorLines(error, debug)
      : formatErrorLines(error, { mode: debug ? "debug" : "short" });

  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));

  return lines.map((line) => renderLine(line, format)).join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function commandLineErrorLines(error: CommanderError, debug: boolean): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [
    { kind: "title", text: "Invalid command line." },
    { kind: "message", text: error.message.replace(/^error:\s*/, "") },
    { kind: "hint", text: USAGE_HINT },
  ];
  if (debug) lines.push({ kind: "code", text: error.code });
  return lines;
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  if (line.kind === "stack") {
    return `${format("Stack:", ["dim"])}\n${format(indentLines(line.text), ["dim"])}`;
  }

  const style = LINE_STYLES[line.kind];
  // Multi-line messages (config issues, graph problems) keep their detail lines indented.
  const body = line.kind === "message" ? indentContinuation(line.text) : line.text;
  const text = format(body, style.textStyles);

  return style.label ? `${format(style.label, style.labelStyles)} ${text}` : text;
}

function indentLines(value: string): string {
  return value
    .split("\n")
    .map((line) => `  ${line}`)
    .join("\n");
}

function indentContinuation(value: string): string {
  const [first = "", ...rest] = value.split("\n");
  return rest.length === 0 ? first : `${first}\n${indentLines(rest.join("\n"))}`;
}

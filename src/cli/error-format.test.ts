import { CommanderError } from "commander";
import { describe, expect, it } from "vitest";

import {
  ConfigError,
  PluginGraphError,
  ReportError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";

import { renderCliError } from "./error-format.js";

// =============================================================================
// HELPERS
// =============================================================================

const nonTtyStream = { isTTY: false };

function buildUserFacingError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config missing.",
    message: "Config file not found at /tmp/mcp-smoke.yaml.",
    hint: "Create mcp-smoke.yaml or pass --config <path>.",
    next: "Run mcp-smoke plan to check the result.",
  });
}

// =============================================================================
// TESTS
// =============================================================================

describe("renderCliError", () => {
  it("renders user-facing errors in short mode without stack output", () => {
    const output = renderCliError(buildUserFacingError(), { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Config missing.",
        "Config file not found at /tmp/mcp-smoke.yaml.",
        "Hint: Create mcp-smoke.yaml or pass --config <path>.",
        "Next: Run mcp-smoke plan to check the result.",
      ].join("\n"),
    );
  });

  it("includes debug details and stack output when debug is enabled", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.session,
      title: "Failed to connect to server.",
      message: "Could not open an MCP session at http://localhost:8000/mcp.",
      cause: new Error("ECONNREFUSED"),
    });
    error.stack = "UserFacingError: Could not open an MCP session\nat fake:1:1";

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Failed to connect to server.",
        "Could not open an MCP session at http://localhost:8000/mcp.",
        "Code: SESSION_ERROR",
        "Name: UserFacingError",
        "Cause: ECONNREFUSED",
        "Stack:",
        "  UserFacingError: Could not open an MCP session",
        "  at fake:1:1",
      ].join("\n"),
    );
  });

  it("titles smoke errors by their kind and falls back for plain errors", () => {
    expect(renderCliError(new ConfigError("bad value"), { stream: nonTtyStream })).toBe(
      [
        "Error: Invalid configuration.",
        "bad value",
        "Hint: Run `mcp-smoke plan` to check the config without connecting.",
      ].join("\n"),
    );
    expect(renderCliError(new Error("plain"), { stream: nonTtyStream })).toBe(
      "Error: Unexpected error.\nplain",
    );
  });

  it("indents the detail lines of a multi-line message", () => {
    const error = new PluginGraphError(
      "Found 2 dependency problem(s):\n- dependency cycle A -> B -> A\n- C references ghost",
    );

    expect(renderCliError(error, { stream: nonTtyStream })).toBe(
      [
        "Error: Plugin dependency graph invalid.",
        "Found 2 dependency problem(s):",
        "  - dependency cycle A -> B -> A",
        "  - C references ghost",
      ].join("\n"),
    );
  });

  it("adds the error code and cause of a smoke error in debug mode", () => {
    const error = new ReportError("Report is not valid JSON.", new Error("Unexpected token"));
    error.stack = "ReportError: Report is not valid JSON.\nat fake:1:1";

    expect(renderCliError(error, { debug: true, stream: nonTtyStream })).toBe(
      [
        "Error: Report unreadable.",
        "Report is not valid JSON.",
        "Hint: Reports are read back from the JSON format only.",
        "Code: REPORT_ERROR",
        "Name: ReportError",
        "Cause: Unexpected token",
        "Stack:",
        "  ReportError: Report is not valid JSON.",
        "  at fake:1:1",
      ].join("\n"),
    );
  });

  it("renders command-line mistakes with a usage hint", () => {
    const error = new CommanderError(
      1,
      "commander.invalidArgument",
      "error: option '--timeout <ms>' argument '0' is invalid. Expected a positive integer.",
    );

    expect(renderCliError(error, { debug: true, stream: nonTtyStream })).toBe(
      [
        "Error: Invalid command line.",
        "option '--timeout <ms>' argument '0' is invalid. Expected a positive integer.",
        "Hint: Run `mcp-smoke --help` for usage.",
        "Code: commander.invalidArgument",
      ].join("\n"),
    );
  });

  it("disables color for non-TTY output even when useColor is true", () => {
    const output = renderCliError(buildUserFacingError(), {
      stream: nonTtyStream,
      useColor: true,
    });

    expect(output).toContain("Error: Config missing.");
    expect(output).not.toContain("\x1b[");
  });

  it("colors TTY output", () => {
    const previous = process.env.NO_COLOR;
    delete process.env.NO_COLOR;

    try {
      const output = renderCliError(new Error("plain"), { stream: { isTTY: true } });

      expect(output.split("\n")[0]).toBe(
        "\x1b[1m\x1b[31mError:\x1b[39m\x1b[22m \x1b[1mUnexpected error.\x1b[22m",
      );
    } finally {
      if (previous !== undefined) process.env.NO_COLOR = previous;
    }
  });
});

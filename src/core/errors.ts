export class SmokeError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "SmokeError";
  }
}

export class ConfigError extends SmokeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class SessionError extends SmokeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "SessionError";
  }
}

export class PluginGraphError extends SmokeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "PluginGraphError";
  }
}

export class ReportError extends SmokeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ReportError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  session: "SESSION_ERROR",
  plugin: "PLUGIN_ERROR",
  report: "REPORT_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";

import { DEFAULT_CONFIG_FILENAME, ProjectConfigSchema, type ProjectConfig } from "./config.js";
import { formatZodIssues } from "./error-format.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

export const URL_ENV_VAR = "MCP_HTTP_URL";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ` +
            `${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [
        key,
        expandEnv(entry, { ...ctx, trail: [...ctx.trail, key] }),
      ]),
    );
  }

  return value;
}

// =============================================================================
// CONFIG NORMALIZATION
// =============================================================================

function applyUrlDefault(doc: unknown): unknown {
  const envUrl = process.env[URL_ENV_VAR];
  if (doc === null || doc === undefined) {
    return envUrl ? { url: envUrl } : {};
  }
  if (!isPlainObject(doc) || "url" in doc || !envUrl) {
    return doc;
  }
  return { ...doc, url: envUrl };
}

function resolveRelativePaths(config: ProjectConfig, baseDir: string): ProjectConfig {
  return {
    ...config,
    log_dir: path.resolve(baseDir, config.log_dir),
    report: {
      ...config.report,
      path: config.report.path === null ? null : path.resolve(baseDir, config.report.path),
    },
  };
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = `Create ${DEFAULT_CONFIG_FILENAME} or pass --config <path>.`;
const INVALID_CONFIG_HINT = "Fix the config file and rerun.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const mark: unknown = error.mark;
  if (!isPlainObject(mark)) {
    return null;
  }

  const { line, column } = mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config missing.",
    message: `Config file not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config invalid.",
    message: `Config at ${configPath} is invalid.`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown, configPath: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(configPath, error);
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseProjectConfig(doc: unknown, source: string, baseDir: string): ProjectConfig {
  const expanded = expandEnv(doc, { file: source, trail: [] });
  const defaultsApplied = applyUrlDefault(expanded);

  const parsed = ProjectConfigSchema.safeParse(defaultsApplied);
  if (!parsed.success) {
    const details = formatZodIssues(parsed.error.issues);
    throw new ConfigError(`Invalid config at ${source}:\n${details}`, parsed.error);
  }

  return resolveRelativePaths(parsed.data, baseDir);
}

export function loadProjectConfig(configPath: string): ProjectConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read config at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(
        `Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`,
        err,
      );
    }

    return parseProjectConfig(doc, absolutePath, path.dirname(absolutePath));
  } catch (err) {
    throwNormalizedConfigError(err, absolutePath);
  }
}

export type ResolvedConfig = {
  config: ProjectConfig;
  /** Null when no file was found and defaults were used. */
  configPath: string | null;
};

/**
 * An explicit path must exist; otherwise `mcp-smoke.yaml` in `cwd` is used
 * when present, and built-in defaults when not.
 */
export function resolveProjectConfig(input: {
  explicitConfigPath?: string;
  cwd?: string;
}): ResolvedConfig {
  const cwd = input.cwd ?? process.cwd();

  if (input.explicitConfigPath) {
    const configPath = path.resolve(cwd, input.explicitConfigPath);
    return { config: loadProjectConfig(configPath), configPath };
  }

  const discovered = path.join(cwd, DEFAULT_CONFIG_FILENAME);
  if (fs.existsSync(discovered)) {
    return { config: loadProjectConfig(discovered), configPath: discovered };
  }

  try {
    return { config: parseProjectConfig({}, "<defaults>", cwd), configPath: null };
  } catch (err) {
    throwNormalizedConfigError(err, "<defaults>");
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

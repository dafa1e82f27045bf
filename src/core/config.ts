import { z } from "zod";

import { DEFAULT_CLASSNAME_PREFIX, DEFAULT_SUITE_NAME, REPORT_FORMATS } from "./reporter.js";

export const DEFAULT_URL = "http://localhost:8000";
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_LOG_DIR = ".mcp-smoke/logs";
export const DEFAULT_CONFIG_FILENAME = "mcp-smoke.yaml";

const ReportSchema = z
  .object({
    path: z.string().min(1).nullable().default(null),
    format: z.enum(REPORT_FORMATS).optional(),
    suite_name: z.string().min(1).default(DEFAULT_SUITE_NAME),
    classname_prefix: z.string().min(1).default(DEFAULT_CLASSNAME_PREFIX),
  })
  .strict();

const BuiltinsSchema = z
  .object({
    list_tools: z.boolean().default(true),
    list_resources: z.boolean().default(true),
    read_resource: z.boolean().default(true),
    list_prompts: z.boolean().default(true),
  })
  .strict();

// A tool call with optional expectations on the returned text.
export const ToolCheckSchema = z
  .object({
    name: z.string().min(1),
    tool: z.string().min(1),
    description: z.string().optional(),
    arguments: z.record(z.unknown()).default({}),
    expect_contains: z.array(z.string()).default([]),
    // Succeed only when the server flags the result as an error.
    expect_error: z.boolean().default(false),
    depends_on: z.array(z.string().min(1)).default([]),
    run_after: z.array(z.string().min(1)).default([]),
    timeout_ms: z.number().int().positive().optional(),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    url: z.string().min(1).default(DEFAULT_URL),
    headers: z.record(z.string()).default({}),

    timeout_ms: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
    plugin_timeouts: z.record(z.number().int().positive()).default({}),

    strict_dependencies: z.boolean().default(false),

    log_dir: z.string().min(1).default(DEFAULT_LOG_DIR),

    report: ReportSchema.default({}),
    builtins: BuiltinsSchema.default({}),
    checks: z.array(ToolCheckSchema).default([]),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type ToolCheckConfig = z.infer<typeof ToolCheckSchema>;
export type BuiltinsConfig = z.infer<typeof BuiltinsSchema>;

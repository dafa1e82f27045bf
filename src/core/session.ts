/*
Purpose: the capability handle plugins use to talk to the server under test.
Assumptions: one session per run; plugins share it sequentially.
Usage: const { session, close } = await connectMcpSession({ url });
*/

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { z } from "zod";

import { formatErrorMessage } from "./error-format.js";
import { SessionError, USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

// =============================================================================
// RESULT SHAPES
// =============================================================================

const ContentBlockSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
});

export const ToolCallResultSchema = z.object({
  content: z.array(ContentBlockSchema).default([]),
  isError: z.boolean().optional(),
});

const ToolSummarySchema = z.object({
  name: z.string(),
  description: z.string().optional(),
});

const ResourceSummarySchema = z.object({
  uri: z.string(),
  name: z.string().optional(),
  description: z.string().optional(),
  mimeType: z.string().optional(),
});

const ResourceContentSchema = z.object({
  uri: z.string(),
  mimeType: z.string().optional(),
  text: z.string().optional(),
  blob: z.string().optional(),
});

const PromptSummarySchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  arguments: z
    .array(z.object({ name: z.string(), required: z.boolean().optional() }))
    .optional(),
});

const ListToolsSchema = z.object({ tools: z.array(ToolSummarySchema) });
const ListResourcesSchema = z.object({ resources: z.array(ResourceSummarySchema) });
const ReadResourceSchema = z.object({ contents: z.array(ResourceContentSchema) });
const ListPromptsSchema = z.object({ prompts: z.array(PromptSummarySchema) });

export type ContentBlock = z.infer<typeof ContentBlockSchema>;
export type ToolCallResult = z.infer<typeof ToolCallResultSchema>;
export type ToolSummary = z.infer<typeof ToolSummarySchema>;
export type ResourceSummary = z.infer<typeof ResourceSummarySchema>;
export type ResourceContent = z.infer<typeof ResourceContentSchema>;
export type PromptSummary = z.infer<typeof PromptSummarySchema>;

// =============================================================================
// SESSION CONTRACT
// =============================================================================

export interface Session {
  callTool(name: string, args?: Record<string, unknown>): Promise<ToolCallResult>;
  listTools(): Promise<ToolSummary[]>;
  listResources(): Promise<ResourceSummary[]>;
  readResource(uri: string): Promise<ResourceContent[]>;
  listPrompts(): Promise<PromptSummary[]>;
}

/** Recorded in reports; sessions always use streamable HTTP. */
export const MCP_TRANSPORT = "http";

export type ServerInfo = {
  name: string;
  version: string;
};

export type ConnectedSession = {
  session: Session;
  server: ServerInfo;
  endpoint: string;
  close(): Promise<void>;
};

export type ConnectSessionOptions = {
  url: string;
  headers?: Record<string, string>;
  clientName?: string;
  clientVersion?: string;
};

// =============================================================================
// MCP ADAPTER
// =============================================================================

export class McpSession implements Session {
  constructor(private readonly client: Client) {}

  async callTool(name: string, args: Record<string, unknown> = {}): Promise<ToolCallResult> {
    const raw = await this.client.callTool({ name, arguments: args });
    return parseResult(ToolCallResultSchema, raw, `tools/call ${name}`);
  }

  async listTools(): Promise<ToolSummary[]> {
    const raw = await this.client.listTools();
    return parseResult(ListToolsSchema, raw, "tools/list").tools;
  }

  async listResources(): Promise<ResourceSummary[]> {
    const raw = await this.client.listResources();
    return parseResult(ListResourcesSchema, raw, "resources/list").resources;
  }

  async readResource(uri: string): Promise<ResourceContent[]> {
    const raw = await this.client.readResource({ uri });
    return parseResult(ReadResourceSchema, raw, `resources/read ${uri}`).contents;
  }

  async listPrompts(): Promise<PromptSummary[]> {
    const raw = await this.client.listPrompts();
    return parseResult(ListPromptsSchema, raw, "prompts/list").prompts;
  }
}

export function resolveMcpEndpoint(url: string): string {
  const trimmed = url.trim();
  if (trimmed.endsWith("/mcp") || trimmed.endsWith("/mcp/")) {
    return trimmed;
  }
  return `${trimmed.replace(/\/+$/, "")}/mcp`;
}

export async function connectMcpSession(options: ConnectSessionOptions): Promise<ConnectedSession> {
  const endpoint = resolveMcpEndpoint(options.url);

  let endpointUrl: URL;
  try {
    endpointUrl = new URL(endpoint);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Invalid server URL.",
      message: `"${options.url}" is not a valid URL.`,
      hint: "Pass --url http://host:port or set url in the config file.",
      cause: err,
    });
  }

  const client = new Client({
    name: options.clientName ?? "mcp-smoke",
    version: options.clientVersion ?? "0.1.0",
  });
  const transport = new StreamableHTTPClientTransport(endpointUrl, {
    requestInit: { headers: options.headers ?? {} },
  });

  try {
    await client.connect(transport);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.session,
      title: "Failed to connect to server.",
      message: `Could not open an MCP session at ${endpoint}.`,
      hint: "Check that the server is running and reachable, then rerun with --debug for details.",
      cause: new SessionError(formatErrorMessage(err), err),
    });
  }

  const version = client.getServerVersion();

  return {
    session: new McpSession(client),
    server: { name: version?.name ?? "unknown", version: version?.version ?? "unknown" },
    endpoint,
    close: () => client.close(),
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseResult<T extends z.ZodTypeAny>(schema: T, raw: unknown, label: string): z.output<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new SessionError(`Unexpected ${label} response: ${detail}`, parsed.error);
  }
  return parsed.data;
}

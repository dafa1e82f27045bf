import { minimatch } from "minimatch";

import type { ProjectConfig } from "../core/config.js";
import type { Plugin } from "../core/plugin.js";

import { ListPromptsPlugin } from "./list-prompts.js";
import { ListResourcesPlugin } from "./list-resources.js";
import { ListToolsPlugin } from "./list-tools.js";
import { ReadResourcePlugin } from "./read-resource.js";
import { ToolCheckPlugin } from "./tool-check.js";

export { BUILTIN_PLUGIN_NAMES } from "./names.js";
export {
  ListPromptsPlugin,
  ListResourcesPlugin,
  ListToolsPlugin,
  ReadResourcePlugin,
  ToolCheckPlugin,
};

/**
 * The explicit plugin list for a run: enabled built-ins first, then one
 * tool check per `checks` entry, in config order.
 */
export function createPlugins(config: Pick<ProjectConfig, "builtins" | "checks">): Plugin[] {
  const plugins: Plugin[] = [];
  const { builtins } = config;

  if (builtins.list_tools) {
    const expectedTools = [...new Set(config.checks.map((check) => check.tool))];
    plugins.push(new ListToolsPlugin(expectedTools));
  }
  if (builtins.list_resources) {
    plugins.push(new ListResourcesPlugin());
  }
  if (builtins.read_resource) {
    plugins.push(new ReadResourcePlugin({ gateOnListing: builtins.list_resources }));
  }
  if (builtins.list_prompts) {
    plugins.push(new ListPromptsPlugin());
  }

  for (const check of config.checks) {
    plugins.push(new ToolCheckPlugin(check));
  }

  return plugins;
}

/** Keeps plugins whose name matches any of the glob patterns; no patterns keeps all. */
export function selectPlugins<P extends Pick<Plugin, "name">>(
  plugins: readonly P[],
  patterns: readonly string[],
): P[] {
  if (patterns.length === 0) {
    return [...plugins];
  }
  return plugins.filter((plugin) => patterns.some((pattern) => minimatch(plugin.name, pattern)));
}

export const BUILTIN_PLUGIN_NAMES = {
  listTools: "list-tools",
  listResources: "list-resources",
  readResource: "read-resource",
  listPrompts: "list-prompts",
} as const;

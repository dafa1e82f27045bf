import { PluginGraphError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import type { Plugin } from "./plugin.js";

// =============================================================================
// TYPES
// =============================================================================

export type GraphNode = Pick<Plugin, "name" | "hardDeps" | "softOrder">;

export type DependencyKind = "hard" | "soft";

export type DependencyEdge = {
  reference: string;
  kind: DependencyKind;
};

export type UnknownReference = {
  plugin: string;
  reference: string;
  kind: DependencyKind;
};

export type Resolution<P extends GraphNode> = {
  order: P[];
  unknownReferences: UnknownReference[];
  /** Plugin names along each back edge found during traversal, in stack order. */
  cycles: string[][];
};

export type ResolveOptions = {
  /** Reject unknown references and cycles instead of tolerating them. */
  strict?: boolean;
};

const GRAPH_INVALID_TITLE = "Plugin dependency graph invalid.";
const GRAPH_INVALID_HINT =
  "Fix the depends_on/run_after entries, or rerun without --strict to tolerate them.";
const DUPLICATE_NAMES_TITLE = "Duplicate plugin names.";
const DUPLICATE_NAMES_HINT = "Give every check in the config a unique name.";

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Orders plugins so every hard or soft dependency runs no later than its dependent.
 *
 * Depth-first post-order over input order; each plugin is visited once, so
 * cycles terminate but their members come out in traversal order.
 */
export function resolveRunOrder<P extends GraphNode>(
  plugins: readonly P[],
  options: ResolveOptions = {},
): Resolution<P> {
  const byName = indexByName(plugins);
  const visited = new Set<string>();
  const stack: string[] = [];
  const order: P[] = [];
  const cycles: string[][] = [];

  const visit = (plugin: P): void => {
    if (visited.has(plugin.name)) return;
    visited.add(plugin.name);
    stack.push(plugin.name);

    for (const edge of dependencyEdges(plugin)) {
      const target = byName.get(edge.reference);
      if (!target) continue;

      if (visited.has(target.name)) {
        const stackIndex = stack.indexOf(target.name);
        if (stackIndex >= 0) {
          cycles.push(stack.slice(stackIndex));
        }
        continue;
      }

      visit(target);
    }

    stack.pop();
    order.push(plugin);
  };

  for (const plugin of plugins) {
    visit(plugin);
  }

  const resolution: Resolution<P> = {
    order,
    unknownReferences: findUnknownReferences(plugins, byName),
    cycles,
  };

  if (options.strict) {
    assertStrictGraph(resolution);
  }

  return resolution;
}

/** Hard edges first, then soft ones, in declared order; a name in both counts as hard. */
export function dependencyEdges(plugin: GraphNode): DependencyEdge[] {
  const seen = new Set<string>();
  const edges: DependencyEdge[] = [];

  for (const reference of plugin.hardDeps) {
    if (seen.has(reference)) continue;
    seen.add(reference);
    edges.push({ reference, kind: "hard" });
  }
  for (const reference of plugin.softOrder) {
    if (seen.has(reference)) continue;
    seen.add(reference);
    edges.push({ reference, kind: "soft" });
  }

  return edges;
}

export function formatGraphWarnings(resolution: Resolution<GraphNode>): string[] {
  const unknown = resolution.unknownReferences.map(
    (ref) => `${describeUnknownReference(ref)} (treated as satisfied)`,
  );
  const cycles = resolution.cycles.map(
    (cycle) => `${describeCycle(cycle)} (order within the cycle follows input order)`,
  );

  return [...unknown, ...cycles];
}

// =============================================================================
// INTERNALS
// =============================================================================

function indexByName<P extends GraphNode>(plugins: readonly P[]): Map<string, P> {
  const byName = new Map<string, P>();
  const duplicates = new Set<string>();

  for (const plugin of plugins) {
    if (byName.has(plugin.name)) {
      duplicates.add(plugin.name);
      continue;
    }
    byName.set(plugin.name, plugin);
  }

  if (duplicates.size > 0) {
    const names = [...duplicates].join(", ");
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.plugin,
      title: DUPLICATE_NAMES_TITLE,
      message: `Plugin names must be unique within a run; duplicated: ${names}.`,
      hint: DUPLICATE_NAMES_HINT,
    });
  }

  return byName;
}

function findUnknownReferences(
  plugins: readonly GraphNode[],
  byName: Map<string, GraphNode>,
): UnknownReference[] {
  const unknown: UnknownReference[] = [];

  for (const plugin of plugins) {
    for (const edge of dependencyEdges(plugin)) {
      if (!byName.has(edge.reference)) {
        unknown.push({ plugin: plugin.name, reference: edge.reference, kind: edge.kind });
      }
    }
  }

  return unknown;
}

function describeUnknownReference(ref: UnknownReference): string {
  return `${ref.plugin} references unknown ${ref.kind} dependency "${ref.reference}"`;
}

function describeCycle(cycle: string[]): string {
  return `dependency cycle ${[...cycle, cycle[0]].join(" -> ")}`;
}

function assertStrictGraph(resolution: Resolution<GraphNode>): void {
  const problems = [
    ...resolution.unknownReferences.map(describeUnknownReference),
    ...resolution.cycles.map(describeCycle),
  ];
  if (problems.length === 0) return;

  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.plugin,
    title: GRAPH_INVALID_TITLE,
    message: [
      `Found ${problems.length} dependency problem(s):`,
      ...problems.map((problem) => `- ${problem}`),
    ].join("\n"),
    hint: GRAPH_INVALID_HINT,
    cause: new PluginGraphError(problems.join("; ")),
  });
}

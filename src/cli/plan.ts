import { resolveColorEnabled } from "../core/error-format.js";
import { formatGraphWarnings, resolveRunOrder } from "../core/resolver.js";

import { ProgressPrinter } from "./progress.js";
import { loadRunSelection, type SelectionOptions } from "./run.js";

/** Prints the resolved run order without connecting to a server. */
export function planCommand(opts: SelectionOptions): void {
  const { config, configPath, plugins } = loadRunSelection(opts);
  const strict = opts.strict ?? config.strict_dependencies;
  const resolution = resolveRunOrder(plugins, { strict });

  const printer = new ProgressPrinter({
    useColor: resolveColorEnabled({ stream: process.stdout }),
  });

  printer.line(`Config: ${configPath ?? "(defaults)"}`, ["dim"]);
  printer.line(`Run order (${resolution.order.length} plugin(s)):`);

  resolution.order.forEach((plugin, index) => {
    const edges: string[] = [];
    if (plugin.hardDeps.length > 0) edges.push(`depends on ${plugin.hardDeps.join(", ")}`);
    if (plugin.softOrder.length > 0) edges.push(`after ${plugin.softOrder.join(", ")}`);
    const suffix = edges.length > 0 ? ` [${edges.join("; ")}]` : "";
    printer.line(`  ${index + 1}. ${plugin.name} (${plugin.targetOperation})${suffix}`);
  });

  const warnings = formatGraphWarnings(resolution);
  if (warnings.length > 0) {
    printer.line("");
    printer.warnings(warnings);
  }
}

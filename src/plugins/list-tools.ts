import { timedOutcome, type Outcome, type Plugin } from "../core/plugin.js";
import type { Session } from "../core/session.js";

import { BUILTIN_PLUGIN_NAMES } from "./names.js";

/** Lists tools and, when given names, checks each one is advertised. */
export class ListToolsPlugin implements Plugin {
  readonly name = BUILTIN_PLUGIN_NAMES.listTools;
  readonly targetOperation = "list_tools";
  readonly description = "Verifies tools/list returns the expected tools";
  readonly hardDeps: readonly string[] = [];
  readonly softOrder: readonly string[] = [];

  constructor(private readonly expectedTools: readonly string[] = []) {}

  run(session: Session): Promise<Outcome> {
    return timedOutcome(this, "Failed to list tools", async () => {
      const tools = await session.listTools();
      const advertised = new Set(tools.map((tool) => tool.name));
      const missing = this.expectedTools.filter((name) => !advertised.has(name));

      if (missing.length > 0) {
        return { passed: false, message: `Missing tools: ${missing.join(", ")}` };
      }

      return {
        passed: true,
        message: `Tools list returned successfully (${tools.length} tools)`,
      };
    });
  }
}

import { timedOutcome, type Outcome, type Plugin } from "../core/plugin.js";
import type { Session } from "../core/session.js";

import { BUILTIN_PLUGIN_NAMES } from "./names.js";

export class ListResourcesPlugin implements Plugin {
  readonly name = BUILTIN_PLUGIN_NAMES.listResources;
  readonly targetOperation = "list_resources";
  readonly description = "Verifies the server exposes resources/list";
  readonly hardDeps: readonly string[] = [];
  readonly softOrder: readonly string[] = [];

  run(session: Session): Promise<Outcome> {
    return timedOutcome(this, "Failed to list resources", async () => {
      const resources = await session.listResources();
      return {
        passed: true,
        message: `Resources list returned successfully (${resources.length} resources)`,
      };
    });
  }
}

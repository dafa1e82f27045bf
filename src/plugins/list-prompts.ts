import { timedOutcome, type Outcome, type Plugin } from "../core/plugin.js";
import type { Session } from "../core/session.js";

import { BUILTIN_PLUGIN_NAMES } from "./names.js";

export class ListPromptsPlugin implements Plugin {
  readonly name = BUILTIN_PLUGIN_NAMES.listPrompts;
  readonly targetOperation = "list_prompts";
  readonly description = "Verifies prompts/list works";
  readonly hardDeps: readonly string[] = [];
  readonly softOrder: readonly string[] = [];

  run(session: Session): Promise<Outcome> {
    return timedOutcome(this, "Failed to list prompts", async () => {
      const prompts = await session.listPrompts();
      return {
        passed: true,
        message: `Prompts list returned successfully (${prompts.length} prompts)`,
      };
    });
  }
}

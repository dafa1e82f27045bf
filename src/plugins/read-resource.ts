import { checkForOperationalError, extractResourceText } from "../core/operational-error.js";
import { timedOutcome, type Outcome, type Plugin } from "../core/plugin.js";
import type { Session } from "../core/session.js";

import { BUILTIN_PLUGIN_NAMES } from "./names.js";

/**
 * Reads the first advertised resource. Re-lists resources itself instead of
 * sharing state with list-resources; the hard dependency only gates the run.
 */
export class ReadResourcePlugin implements Plugin {
  readonly name = BUILTIN_PLUGIN_NAMES.readResource;
  readonly targetOperation = "read_resource";
  readonly description = "Verifies the first advertised resource can be read";
  readonly hardDeps: readonly string[];
  readonly softOrder: readonly string[] = [];

  constructor(options: { gateOnListing?: boolean } = {}) {
    this.hardDeps = options.gateOnListing === false ? [] : [BUILTIN_PLUGIN_NAMES.listResources];
  }

  run(session: Session): Promise<Outcome> {
    return timedOutcome(this, "Failed to read resource", async () => {
      const [first] = await session.listResources();
      if (!first) {
        return { passed: true, message: "No resources advertised; nothing to read" };
      }

      const contents = await session.readResource(first.uri);
      if (contents.length === 0) {
        return { passed: false, message: `Resource ${first.uri} returned no content` };
      }

      const operational = checkForOperationalError(extractResourceText(contents));
      if (operational.isError) {
        return {
          passed: false,
          message: `Operational error reading ${first.uri}`,
          error: operational.detail,
        };
      }

      return {
        passed: true,
        message: `Read ${first.uri} (${contents.length} content block(s))`,
      };
    });
  }
}

import type { ToolCheckConfig } from "../core/config.js";
import { checkForOperationalError, extractText } from "../core/operational-error.js";
import { timedOutcome, type Outcome, type OutcomeFields, type Plugin } from "../core/plugin.js";
import type { Session, ToolCallResult } from "../core/session.js";

type CheckFields = Omit<OutcomeFields, "durationMs">;

/**
 * Calls one tool with fixed arguments and judges the text it returns.
 *
 * A result flagged `isError`, or text matching a known operational-error
 * marker, fails the check unless `expect_error` is set.
 */
export class ToolCheckPlugin implements Plugin {
  readonly name: string;
  readonly targetOperation: string;
  readonly description: string;
  readonly hardDeps: readonly string[];
  readonly softOrder: readonly string[];
  readonly timeoutMs?: number;

  constructor(private readonly check: ToolCheckConfig) {
    this.name = check.name;
    this.targetOperation = check.tool;
    this.description = check.description ?? `Calls ${check.tool}`;
    this.hardDeps = [...check.depends_on];
    this.softOrder = [...check.run_after];
    this.timeoutMs = check.timeout_ms;
  }

  run(session: Session): Promise<Outcome> {
    return timedOutcome(this, "Tool call failed", async () => {
      const result = await session.callTool(this.check.tool, this.check.arguments);
      return this.judge(result);
    });
  }

  private judge(result: ToolCallResult): CheckFields {
    const text = extractText(result.content);

    if (this.check.expect_error) {
      return result.isError
        ? { passed: true, message: "Tool reported an error as expected" }
        : { passed: false, message: "Expected an error result but the call succeeded" };
    }

    if (result.isError) {
      return {
        passed: false,
        message: "Tool returned an error result",
        error: text || "(no text content)",
      };
    }

    const operational = checkForOperationalError(text);
    if (operational.isError) {
      return {
        passed: false,
        message: "Operational error in tool response",
        error: operational.detail,
      };
    }

    const missing = this.check.expect_contains.filter((expected) => !text.includes(expected));
    if (missing.length > 0) {
      return { passed: false, message: `Missing expected content: ${missing.join(", ")}` };
    }

    const expectedCount = this.check.expect_contains.length;
    return {
      passed: true,
      message:
        expectedCount > 0
          ? `Found all ${expectedCount} expected strings`
          : "Tool call returned successfully",
    };
  }
}

import { errorMessage, ProvisionError } from "./errors.ts";
import { RunState } from "./state.ts";
import { PIPELINE, prerequisitesOf, type StepDefinition } from "./steps.ts";
import type { StepContext, StepDeps } from "./context.ts";
import type { BlockedStep, RunReport, StepName, StepResult } from "./types.ts";

/** Whether the pipeline may go on after `result`. */
export function allowsContinuation(result: StepResult): boolean {
  if (result.outcome === "succeeded") return true;
  return result.outcome === "failed" && result.advisory === true && result.error === "PullFailed";
}

/**
 * Runs the steps in order, each at most once. The first step that fails
 * (advisory pull failures aside) ends the run; what was never reached is
 * reported as blocked together with the prerequisites it was missing.
 */
export class Orchestrator {
  private readonly state: RunState;

  constructor(
    private readonly deps: StepDeps,
    private readonly pipeline: readonly StepDefinition[] = PIPELINE,
  ) {
    this.state = new RunState(prerequisitesOf(pipeline));
  }

  async run(): Promise<RunReport> {
    const { logger } = this.deps;
    const ctx: StepContext = { ...this.deps, state: this.state };
    const executed: RunReport["executed"] = [];
    const blocked: BlockedStep[] = [];
    let abortedAt: StepName | null = null;

    for (const step of this.pipeline) {
      const missing = this.state.unmet(step.name);
      if (abortedAt !== null || missing.length > 0) {
        blocked.push({ step: step.name, missing });
        logger.step(step.name, "blocked", missing.length > 0 ? `waiting on ${missing.join(", ")}` : undefined);
        abortedAt ??= step.name;
        continue;
      }

      logger.step(step.name, "start");
      const result = await this.execute(step, ctx);
      this.state.record(step.name, result);
      executed.push({ step: step.name, result });
      this.report(step.name, result);

      if (!allowsContinuation(result)) {
        abortedAt = step.name;
      }
    }

    const deployed = this.state.snapshot().Deployed === "succeeded";
    return {
      state: this.state.snapshot(),
      executed,
      abortedAt,
      blocked,
      url: deployed ? `http://localhost:${this.deps.config.hostPort}` : null,
    };
  }

  private async execute(step: StepDefinition, ctx: StepContext): Promise<StepResult> {
    try {
      return await step.run(ctx);
    } catch (e) {
      if (e instanceof ProvisionError) {
        return { outcome: "failed", error: e.kind, reason: e.message, logTail: e.logTail };
      }
      return { outcome: "failed", error: step.failureKind, reason: errorMessage(e) };
    }
  }

  private report(step: StepName, result: StepResult): void {
    const { logger } = this.deps;
    const detail = result.error ? `${result.error}: ${result.reason ?? ""}`.trim() : result.reason;
    if (result.outcome === "succeeded") {
      logger.step(step, "ok", detail);
    } else if (allowsContinuation(result)) {
      logger.step(step, "warn", detail);
    } else {
      logger.step(step, "fail", detail);
    }
    if (result.logTail) {
      logger.block(`${step} container log`, result.logTail);
    }
  }
}

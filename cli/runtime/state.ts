import { ProvisionError } from "./errors.ts";
import { STEP_NAMES, type StepName, type StepOutcome, type StepResult } from "./types.ts";

export type Prerequisites = ReadonlyMap<StepName, readonly StepName[]>;

/** Read-only view handed to step actions. */
export interface RunStateView {
  outcomeOf(step: StepName): StepOutcome;
  snapshot(): Record<StepName, StepOutcome>;
}

/**
 * Outcome of every step in the current run. Lives for one process only.
 * Only the orchestrator calls `record`.
 */
export class RunState implements RunStateView {
  private readonly outcomes = new Map<StepName, StepOutcome>();

  constructor(private readonly prerequisites: Prerequisites) {
    for (const step of STEP_NAMES) {
      this.outcomes.set(step, "not_attempted");
    }
  }

  /** Prerequisites of `step` that have not succeeded. */
  unmet(step: StepName): StepName[] {
    return (this.prerequisites.get(step) ?? []).filter((dep) => this.raw(dep) !== "succeeded");
  }

  /** Guarded read: a step's outcome is only visible once its prerequisites succeeded. */
  outcomeOf(step: StepName): StepOutcome {
    const missing = this.unmet(step);
    if (missing.length > 0) {
      throw new ProvisionError(
        "PrerequisiteUnmet",
        `Cannot read ${step}: unmet prerequisites ${missing.join(", ")}`,
        { step },
      );
    }
    return this.raw(step);
  }

  record(step: StepName, result: StepResult): void {
    this.outcomes.set(step, result.outcome === "succeeded" ? "succeeded" : "failed");
  }

  snapshot(): Record<StepName, StepOutcome> {
    return {
      VirtualizationReady: this.raw("VirtualizationReady"),
      RuntimeInstalled: this.raw("RuntimeInstalled"),
      RuntimeRunning: this.raw("RuntimeRunning"),
      WorkspaceReady: this.raw("WorkspaceReady"),
      ConfigWritten: this.raw("ConfigWritten"),
      ImagesPulled: this.raw("ImagesPulled"),
      Deployed: this.raw("Deployed"),
    };
  }

  private raw(step: StepName): StepOutcome {
    return this.outcomes.get(step) ?? "not_attempted";
  }
}

import type { ParsedArgs } from "minimist";
import { Orchestrator } from "../runtime/orchestrator.ts";
import type { StepDeps } from "../runtime/context.ts";
import type { RunReport } from "../runtime/types.ts";
import { choosePrompter, createDockerDeps, loadCommandConfig, type CommandEnv } from "./common.ts";

export function summarize(report: RunReport, deps: Pick<StepDeps, "logger" | "config">): number {
  const { logger, config } = deps;
  if (report.url) {
    logger.success(`OpenHands is running at ${report.url}`);
    logger.info(`Workspace: ${config.workspaceDir}`);
    return 0;
  }
  const failed = report.executed.find((e) => e.step === report.abortedAt);
  const kind = failed?.result.error ?? "PrerequisiteUnmet";
  logger.error(`Provisioning stopped at ${report.abortedAt ?? "an unknown step"} (${kind})`);
  for (const { step, missing } of report.blocked) {
    if (missing.length > 0) {
      logger.info(`  ${step} not run (PrerequisiteUnmet): needs ${missing.join(", ")}`);
    }
  }
  logger.info("Fix the problem above and run `berth up` again.");
  return 1;
}

export async function upCommand(args: ParsedArgs, cmd: CommandEnv): Promise<number> {
  const config = await loadCommandConfig(args, cmd);
  const prompter = choosePrompter(args, cmd);
  try {
    cmd.logger.title("berth: provisioning OpenHands");
    const deps = createDockerDeps(config, cmd.logger, prompter);
    const report = await new Orchestrator(deps).run();
    return summarize(report, deps);
  } finally {
    prompter.close();
  }
}

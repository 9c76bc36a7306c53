import type { ParsedArgs } from "minimist";
import { Orchestrator } from "../runtime/orchestrator.ts";
import { subPipeline } from "../runtime/steps.ts";
import { createFixedPrompter } from "../utils/prompt.ts";
import { createDockerDeps, loadCommandConfig, type CommandEnv } from "./common.ts";
import { summarize } from "./up.ts";

// Rewrites the compose document and replaces the container; host checks are skipped.
export async function restartCommand(args: ParsedArgs, cmd: CommandEnv): Promise<number> {
  const config = await loadCommandConfig(args, cmd);
  // Neither step asks anything, so --yes has nothing to answer
  const deps = createDockerDeps(config, cmd.logger, createFixedPrompter(false));
  const report = await new Orchestrator(deps, subPipeline(["ConfigWritten", "Deployed"])).run();
  return summarize(report, deps);
}

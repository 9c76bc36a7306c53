import type { ParsedArgs } from "minimist";
import * as Docker from "../utils/docker.ts";
import { LOG_TAIL_LINES } from "../runtime/steps.ts";
import { intFlag, loadCommandConfig, type CommandEnv } from "./common.ts";

export async function logsCommand(args: ParsedArgs, cmd: CommandEnv): Promise<number> {
  const config = await loadCommandConfig(args, cmd);
  const tail = intFlag(args, "tail") ?? LOG_TAIL_LINES;

  if (args.follow === true) {
    const output = await Docker.followContainerLogs(config.containerName, tail);
    return output.success ? 0 : 1;
  }

  const status = await Docker.getContainerStatus(config.containerName);
  if (status === "unknown") {
    cmd.logger.error(`Container ${config.containerName} not found. Run \`berth up\` first.`);
    return 1;
  }
  process.stdout.write(await Docker.getContainerLogs(config.containerName, tail));
  return 0;
}

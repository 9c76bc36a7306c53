import type { ParsedArgs } from "minimist";
import chalk from "chalk";
import { errorMessage } from "../runtime/errors.ts";
import type { ContainerSummary } from "../runtime/types.ts";
import * as Docker from "../utils/docker.ts";
import { loadCommandConfig, type CommandEnv } from "./common.ts";

export async function statusCommand(args: ParsedArgs, cmd: CommandEnv): Promise<number> {
  const config = await loadCommandConfig(args, cmd);
  let containers: ContainerSummary[];
  try {
    containers = await Docker.findContainersByName(config.containerName);
  } catch (e) {
    cmd.logger.error(`Failed to read container status: ${errorMessage(e)}`);
    return 1;
  }
  const container = containers.find((c) => c.name === config.containerName);

  if (!container) {
    cmd.logger.info(`${config.containerName}: ${chalk.gray("not deployed")}`);
    return 0;
  }

  const up = container.status.startsWith("Up");
  cmd.logger.info(`${config.containerName}: ${up ? chalk.green(container.status) : chalk.yellow(container.status)}`);
  if (up) {
    cmd.logger.info(`URL: http://localhost:${config.hostPort}`);
  }
  return 0;
}

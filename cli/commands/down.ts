import type { ParsedArgs } from "minimist";
import { errorMessage } from "../runtime/errors.ts";
import { createLaunchStrategy, DockerLauncher } from "../services/launcher.ts";
import { loadCommandConfig, type CommandEnv } from "./common.ts";

export async function downCommand(args: ParsedArgs, cmd: CommandEnv): Promise<number> {
  const config = await loadCommandConfig(args, cmd);
  const launcher = new DockerLauncher(createLaunchStrategy(config.launch));

  try {
    const existing = (await launcher.listContainers(config.containerName))
      .filter((c) => c.name === config.containerName);
    if (existing.length === 0 && config.launch === "direct") {
      cmd.logger.info(`No container named ${config.containerName}.`);
      return 0;
    }

    cmd.logger.info(`Stopping ${config.containerName}...`);
    await launcher.down(config);
  } catch (e) {
    cmd.logger.error(`Failed to stop ${config.containerName}: ${errorMessage(e)}`);
    return 1;
  }
  cmd.logger.success(`${config.containerName} stopped and removed.`);
  return 0;
}

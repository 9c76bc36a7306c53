import type { ParsedArgs } from "minimist";
import { writeDefaultSettings } from "../utils/config.ts";
import type { CommandEnv } from "./common.ts";

export async function initCommand(args: ParsedArgs, cmd: CommandEnv): Promise<number> {
  const { path, written } = await writeDefaultSettings(cmd.env, args.force === true);
  if (!written) {
    cmd.logger.warn(`${path} already exists; use --force to overwrite it.`);
    return 1;
  }
  cmd.logger.success(`Wrote ${path}`);
  return 0;
}

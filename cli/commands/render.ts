import type { ParsedArgs } from "minimist";
import { formatArgs } from "../utils/args.ts";
import { renderComposeDocument, renderRunArgs } from "../utils/docker-compose.ts";
import { loadCommandConfig, type CommandEnv } from "./common.ts";

/** Prints what `up` would write or run. Touches nothing. */
export async function renderCommand(
  args: ParsedArgs,
  cmd: CommandEnv,
  write: (text: string) => void = (text) => process.stdout.write(text),
): Promise<number> {
  const config = await loadCommandConfig(args, cmd);
  if (args.args === true) {
    write(`${formatArgs(["docker", ...renderRunArgs(config)])}\n`);
  } else {
    write(renderComposeDocument(config));
  }
  return 0;
}

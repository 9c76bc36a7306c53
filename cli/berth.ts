#!/usr/bin/env -S npx tsx

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import minimist from "minimist";
import type { ParsedArgs } from "minimist";
import { ConfigError, errorMessage } from "./runtime/errors.ts";
import { createLogger } from "./utils/logger.ts";
import { LOG_FILE } from "./utils/paths.ts";
import { BOOLEAN_FLAGS, STRING_FLAGS, type CommandEnv } from "./commands/common.ts";
import { checkCommand } from "./commands/check.ts";
import { downCommand } from "./commands/down.ts";
import { initCommand } from "./commands/init.ts";
import { logsCommand } from "./commands/logs.ts";
import { renderCommand } from "./commands/render.ts";
import { restartCommand } from "./commands/restart.ts";
import { statusCommand } from "./commands/status.ts";
import { upCommand } from "./commands/up.ts";

type Command = (args: ParsedArgs, cmd: CommandEnv) => Promise<number>;

const COMMANDS: Partial<Record<string, Command>> = {
  up: upCommand,
  down: downCommand,
  restart: restartCommand,
  status: statusCommand,
  logs: logsCommand,
  render: renderCommand,
  check: checkCommand,
  init: initCommand,
};

const USAGE = `berth: provision this machine and run OpenHands in Docker

Commands:
  up [--yes] [--local] [--launch direct|compose] [--port N]
     [--workspace DIR] [--state-dir DIR] [--pull-failure prompt|continue|abort]
  down
  restart
  status
  logs [--tail N] [--follow]
  render [--args]
  check
  init [--force]

Global: --verbose`;

export async function main(argv: string[]): Promise<number> {
  const args = minimist(argv, { string: STRING_FLAGS, boolean: BOOLEAN_FLAGS });
  const name = String(args._[0] ?? "");
  const command = COMMANDS[name];

  if (!command || args.help === true) {
    console.log(USAGE);
    return command || name === "" ? 0 : 1;
  }

  const cmd: CommandEnv = {
    cwd: process.cwd(),
    env: process.env,
    logger: createLogger({ verbose: args.verbose === true, logFile: LOG_FILE(process.env) }),
    interactive: process.stdin.isTTY === true,
  };

  try {
    return await command(args, cmd);
  } catch (e) {
    if (e instanceof ConfigError) {
      cmd.logger.error(`Invalid configuration: ${e.message}`);
    } else {
      cmd.logger.error(`${name} failed: ${errorMessage(e)}`);
    }
    return 1;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (e: unknown) => {
      console.error(e);
      process.exit(1);
    },
  );
}

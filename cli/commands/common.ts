import type { ParsedArgs } from "minimist";
import { ConfigError } from "../runtime/errors.ts";
import { createStepDeps, type StepDeps } from "../runtime/context.ts";
import type { DeploymentConfig, LaunchMode, PullFailurePolicy } from "../runtime/types.ts";
import { PlatformInstaller } from "../services/installer.ts";
import { createLaunchStrategy, DockerLauncher } from "../services/launcher.ts";
import { DockerProbe } from "../services/probe.ts";
import { localWorkspace } from "../services/workspace.ts";
import { loadConfig, type CliOverrides } from "../utils/config.ts";
import type { Logger } from "../utils/logger.ts";
import { createFixedPrompter, createReadlinePrompter, type Prompter } from "../utils/prompt.ts";

export type Env = Record<string, string | undefined>;

/** What every command runs against; the entry point fills it from the process. */
export interface CommandEnv {
  cwd: string;
  env: Env;
  logger: Logger;
  interactive: boolean;
}

export const STRING_FLAGS = ["port", "workspace", "state-dir", "launch", "pull-failure", "tail"];
export const BOOLEAN_FLAGS = ["yes", "local", "args", "follow", "force", "verbose", "help"];

export function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value: unknown = args[name];
  return typeof value === "string" && value !== "" ? value : undefined;
}

export function intFlag(args: ParsedArgs, name: string): number | undefined {
  const raw = stringFlag(args, name);
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`--${name}`, `expected a whole number, got '${raw}'`);
  }
  return Number(raw);
}

function oneOf<T extends string>(args: ParsedArgs, name: string, allowed: readonly T[]): T | undefined {
  const raw = stringFlag(args, name);
  if (raw === undefined) return undefined;
  const match = allowed.find((value) => value === raw);
  if (!match) {
    throw new ConfigError(`--${name}`, `expected one of ${allowed.join(", ")}, got '${raw}'`);
  }
  return match;
}

export function overridesFromArgs(args: ParsedArgs): CliOverrides {
  return {
    port: intFlag(args, "port"),
    workspaceDir: stringFlag(args, "workspace"),
    stateDir: stringFlag(args, "state-dir"),
    launch: oneOf<LaunchMode>(args, "launch", ["direct", "compose"]),
    pullFailure: oneOf<PullFailurePolicy>(args, "pull-failure", ["prompt", "continue", "abort"]),
    local: args.local === true,
  };
}

export function loadCommandConfig(args: ParsedArgs, cmd: CommandEnv): Promise<DeploymentConfig> {
  return loadConfig({ cwd: cmd.cwd, env: cmd.env, overrides: overridesFromArgs(args) });
}

/**
 * --yes answers every question with yes; without a terminal nothing can be
 * asked, so every question is answered no.
 */
export function choosePrompter(args: ParsedArgs, cmd: CommandEnv): Prompter {
  if (args.yes === true) {
    return createFixedPrompter(true, (line) => cmd.logger.info(line));
  }
  if (!cmd.interactive) {
    return createFixedPrompter(false, (line) => cmd.logger.warn(`No terminal to ask on: ${line}`));
  }
  return createReadlinePrompter();
}

export function createDockerDeps(config: DeploymentConfig, logger: Logger, prompter: Prompter): StepDeps {
  return createStepDeps({
    config,
    logger,
    prompter,
    probe: new DockerProbe(config.poll.probeTimeoutMs),
    installer: new PlatformInstaller(logger),
    launcher: new DockerLauncher(createLaunchStrategy(config.launch)),
    workspace: localWorkspace,
  });
}

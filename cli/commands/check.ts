import { dirname } from "node:path";
import type { ParsedArgs } from "minimist";
import chalk from "chalk";
import fs from "fs-extra";
import { errorMessage } from "../runtime/errors.ts";
import { DockerProbe, type RuntimeProbe } from "../services/probe.ts";
import { getFreeDiskGb, MIN_FREE_DISK_GB } from "../utils/system.ts";
import { loadCommandConfig, type CommandEnv } from "./common.ts";

const mark = (value: boolean) => (value ? chalk.green("yes") : chalk.red("no"));

// statfs needs a path that exists; the workspace may not yet
async function nearestExisting(path: string): Promise<string> {
  let current = path;
  while (!(await fs.pathExists(current))) {
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return current;
}

async function probeLine(label: string, probe: () => Promise<boolean>): Promise<boolean> {
  try {
    const value = await probe();
    console.log(`${label.padEnd(24)} ${mark(value)}`);
    return value;
  } catch (e) {
    console.log(`${label.padEnd(24)} ${chalk.red(errorMessage(e))}`);
    return false;
  }
}

/** Read-only host report: the probes `up` would run, plus disk space. */
export async function checkCommand(
  args: ParsedArgs,
  cmd: CommandEnv,
  probe?: RuntimeProbe,
  freeDiskGb: (path: string) => Promise<number> = getFreeDiskGb,
): Promise<number> {
  const config = await loadCommandConfig(args, cmd);
  const p = probe ?? new DockerProbe(config.poll.probeTimeoutMs);

  cmd.logger.title("berth: host check");
  const virtualization = await probeLine("Virtualization", () => p.isVirtualizationEnabled());
  const installed = await probeLine("Docker installed", () => p.isRuntimeInstalled());
  const running = installed ? await probeLine("Docker running", () => p.isRuntimeRunning()) : false;
  if (installed) {
    console.log(`${"Docker version".padEnd(24)} ${(await p.currentVersion()) ?? "unknown"}`);
  }

  const target = await nearestExisting(config.workspaceDir);
  const free = await freeDiskGb(target);
  console.log(`${"Free disk space".padEnd(24)} ${free.toFixed(1)} GB (${target})`);
  if (free < MIN_FREE_DISK_GB) {
    cmd.logger.warn(`Less than ${MIN_FREE_DISK_GB} GB free; the images alone take several GB`);
  }

  return virtualization && installed && running ? 0 : 1;
}

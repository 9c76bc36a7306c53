import fs from "fs-extra";
import type { Installer } from "../services/installer.ts";
import type { ContainerLauncher } from "../services/launcher.ts";
import type { RuntimeProbe } from "../services/probe.ts";
import type { Workspace } from "../services/workspace.ts";
import type { Logger } from "../utils/logger.ts";
import type { Prompter } from "../utils/prompt.ts";
import { sleep } from "../utils/system.ts";
import type { RunStateView } from "./state.ts";
import type { DeploymentConfig } from "./types.ts";

/** Collaborators a run is wired with. */
export interface StepDeps {
  config: DeploymentConfig;
  probe: RuntimeProbe;
  installer: Installer;
  launcher: ContainerLauncher;
  workspace: Workspace;
  prompter: Prompter;
  logger: Logger;
  sleep: (ms: number) => Promise<void>;
  writeFile: (path: string, content: string) => Promise<void>;
}

/** What a step action sees: its collaborators plus a read-only view of the run. */
export interface StepContext extends StepDeps {
  state: RunStateView;
}

export function createStepDeps(
  deps: Omit<StepDeps, "sleep" | "writeFile"> & Partial<Pick<StepDeps, "sleep" | "writeFile">>,
): StepDeps {
  return {
    sleep,
    writeFile: (path, content) => fs.outputFile(path, content, "utf8"),
    ...deps,
  };
}

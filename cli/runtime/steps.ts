import { imageRef, renderComposeDocument } from "../utils/docker-compose.ts";
import { errorMessage } from "./errors.ts";
import { poll } from "./poll.ts";
import type { StepContext } from "./context.ts";
import type { ErrorKind, StepName, StepResult } from "./types.ts";

export const LOG_TAIL_LINES = 50;

export interface StepDefinition {
  name: StepName;
  requires: readonly StepName[];
  /** Kind given to an unexpected error thrown by `run`. */
  failureKind: ErrorKind;
  run(ctx: StepContext): Promise<StepResult>;
}

const ok = (reason?: string): StepResult => ({ outcome: "succeeded", reason });

const fail = (error: ErrorKind, reason: string, extra: Partial<StepResult> = {}): StepResult => ({
  outcome: "failed",
  error,
  reason,
  ...extra,
});

const declined = (reason: string): StepResult => ({ outcome: "skipped", error: "UserDeclined", reason });

// `docker ps` status column: "Up 3 minutes", "Restarting (1) 2 seconds ago", "Exited (0) ..."
export function isRunningStatus(status: string): boolean {
  return /^(up|restarting)\b/i.test(status.trim());
}

/**
 * Step 1: VirtualizationReady
 * WSL on Windows, the hypervisor framework on macOS; always present on Linux.
 */
async function virtualizationReady(ctx: StepContext): Promise<StepResult> {
  if (await ctx.probe.isVirtualizationEnabled()) {
    return ok("virtualization available");
  }

  ctx.logger.warn("Virtualization support is not enabled");
  if (!(await ctx.prompter.confirm("Install the virtualization layer now?", true))) {
    return declined("virtualization install declined");
  }

  const outcome = await ctx.installer.installVirtualization();
  if (!outcome.ok) {
    return fail("InstallFailed", outcome.detail ?? "virtualization install failed");
  }
  if (outcome.restartRequired) {
    return fail("RestartRequired", "virtualization installed; restart the computer, then run berth up again");
  }
  return ok("virtualization installed");
}

/**
 * Step 2: RuntimeInstalled
 */
async function runtimeInstalled(ctx: StepContext): Promise<StepResult> {
  if (await ctx.probe.isRuntimeInstalled()) {
    const version = await ctx.probe.currentVersion();
    return ok(version ? `Docker ${version}` : "Docker installed");
  }

  if (!(await ctx.prompter.confirm("Docker is not installed. Install it now?", true))) {
    return declined("Docker install declined");
  }

  const outcome = await ctx.installer.installRuntime();
  if (!outcome.ok) {
    return fail("InstallFailed", outcome.detail ?? "Docker install failed");
  }
  return ok("Docker installed");
}

/**
 * Step 3: RuntimeRunning
 * Starts the daemon on request and waits for it with a bounded poll.
 */
async function runtimeRunning(ctx: StepContext): Promise<StepResult> {
  if (await ctx.probe.isRuntimeRunning()) {
    return ok("daemon answering");
  }

  if (!(await ctx.prompter.confirm("The Docker daemon is not running. Start it and wait?", true))) {
    return declined("operator declined to start the daemon");
  }

  const started = await ctx.installer.startRuntime();
  if (!started.ok) {
    ctx.logger.warn(`Could not start Docker (${started.detail ?? "unknown error"}); waiting in case it is starting`);
  }

  const { runtimeIntervalMs, runtimeAttempts } = ctx.config.poll;
  const result = await poll(
    async () => ((await ctx.probe.isRuntimeRunning()) ? "ready" : "pending"),
    {
      intervalMs: runtimeIntervalMs,
      maxAttempts: runtimeAttempts,
      sleep: ctx.sleep,
      onPending: (attempt) => ctx.logger.debug(`Waiting for Docker (${attempt}/${runtimeAttempts})`),
    },
  );
  if (result.verdict === "ready") {
    return ok(`daemon answered after ${result.attempts} check(s)`);
  }

  ctx.logger.warn(`Docker did not answer after ${result.attempts} checks`);
  if (await ctx.prompter.confirm("Is Docker running now?", false)) {
    return ok("confirmed running by operator");
  }
  return fail("StatusVerificationFailed", `daemon not answering after ${result.attempts} checks`);
}

/**
 * Step 4: WorkspaceReady
 * Only missing directories are created; existing ones are left untouched.
 */
async function workspaceReady(ctx: StepContext): Promise<StepResult> {
  const created: string[] = [];
  for (const dir of [ctx.config.workspaceDir, ctx.config.stateDir]) {
    if (await ctx.workspace.exists(dir)) {
      ctx.logger.debug(`${dir} exists`);
      continue;
    }
    try {
      await ctx.workspace.create(dir);
    } catch (e) {
      return fail("DirectoryCreateFailed", `cannot create ${dir}: ${errorMessage(e)}`);
    }
    if (!(await ctx.workspace.exists(dir))) {
      return fail("DirectoryCreateFailed", `${dir} is missing after creation`);
    }
    created.push(dir);
  }
  return ok(created.length > 0 ? `created ${created.join(", ")}` : "directories present");
}

/**
 * Step 5: ConfigWritten
 * Overwrites the previous document; rendering is byte-stable.
 */
async function configWritten(ctx: StepContext): Promise<StepResult> {
  const document = renderComposeDocument(ctx.config);
  try {
    await ctx.writeFile(ctx.config.composeFile, document);
  } catch (e) {
    return fail("ConfigWriteFailed", `cannot write ${ctx.config.composeFile}: ${errorMessage(e)}`);
  }
  return ok(ctx.config.composeFile);
}

/**
 * Step 6: ImagesPulled
 * Advisory: the launch fetches missing images itself, so a failed pull only
 * stops the run when the policy or the operator says so.
 */
async function imagesPulled(ctx: StepContext): Promise<StepResult> {
  const refs = [imageRef(ctx.config.appImage), imageRef(ctx.config.runtimeImage)];
  const failed: string[] = [];
  for (const ref of refs) {
    ctx.logger.info(`Pulling ${ref}...`);
    if (!(await ctx.launcher.pull(ref))) {
      failed.push(ref);
    }
  }
  if (failed.length === 0) {
    return ok(`pulled ${refs.length} images`);
  }

  const reason = `could not pull ${failed.join(", ")}`;
  ctx.logger.warn(`${reason}; the launch will try to fetch them again`);

  switch (ctx.config.pullFailure) {
    case "continue":
      return fail("PullFailed", reason, { advisory: true });
    case "abort":
      return fail("PullFailed", reason);
    case "prompt":
      if (await ctx.prompter.confirm("Continue without the pulled images?", true)) {
        return fail("PullFailed", reason, { advisory: true });
      }
      return declined(`${reason}; operator chose to stop`);
  }
}

async function tailLogs(ctx: StepContext): Promise<string> {
  try {
    return await ctx.launcher.logs(ctx.config.containerName, LOG_TAIL_LINES);
  } catch (e) {
    ctx.logger.warn(`Could not read container logs: ${errorMessage(e)}`);
    return "";
  }
}

/**
 * Step 7: Deployed
 * Replaces any container holding the reserved name, then waits for the new
 * one to report "running".
 */
async function deployed(ctx: StepContext): Promise<StepResult> {
  const { config, launcher, logger } = ctx;
  const name = config.containerName;

  if (ctx.state.outcomeOf("ImagesPulled") !== "succeeded") {
    logger.info("Images were not pulled in advance; the launch will fetch them");
  }

  const existing = (await launcher.listContainers(name)).filter((c) => c.name === name);
  for (const container of existing) {
    if (isRunningStatus(container.status)) {
      logger.info(`Stopping existing container ${name} (${container.status})`);
      await launcher.stop(name);
    }
    logger.info(`Removing existing container ${name}`);
    await launcher.remove(name);
  }

  let containerId: string;
  try {
    containerId = await launcher.run(config);
  } catch (e) {
    return fail("LaunchFailed", errorMessage(e), { logTail: await tailLogs(ctx) });
  }
  logger.debug(`Container id ${containerId}`);

  let lastStatus = "unknown";
  const { launchIntervalMs, launchAttempts } = config.poll;
  const result = await poll(
    async () => {
      lastStatus = await launcher.status(name);
      if (lastStatus === "running") return "ready";
      if (lastStatus === "exited" || lastStatus === "dead") return "failed";
      return "pending";
    },
    { intervalMs: launchIntervalMs, maxAttempts: launchAttempts, sleep: ctx.sleep },
  );

  if (result.verdict !== "ready") {
    return fail(
      "StatusVerificationFailed",
      `container status '${lastStatus}' after ${result.attempts} check(s)`,
      { logTail: await tailLogs(ctx) },
    );
  }
  return ok(`container ${containerId.slice(0, 12)} running`);
}

const ALL_BEFORE_DEPLOY: readonly StepName[] = [
  "VirtualizationReady",
  "RuntimeInstalled",
  "RuntimeRunning",
  "WorkspaceReady",
  "ConfigWritten",
];

export const PIPELINE: readonly StepDefinition[] = [
  { name: "VirtualizationReady", requires: [], failureKind: "InstallFailed", run: virtualizationReady },
  { name: "RuntimeInstalled", requires: [], failureKind: "InstallFailed", run: runtimeInstalled },
  { name: "RuntimeRunning", requires: ["RuntimeInstalled"], failureKind: "StatusVerificationFailed", run: runtimeRunning },
  {
    name: "WorkspaceReady",
    requires: ["VirtualizationReady", "RuntimeInstalled", "RuntimeRunning"],
    failureKind: "DirectoryCreateFailed",
    run: workspaceReady,
  },
  {
    name: "ConfigWritten",
    requires: ["VirtualizationReady", "RuntimeInstalled", "RuntimeRunning", "WorkspaceReady"],
    failureKind: "ConfigWriteFailed",
    run: configWritten,
  },
  { name: "ImagesPulled", requires: ALL_BEFORE_DEPLOY, failureKind: "PullFailed", run: imagesPulled },
  // not ImagesPulled: a failed pull never blocks the launch
  { name: "Deployed", requires: ALL_BEFORE_DEPLOY, failureKind: "LaunchFailed", run: deployed },
];

/** The named steps only, their prerequisites narrowed to steps still in the list. */
export function subPipeline(names: readonly StepName[]): StepDefinition[] {
  return PIPELINE.filter((step) => names.includes(step.name)).map((step) => ({
    ...step,
    requires: step.requires.filter((dep) => names.includes(dep)),
  }));
}

export function prerequisitesOf(pipeline: readonly StepDefinition[]): Map<StepName, readonly StepName[]> {
  return new Map(pipeline.map((step) => [step.name, step.requires]));
}

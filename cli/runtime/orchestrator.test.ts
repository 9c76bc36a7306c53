import { describe, expect, it } from "vitest";
import { allowsContinuation, Orchestrator } from "./orchestrator.ts";
import { createStepDeps } from "./context.ts";
import { ProvisionError } from "./errors.ts";
import { PIPELINE, subPipeline, type StepDefinition } from "./steps.ts";
import { STEP_NAMES, type ContainerSummary, type DeploymentConfig } from "./types.ts";
import type { InstallOutcome, Installer } from "../services/installer.ts";
import type { ContainerLauncher } from "../services/launcher.ts";
import type { RuntimeProbe } from "../services/probe.ts";
import type { Workspace } from "../services/workspace.ts";
import { DEFAULT_SETTINGS, resolveDeploymentConfig } from "../utils/config.ts";
import { renderComposeDocument } from "../utils/docker-compose.ts";
import type { Logger, StepStatus } from "../utils/logger.ts";
import type { Prompter } from "../utils/prompt.ts";

const APP_REF = "docker.all-hands.dev/all-hands-ai/openhands:0.27";
const RUNTIME_REF = "docker.all-hands.dev/all-hands-ai/runtime:0.27-nikolaik";

class FakeProbe implements RuntimeProbe {
  virtualization = true;
  installed = true;
  running = true;
  installError: Error | null = null;
  runningChecks = 0;

  async isVirtualizationEnabled() {
    return this.virtualization;
  }
  async isRuntimeInstalled() {
    if (this.installError) throw this.installError;
    return this.installed;
  }
  async isRuntimeRunning() {
    this.runningChecks++;
    return this.running;
  }
  async currentVersion() {
    return "24.0.7";
  }
}

class FakeInstaller implements Installer {
  calls: string[] = [];
  virtualizationOutcome: InstallOutcome = { ok: true };
  runtimeOutcome: InstallOutcome = { ok: true };
  startOutcome: InstallOutcome = { ok: true };
  startsDaemon = true;

  constructor(private readonly probe: FakeProbe) {}

  async installVirtualization() {
    this.calls.push("virtualization");
    if (this.virtualizationOutcome.ok) this.probe.virtualization = true;
    return this.virtualizationOutcome;
  }
  async installRuntime() {
    this.calls.push("runtime");
    if (this.runtimeOutcome.ok) this.probe.installed = true;
    return this.runtimeOutcome;
  }
  async startRuntime() {
    this.calls.push("start");
    if (this.startsDaemon) this.probe.running = true;
    return this.startOutcome;
  }
}

class FakeLauncher implements ContainerLauncher {
  calls: string[] = [];
  containers: ContainerSummary[] = [];
  failingPulls = new Set<string>();
  runError: Error | null = null;
  // Consumed one per status check; the last entry repeats
  statuses: string[] = ["running"];

  async listContainers(nameFilter: string) {
    this.calls.push(`list ${nameFilter}`);
    return this.containers.filter((c) => c.name.includes(nameFilter));
  }
  async stop(name: string) {
    this.calls.push(`stop ${name}`);
  }
  async remove(name: string) {
    this.calls.push(`rm ${name}`);
  }
  async pull(ref: string) {
    this.calls.push(`pull ${ref}`);
    return !this.failingPulls.has(ref);
  }
  async run(config: DeploymentConfig) {
    this.calls.push(`run ${config.containerName}`);
    if (this.runError) throw this.runError;
    return "0123456789abcdef";
  }
  async logs(name: string, tail?: number) {
    this.calls.push(`logs ${name} ${tail}`);
    return "boot failed\n";
  }
  async status() {
    const next = this.statuses.length > 1 ? this.statuses.shift() : this.statuses[0];
    return next ?? "unknown";
  }
  async down() {
    this.calls.push("down");
  }
}

class FakeWorkspace implements Workspace {
  dirs = new Set<string>();
  created: string[] = [];
  failing = new Set<string>();

  async exists(path: string) {
    return this.dirs.has(path);
  }
  async create(path: string) {
    if (this.failing.has(path)) throw new Error("EACCES: permission denied");
    this.dirs.add(path);
    this.created.push(path);
  }
}

class ScriptedPrompter implements Prompter {
  questions: string[] = [];

  constructor(private readonly answers: boolean[]) {}

  async confirm(question: string) {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) throw new Error(`unexpected question: ${question}`);
    return answer;
  }
  close() {}
}

class RecordingLogger implements Logger {
  lines: string[] = [];

  title(text: string) {
    this.lines.push(`title ${text}`);
  }
  info(message: string) {
    this.lines.push(`info ${message}`);
  }
  success(message: string) {
    this.lines.push(`success ${message}`);
  }
  warn(message: string) {
    this.lines.push(`warn ${message}`);
  }
  error(message: string) {
    this.lines.push(`error ${message}`);
  }
  debug(message: string) {
    this.lines.push(`debug ${message}`);
  }
  step(step: string, status: StepStatus) {
    this.lines.push(`${status} ${step}`);
  }
  block(heading: string) {
    this.lines.push(`block ${heading}`);
  }
}

class Harness {
  readonly config: DeploymentConfig;
  readonly probe = new FakeProbe();
  readonly installer = new FakeInstaller(this.probe);
  readonly launcher = new FakeLauncher();
  readonly workspace = new FakeWorkspace();
  readonly log = new RecordingLogger();
  readonly prompter: ScriptedPrompter;
  readonly sleeps: number[] = [];
  readonly written = new Map<string, string>();
  writeError: Error | null = null;

  constructor(overrides: Partial<DeploymentConfig> = {}, answers: boolean[] = []) {
    const base = resolveDeploymentConfig(DEFAULT_SETTINGS, { env: {}, cwd: "/work", home: "/home/test" });
    this.config = { ...base, ...overrides };
    this.prompter = new ScriptedPrompter(answers);
    this.workspace.dirs.add(this.config.workspaceDir);
    this.workspace.dirs.add(this.config.stateDir);
  }

  run(pipeline?: readonly StepDefinition[]) {
    const deps = createStepDeps({
      config: this.config,
      probe: this.probe,
      installer: this.installer,
      launcher: this.launcher,
      workspace: this.workspace,
      prompter: this.prompter,
      logger: this.log,
      sleep: async (ms) => {
        this.sleeps.push(ms);
      },
      writeFile: async (path, content) => {
        if (this.writeError) throw this.writeError;
        this.written.set(path, content);
      },
    });
    return new Orchestrator(deps, pipeline).run();
  }
}

describe("Orchestrator", () => {
  it("runs every step once on a ready host", async () => {
    const h = new Harness();
    const report = await h.run();

    expect(report.abortedAt).toBeNull();
    expect(report.blocked).toEqual([]);
    expect(report.executed.map((e) => e.step)).toEqual([...STEP_NAMES]);
    expect(Object.values(report.state)).toEqual(Array(7).fill("succeeded"));
    expect(report.url).toBe("http://localhost:80");
    expect(h.prompter.questions).toEqual([]);
    expect(h.installer.calls).toEqual([]);
    expect(h.workspace.created).toEqual([]);
    expect(h.launcher.calls).toEqual([
      `pull ${APP_REF}`,
      `pull ${RUNTIME_REF}`,
      "list openhands-app",
      "run openhands-app",
    ]);
    expect(h.sleeps).toEqual([2000]);
  });

  it("writes the rendered compose document to the configured path", async () => {
    const h = new Harness();
    await h.run();
    expect([...h.written.keys()]).toEqual([h.config.composeFile]);
    expect(h.written.get(h.config.composeFile)).toBe(renderComposeDocument(h.config));
  });

  it("installs and starts everything when the operator accepts", async () => {
    const h = new Harness({}, [true, true, true]);
    h.probe.virtualization = false;
    h.probe.installed = false;
    h.probe.running = false;
    h.workspace.dirs.clear();

    const report = await h.run();

    expect(report.abortedAt).toBeNull();
    expect(Object.values(report.state)).toEqual(Array(7).fill("succeeded"));
    expect(h.installer.calls).toEqual(["virtualization", "runtime", "start"]);
    expect(h.prompter.questions).toHaveLength(3);
    expect(h.workspace.created).toEqual([h.config.workspaceDir, h.config.stateDir]);
    expect(h.sleeps).toEqual([5000, 2000]);
    expect(report.url).toBe("http://localhost:80");
  });

  it("stops after a declined virtualization install and blocks the rest", async () => {
    const h = new Harness({}, [false]);
    h.probe.virtualization = false;

    const report = await h.run();

    expect(report.abortedAt).toBe("VirtualizationReady");
    expect(report.executed).toEqual([
      {
        step: "VirtualizationReady",
        result: { outcome: "skipped", error: "UserDeclined", reason: "virtualization install declined" },
      },
    ]);
    expect(report.state).toEqual({
      VirtualizationReady: "failed",
      RuntimeInstalled: "not_attempted",
      RuntimeRunning: "not_attempted",
      WorkspaceReady: "not_attempted",
      ConfigWritten: "not_attempted",
      ImagesPulled: "not_attempted",
      Deployed: "not_attempted",
    });
    expect(report.blocked).toEqual([
      { step: "RuntimeInstalled", missing: [] },
      { step: "RuntimeRunning", missing: ["RuntimeInstalled"] },
      { step: "WorkspaceReady", missing: ["VirtualizationReady", "RuntimeInstalled", "RuntimeRunning"] },
      {
        step: "ConfigWritten",
        missing: ["VirtualizationReady", "RuntimeInstalled", "RuntimeRunning", "WorkspaceReady"],
      },
      {
        step: "ImagesPulled",
        missing: ["VirtualizationReady", "RuntimeInstalled", "RuntimeRunning", "WorkspaceReady", "ConfigWritten"],
      },
      {
        step: "Deployed",
        missing: ["VirtualizationReady", "RuntimeInstalled", "RuntimeRunning", "WorkspaceReady", "ConfigWritten"],
      },
    ]);
    expect(h.installer.calls).toEqual([]);
    expect(report.url).toBeNull();
  });

  it("aborts when the virtualization install needs a restart", async () => {
    const h = new Harness({}, [true]);
    h.probe.virtualization = false;
    h.installer.virtualizationOutcome = { ok: true, restartRequired: true };

    const report = await h.run();

    expect(report.abortedAt).toBe("VirtualizationReady");
    expect(report.executed[0].result).toEqual({
      outcome: "failed",
      error: "RestartRequired",
      reason: "virtualization installed; restart the computer, then run berth up again",
    });
    expect(report.state.RuntimeInstalled).toBe("not_attempted");
  });

  it("reports InstallFailed with the installer's detail", async () => {
    const h = new Harness({}, [true]);
    h.probe.installed = false;
    h.installer.runtimeOutcome = { ok: false, detail: "winget exited with 1: no network" };

    const report = await h.run();

    expect(report.abortedAt).toBe("RuntimeInstalled");
    expect(report.executed[1].result).toEqual({
      outcome: "failed",
      error: "InstallFailed",
      reason: "winget exited with 1: no network",
    });
  });

  describe("RuntimeRunning", () => {
    it("gives up after the attempt ceiling unless the operator confirms", async () => {
      const h = new Harness({}, [true, false]);
      h.probe.running = false;
      h.installer.startsDaemon = false;

      const report = await h.run();

      expect(report.abortedAt).toBe("RuntimeRunning");
      expect(report.executed[2].result).toEqual({
        outcome: "failed",
        error: "StatusVerificationFailed",
        reason: "daemon not answering after 60 checks",
      });
      expect(h.probe.runningChecks).toBe(61);
      expect(h.sleeps).toEqual(Array(60).fill(5000));
      expect(h.prompter.questions).toEqual([
        "The Docker daemon is not running. Start it and wait?",
        "Is Docker running now?",
      ]);
    });

    it("accepts a manual confirmation after the ceiling", async () => {
      const h = new Harness({}, [true, true]);
      h.probe.running = false;
      h.installer.startsDaemon = false;

      const report = await h.run();

      expect(report.executed[2].result).toEqual({ outcome: "succeeded", reason: "confirmed running by operator" });
      expect(report.abortedAt).toBeNull();
    });

    it("records a declined start as UserDeclined", async () => {
      const h = new Harness({}, [false]);
      h.probe.running = false;

      const report = await h.run();

      expect(report.executed[2].result.error).toBe("UserDeclined");
      expect(report.state.RuntimeRunning).toBe("failed");
      expect(h.installer.calls).toEqual([]);
    });

    it("keeps waiting when the start command fails", async () => {
      const h = new Harness({}, [true]);
      h.probe.running = false;
      h.installer.startOutcome = { ok: false, detail: "no systemd" };

      const report = await h.run();

      expect(report.state.RuntimeRunning).toBe("succeeded");
      expect(h.log.lines).toContain("warn Could not start Docker (no systemd); waiting in case it is starting");
    });
  });

  describe("WorkspaceReady", () => {
    it("creates only the missing directory", async () => {
      const h = new Harness();
      h.workspace.dirs.delete(h.config.stateDir);

      const report = await h.run();

      expect(h.workspace.created).toEqual([h.config.stateDir]);
      expect(report.executed[3].result).toEqual({ outcome: "succeeded", reason: `created ${h.config.stateDir}` });
    });

    it("fails with DirectoryCreateFailed", async () => {
      const h = new Harness();
      h.workspace.dirs.clear();
      h.workspace.failing.add(h.config.workspaceDir);

      const report = await h.run();

      expect(report.abortedAt).toBe("WorkspaceReady");
      expect(report.executed[3].result).toEqual({
        outcome: "failed",
        error: "DirectoryCreateFailed",
        reason: `cannot create ${h.config.workspaceDir}: EACCES: permission denied`,
      });
    });
  });

  it("fails ConfigWritten when the document cannot be written", async () => {
    const h = new Harness();
    h.writeError = new Error("EROFS: read-only file system");

    const report = await h.run();

    expect(report.abortedAt).toBe("ConfigWritten");
    expect(report.executed[4].result).toEqual({
      outcome: "failed",
      error: "ConfigWriteFailed",
      reason: `cannot write ${h.config.composeFile}: EROFS: read-only file system`,
    });
    expect(h.launcher.calls).toEqual([]);
  });

  describe("ImagesPulled", () => {
    it("continues past a failed pull under the continue policy", async () => {
      const h = new Harness({ pullFailure: "continue" });
      h.launcher.failingPulls.add(RUNTIME_REF);

      const report = await h.run();

      expect(report.executed[5].result).toEqual({
        outcome: "failed",
        error: "PullFailed",
        reason: `could not pull ${RUNTIME_REF}`,
        advisory: true,
      });
      expect(report.state.ImagesPulled).toBe("failed");
      expect(report.state.Deployed).toBe("succeeded");
      expect(report.abortedAt).toBeNull();
      expect(report.url).toBe("http://localhost:80");
      expect(h.log.lines).toContain("warn ImagesPulled");
      expect(h.log.lines).toContain("info Images were not pulled in advance; the launch will fetch them");
    });

    it("stops under the abort policy; Deployed is blocked with nothing missing", async () => {
      const h = new Harness({ pullFailure: "abort" });
      h.launcher.failingPulls.add(APP_REF);

      const report = await h.run();

      expect(report.abortedAt).toBe("ImagesPulled");
      expect(report.executed[5].result.advisory).toBeUndefined();
      expect(report.blocked).toEqual([{ step: "Deployed", missing: [] }]);
      expect(h.launcher.calls).not.toContain("run openhands-app");
    });

    it("asks under the prompt policy", async () => {
      const accepted = new Harness({ pullFailure: "prompt" }, [true]);
      accepted.launcher.failingPulls.add(APP_REF);
      expect((await accepted.run()).abortedAt).toBeNull();

      const refused = new Harness({ pullFailure: "prompt" }, [false]);
      refused.launcher.failingPulls.add(APP_REF);
      const report = await refused.run();
      expect(report.abortedAt).toBe("ImagesPulled");
      expect(report.executed[5].result).toEqual({
        outcome: "skipped",
        error: "UserDeclined",
        reason: `could not pull ${APP_REF}; operator chose to stop`,
      });
    });
  });

  describe("Deployed", () => {
    it("stops and removes a running container with the reserved name only", async () => {
      const h = new Harness();
      h.launcher.containers = [
        { name: "openhands-app", status: "Up 2 hours" },
        { name: "openhands-app-old", status: "Exited (0) 3 days ago" },
      ];

      await h.run();

      expect(h.launcher.calls.slice(2)).toEqual([
        "list openhands-app",
        "stop openhands-app",
        "rm openhands-app",
        "run openhands-app",
      ]);
    });

    it("removes an exited container without stopping it", async () => {
      const h = new Harness();
      h.launcher.containers = [{ name: "openhands-app", status: "Exited (137) 5 minutes ago" }];

      await h.run();

      expect(h.launcher.calls.slice(2)).toEqual(["list openhands-app", "rm openhands-app", "run openhands-app"]);
    });

    it("attaches the log tail to a failed launch", async () => {
      const h = new Harness();
      h.launcher.runError = new Error("Failed to start container: port is already allocated");

      const report = await h.run();

      expect(report.abortedAt).toBe("Deployed");
      expect(report.executed[6].result).toEqual({
        outcome: "failed",
        error: "LaunchFailed",
        reason: "Failed to start container: port is already allocated",
        logTail: "boot failed\n",
      });
      expect(h.launcher.calls.at(-1)).toBe("logs openhands-app 50");
      expect(h.log.lines).toContain("block Deployed container log");
    });

    it("stops polling once the container has exited", async () => {
      const h = new Harness();
      h.launcher.statuses = ["created", "exited"];

      const report = await h.run();

      expect(report.executed[6].result).toEqual({
        outcome: "failed",
        error: "StatusVerificationFailed",
        reason: "container status 'exited' after 2 check(s)",
        logTail: "boot failed\n",
      });
      expect(h.sleeps).toEqual([2000, 2000]);
    });

    it("gives up after the launch attempt ceiling", async () => {
      const h = new Harness();
      h.launcher.statuses = ["created"];

      const report = await h.run();

      expect(report.executed[6].result.reason).toBe("container status 'created' after 15 check(s)");
      expect(h.sleeps).toHaveLength(15);
      expect(report.url).toBeNull();
    });
  });

  describe("errors thrown by a step", () => {
    it("keep the kind of a ProvisionError", async () => {
      const h = new Harness();
      h.probe.installError = new ProvisionError("ProbeTimeout", "docker --version did not answer in time");

      const report = await h.run();

      expect(report.abortedAt).toBe("RuntimeInstalled");
      expect(report.executed[1].result).toEqual({
        outcome: "failed",
        error: "ProbeTimeout",
        reason: "docker --version did not answer in time",
      });
    });

    it("take the step's failure kind otherwise", async () => {
      const h = new Harness();
      h.probe.installError = new Error("spawn EACCES");

      const report = await h.run();

      expect(report.executed[1].result).toEqual({ outcome: "failed", error: "InstallFailed", reason: "spawn EACCES" });
    });
  });

  it("does not dispatch a step whose prerequisites never ran", async () => {
    const h = new Harness();
    const deployOnly = PIPELINE.filter((step) => step.name === "Deployed");

    const report = await h.run(deployOnly);

    expect(report.executed).toEqual([]);
    expect(report.abortedAt).toBe("Deployed");
    expect(report.blocked).toEqual([
      {
        step: "Deployed",
        missing: ["VirtualizationReady", "RuntimeInstalled", "RuntimeRunning", "WorkspaceReady", "ConfigWritten"],
      },
    ]);
    expect(h.launcher.calls).toEqual([]);
  });

  it("runs a narrowed pipeline without the host checks", async () => {
    const h = new Harness();
    const report = await h.run(subPipeline(["ConfigWritten", "Deployed"]));

    expect(report.executed.map((e) => e.step)).toEqual(["ConfigWritten", "Deployed"]);
    expect(h.probe.runningChecks).toBe(0);
    expect(report.url).toBe("http://localhost:80");
  });
});

describe("allowsContinuation", () => {
  it("only lets success and advisory pull failures through", () => {
    expect(allowsContinuation({ outcome: "succeeded" })).toBe(true);
    expect(allowsContinuation({ outcome: "failed", error: "PullFailed", advisory: true })).toBe(true);
    expect(allowsContinuation({ outcome: "failed", error: "PullFailed" })).toBe(false);
    expect(allowsContinuation({ outcome: "failed", error: "LaunchFailed", advisory: true })).toBe(false);
    expect(allowsContinuation({ outcome: "skipped", error: "UserDeclined" })).toBe(false);
  });
});

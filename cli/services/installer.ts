import { runCommand, type CommandOutput } from "../utils/exec.ts"
import { currentPlatform, type Platform } from "../utils/system.ts"
import type { Logger } from "../utils/logger.ts"

export interface InstallOutcome {
  ok: boolean
  restartRequired?: boolean
  detail?: string
}

export interface Installer {
  installVirtualization(): Promise<InstallOutcome>
  installRuntime(): Promise<InstallOutcome>
  startRuntime(): Promise<InstallOutcome>
}

type Invocation = [cmd: string, args: string[]]

const DOCKER_DESKTOP_EXE = "C:\\Program Files\\Docker\\Docker\\Docker Desktop.exe"

/** Package-manager invocations per platform; run in order, first failure stops. */
export const INSTALL_PLANS: Record<Platform, {
  virtualization: Invocation[] | null
  runtime: Invocation[]
  start: Invocation[]
  virtualizationNeedsRestart: boolean
}> = {
  linux: {
    virtualization: [],
    runtime: [
      ["sudo", ["apt-get", "update"]],
      ["sudo", ["apt-get", "install", "-y", "docker.io", "docker-compose-v2"]],
      ["sudo", ["usermod", "-aG", "docker", process.env.USER ?? "root"]],
    ],
    start: [["sudo", ["systemctl", "start", "docker"]]],
    virtualizationNeedsRestart: false,
  },
  win32: {
    virtualization: [["wsl", ["--install", "--no-distribution"]]],
    runtime: [
      ["winget", ["install", "-e", "--id", "Docker.DockerDesktop", "--accept-package-agreements", "--accept-source-agreements"]],
    ],
    start: [["cmd", ["/c", "start", "", DOCKER_DESKTOP_EXE]]],
    virtualizationNeedsRestart: true,
  },
  darwin: {
    // Hypervisor.framework support is a hardware property
    virtualization: null,
    runtime: [["brew", ["install", "--cask", "docker"]]],
    start: [["open", ["-a", "Docker"]]],
    virtualizationNeedsRestart: false,
  },
}

export class PlatformInstaller implements Installer {
  constructor(
    private readonly logger: Logger,
    private readonly platform: Platform | null = currentPlatform(),
  ) {}

  async installVirtualization(): Promise<InstallOutcome> {
    const plan = this.plan()
    if (!plan) return this.unsupported()
    if (plan.virtualization === null) {
      return { ok: false, detail: "virtualization cannot be enabled from software on this platform" }
    }
    const outcome = await this.runAll(plan.virtualization)
    return outcome.ok ? { ...outcome, restartRequired: plan.virtualizationNeedsRestart } : outcome
  }

  async installRuntime(): Promise<InstallOutcome> {
    const plan = this.plan()
    if (!plan) return this.unsupported()
    const outcome = await this.runAll(plan.runtime)
    if (outcome.ok && this.platform === "linux") {
      this.logger.warn("Added the current user to the docker group; a new login session may be needed for it to apply")
    }
    return outcome
  }

  async startRuntime(): Promise<InstallOutcome> {
    const plan = this.plan()
    if (!plan) return this.unsupported()
    return this.runAll(plan.start)
  }

  private plan() {
    return this.platform ? INSTALL_PLANS[this.platform] : null
  }

  private unsupported(): InstallOutcome {
    return { ok: false, detail: `unsupported platform ${process.platform}` }
  }

  private async runAll(invocations: Invocation[]): Promise<InstallOutcome> {
    for (const [cmd, args] of invocations) {
      this.logger.info(`$ ${cmd} ${args.join(" ")}`)
      const output: CommandOutput = await runCommand(cmd, args, { stdout: "inherit", stderr: "piped" })
      if (!output.success) {
        return { ok: false, detail: `${cmd} exited with ${output.code}: ${output.stderr.trim()}` }
      }
    }
    return { ok: true }
  }
}

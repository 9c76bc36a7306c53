import { runCommand } from "../utils/exec.ts"
import { getDockerVersion, parseDockerVersion, pingDaemon } from "../utils/docker.ts"
import { currentPlatform, type Platform } from "../utils/system.ts"
import { ProvisionError } from "../runtime/errors.ts"

export interface RuntimeProbe {
  isVirtualizationEnabled(): Promise<boolean>
  isRuntimeInstalled(): Promise<boolean>
  /** False when the daemon does not answer within the probe timeout. */
  isRuntimeRunning(): Promise<boolean>
  currentVersion(): Promise<string | null>
}

export class DockerProbe implements RuntimeProbe {
  constructor(
    private readonly timeoutMs: number,
    private readonly platform: Platform | null = currentPlatform(),
  ) {}

  async isVirtualizationEnabled(): Promise<boolean> {
    switch (this.platform) {
      case "win32": {
        const output = await runCommand("wsl", ["--status"], { stdout: "piped", stderr: "piped", timeoutMs: this.timeoutMs })
        if (output.timedOut) throw new ProvisionError("ProbeTimeout", "wsl --status did not answer in time")
        return output.success
      }
      case "darwin": {
        const output = await runCommand("sysctl", ["-n", "kern.hv_support"], { stdout: "piped", stderr: "piped", timeoutMs: this.timeoutMs })
        if (output.timedOut) throw new ProvisionError("ProbeTimeout", "sysctl did not answer in time")
        return output.success && output.stdout.trim() === "1"
      }
      default:
        // The Linux engine runs natively
        return true
    }
  }

  async isRuntimeInstalled(): Promise<boolean> {
    const output = await getDockerVersion(this.timeoutMs)
    if (output.timedOut) throw new ProvisionError("ProbeTimeout", "docker --version did not answer in time")
    return output.success
  }

  async isRuntimeRunning(): Promise<boolean> {
    const output = await pingDaemon(this.timeoutMs)
    return output.success
  }

  async currentVersion(): Promise<string | null> {
    const output = await getDockerVersion(this.timeoutMs)
    if (!output.success) return null
    return parseDockerVersion(output.stdout)
  }
}

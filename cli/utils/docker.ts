import { runCommand, type CommandOptions, type CommandOutput } from "./exec.ts"
import type { ContainerSummary } from "../runtime/types.ts"

export const dockerCmd = (args: string[], opts: CommandOptions = {}): Promise<CommandOutput> =>
  runCommand("docker", args, { stdout: "piped", stderr: "piped", ...opts })

export async function getDockerVersion(timeoutMs?: number): Promise<CommandOutput> {
  return dockerCmd(["--version"], { timeoutMs })
}

/** `docker info` only succeeds when the daemon answers. */
export async function pingDaemon(timeoutMs?: number): Promise<CommandOutput> {
  return dockerCmd(["info", "--format", "{{.ServerVersion}}"], { timeoutMs })
}

// "Docker version 24.0.7, build afdd53b" -> "24.0.7"
export function parseDockerVersion(text: string): string | null {
  const match = text.match(/version\s+([0-9][^\s,]*)/i)
  return match ? match[1] : null
}

export async function findContainersByName(nameFilter: string): Promise<ContainerSummary[]> {
  const output = await dockerCmd(["ps", "-a", "--filter", `name=${nameFilter}`, "--format", "{{.Names}}|{{.Status}}"])
  if (!output.success) {
    throw new Error(`docker ps failed: ${output.stderr.trim()}`)
  }
  return output.stdout
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => {
      const [name, ...rest] = line.split("|")
      return { name, status: rest.join("|") }
    })
}

export async function getContainerIdByName(name: string): Promise<string | null> {
  const output = await dockerCmd(["inspect", "--format", "{{.Id}}", name], { stderr: "null" })
  if (!output.success) return null
  const id = output.stdout.trim()
  return id || null
}

export async function getContainerStatus(nameOrId: string): Promise<string> {
  const output = await dockerCmd(["inspect", "--format", "{{.State.Status}}", nameOrId], { stderr: "null" })
  if (!output.success) return "unknown"
  return output.stdout.trim() || "unknown"
}

function isMissingContainer(output: CommandOutput): boolean {
  return /no such container/i.test(output.stderr)
}

// Stopping a stopped container succeeds; a missing one is not an error either
export async function stopContainer(nameOrId: string): Promise<void> {
  const output = await dockerCmd(["stop", nameOrId])
  if (!output.success && !isMissingContainer(output)) {
    throw new Error(`Failed to stop container ${nameOrId}: ${output.stderr.trim()}`)
  }
}

export async function removeContainer(nameOrId: string, force = false): Promise<void> {
  const args = ["rm", nameOrId]
  if (force) args.splice(1, 0, "-f")
  const output = await dockerCmd(args)
  if (!output.success && !isMissingContainer(output)) {
    throw new Error(`Failed to remove container ${nameOrId}: ${output.stderr.trim()}`)
  }
}

export async function pullImage(ref: string): Promise<CommandOutput> {
  return dockerCmd(["pull", ref], { stdout: "inherit", stderr: "piped" })
}

export async function runDetached(runArgs: string[]): Promise<string> {
  const output = await dockerCmd(runArgs)
  if (!output.success) {
    throw new Error(`Failed to start container: ${output.stderr.trim()}`)
  }
  return output.stdout.trim().split("\n").pop() ?? ""
}

export async function getContainerLogs(nameOrId: string, tail?: number): Promise<string> {
  const args = ["logs"]
  if (tail !== undefined) args.push("--tail", String(tail))
  args.push(nameOrId)
  const output = await dockerCmd(args)
  return output.stdout + output.stderr
}

export function followContainerLogs(nameOrId: string, tail?: number): Promise<CommandOutput> {
  const args = ["logs", "-f"]
  if (tail !== undefined) args.push("--tail", String(tail))
  args.push(nameOrId)
  return dockerCmd(args, { stdout: "inherit", stderr: "inherit" })
}

import * as Docker from "../utils/docker.ts"
import * as Compose from "../utils/docker-compose.ts"
import type { ContainerSummary, DeploymentConfig, LaunchMode } from "../runtime/types.ts"

export interface ContainerLauncher {
  listContainers(nameFilter: string): Promise<ContainerSummary[]>
  stop(name: string): Promise<void>
  remove(name: string): Promise<void>
  pull(imageRef: string): Promise<boolean>
  /** Starts the container described by `config`; resolves to its id. */
  run(config: DeploymentConfig): Promise<string>
  logs(name: string, tail?: number): Promise<string>
  status(name: string): Promise<string>
  /** Stops and removes the deployment the way it was started. */
  down(config: DeploymentConfig): Promise<void>
}

/** How the container gets started: chosen once per run, never mixed. */
export interface LaunchStrategy {
  readonly kind: LaunchMode
  launch(config: DeploymentConfig): Promise<string>
  teardown(config: DeploymentConfig): Promise<void>
}

export class DirectInvocation implements LaunchStrategy {
  readonly kind = "direct" as const

  async launch(config: DeploymentConfig): Promise<string> {
    return Docker.runDetached(Compose.renderRunArgs(config))
  }

  async teardown(config: DeploymentConfig): Promise<void> {
    await Docker.stopContainer(config.containerName)
    await Docker.removeContainer(config.containerName)
  }
}

export class DeclarativeCompose implements LaunchStrategy {
  readonly kind = "compose" as const

  async launch(config: DeploymentConfig): Promise<string> {
    const output = await Compose.up(config.composeFile, config.projectName)
    if (!output.success) {
      throw new Error(`docker compose up failed: ${output.stderr.trim()}`)
    }
    const id = await Docker.getContainerIdByName(config.containerName)
    if (!id) {
      throw new Error(`Container started but failed to inspect ID for ${config.containerName}`)
    }
    return id
  }

  async teardown(config: DeploymentConfig): Promise<void> {
    const output = await Compose.down(config.composeFile, config.projectName)
    if (!output.success) {
      throw new Error(`docker compose down failed: ${output.stderr.trim()}`)
    }
  }
}

export function createLaunchStrategy(mode: LaunchMode): LaunchStrategy {
  return mode === "compose" ? new DeclarativeCompose() : new DirectInvocation()
}

export class DockerLauncher implements ContainerLauncher {
  constructor(private readonly strategy: LaunchStrategy) {}

  listContainers(nameFilter: string): Promise<ContainerSummary[]> {
    return Docker.findContainersByName(nameFilter)
  }

  stop(name: string): Promise<void> {
    return Docker.stopContainer(name)
  }

  remove(name: string): Promise<void> {
    return Docker.removeContainer(name)
  }

  async pull(imageRef: string): Promise<boolean> {
    const output = await Docker.pullImage(imageRef)
    return output.success
  }

  run(config: DeploymentConfig): Promise<string> {
    return this.strategy.launch(config)
  }

  logs(name: string, tail?: number): Promise<string> {
    return Docker.getContainerLogs(name, tail)
  }

  status(name: string): Promise<string> {
    return Docker.getContainerStatus(name)
  }

  down(config: DeploymentConfig): Promise<void> {
    return this.strategy.teardown(config)
  }
}

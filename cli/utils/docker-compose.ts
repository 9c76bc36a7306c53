import { dirname } from "node:path"
import { Document, Scalar, isScalar } from "yaml"
import { dockerCmd } from "./docker.ts"
import { DockerComposeSchema } from "./docker-compose.schema.ts"
import type { DeploymentConfig, ImageRef, RestartPolicy } from "../runtime/types.ts"

export const DOCKER_SOCKET = "/var/run/docker.sock"
export const CONTAINER_STATE_DIR = "/.openhands-state"
export const CONTAINER_WORKSPACE_DIR = "/opt/workspace_base"
export const HOST_GATEWAY_ALIAS = "host.docker.internal:host-gateway"

/** Everything both launch modes need, derived once so they cannot drift. */
export interface ServiceSpec {
  image: string
  containerName: string
  environment: [key: string, value: string][]
  volumes: string[]
  ports: string[]
  extraHosts: string[]
  restart: RestartPolicy
}

export const imageRef = (ref: ImageRef): string => `${ref.repository}:${ref.tag}`

// Docker Desktop on Windows takes host paths with forward slashes
export function dockerHostPath(path: string, platform: string = process.platform): string {
  return platform === "win32" ? path.replaceAll("\\", "/") : path
}

export function serviceSpec(config: DeploymentConfig, platform: string = process.platform): ServiceSpec {
  const workspaceDir = dockerHostPath(config.workspaceDir, platform)
  const stateDir = dockerHostPath(config.stateDir, platform)
  const env = new Map<string, string>([
    ["SANDBOX_RUNTIME_CONTAINER_IMAGE", imageRef(config.runtimeImage)],
    ["LOG_ALL_EVENTS", String(config.logAllEvents)],
    ["SANDBOX_USER_ID", config.sandboxUserId],
    ["WORKSPACE_MOUNT_PATH", workspaceDir],
  ])
  // Extra assignments keep a stable order; a known key keeps its position
  for (const key of Object.keys(config.env).sort()) {
    env.set(key, config.env[key])
  }

  return {
    image: imageRef(config.appImage),
    containerName: config.containerName,
    environment: [...env.entries()],
    volumes: [
      `${DOCKER_SOCKET}:${DOCKER_SOCKET}`,
      `${stateDir}:${CONTAINER_STATE_DIR}`,
      `${workspaceDir}:${CONTAINER_WORKSPACE_DIR}`,
    ],
    ports: [`${config.hostPort}:${config.containerPort}`],
    extraHosts: [HOST_GATEWAY_ALIAS],
    restart: config.restart,
  }
}

/** Compose document for the deployment. Same input, same bytes. */
export function renderComposeDocument(config: DeploymentConfig): string {
  const spec = serviceSpec(config)
  const compose = DockerComposeSchema.parse({
    services: {
      [config.serviceName]: {
        image: spec.image,
        container_name: spec.containerName,
        environment: Object.fromEntries(spec.environment),
        volumes: spec.volumes,
        ports: spec.ports,
        extra_hosts: spec.extraHosts,
        tty: true,
        stdin_open: true,
        restart: spec.restart,
      },
    },
  })

  const doc = new Document(compose)
  // "80:3000" and "no" read differently under YAML 1.1 parsers
  const quoted: unknown[][] = [
    ["services", config.serviceName, "restart"],
    ...spec.ports.map((_, i) => ["services", config.serviceName, "ports", i]),
  ]
  for (const path of quoted) {
    const node = doc.getIn(path, true)
    if (isScalar(node)) node.type = Scalar.QUOTE_DOUBLE
  }
  return doc.toString()
}

/** `docker run` arguments equivalent to the compose document. */
export function renderRunArgs(config: DeploymentConfig): string[] {
  const spec = serviceSpec(config)
  return [
    "run",
    "-d",
    "--interactive",
    "--tty",
    "--name", spec.containerName,
    ...spec.environment.flatMap(([k, v]) => ["-e", `${k}=${v}`]),
    ...spec.volumes.flatMap((v) => ["-v", v]),
    ...spec.ports.flatMap((p) => ["-p", p]),
    ...spec.extraHosts.flatMap((h) => ["--add-host", h]),
    "--restart", spec.restart,
    ...config.dockerArgs,
    spec.image,
  ]
}

function composeCmd(args: string[], composeFile: string, projectName?: string) {
  const cmdArgs = ["compose", "-f", composeFile]
  if (projectName) {
    cmdArgs.push("-p", projectName)
  }
  cmdArgs.push(...args)

  return dockerCmd(cmdArgs, {
    cwd: dirname(composeFile),
  })
}

export function up(composeFilePath: string, projectName?: string) {
  return composeCmd(["up", "-d"], composeFilePath, projectName)
}

export function down(composeFilePath: string, projectName?: string) {
  return composeCmd(["down"], composeFilePath, projectName)
}

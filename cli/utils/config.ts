import { join } from "node:path";
import deepmerge from "deepmerge";
import fs from "fs-extra";
import { parse, stringify } from "smol-toml";
import { z } from "zod";
import { ConfigError, errorMessage } from "../runtime/errors.ts";
import type { DeploymentConfig, LaunchMode, PullFailurePolicy } from "../runtime/types.ts";
import { parseArgsString } from "./args.ts";
import { getEnvVars } from "./system.ts";
import { composeFilePath, expandHome, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE_NAME } from "./paths.ts";

const SettingsSchema = z.object({
  container_name: z.string().min(1),
  project_name: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  workspace_dir: z.string().min(1),
  state_dir: z.string().min(1),
  sandbox_user_id: z.union([z.string().min(1), z.number().int()]).transform(String),
  log_all_events: z.boolean(),
  restart: z.enum(["no", "unless-stopped"]),
  launch: z.enum(["direct", "compose"]),
  pull_failure: z.enum(["prompt", "continue", "abort"]),
  docker_args: z.string(),
  images: z.object({
    app: z.string().min(1),
    app_tag: z.string().min(1),
    runtime: z.string().min(1),
    runtime_tag: z.string().min(1),
  }),
  env: z.record(z.string(), z.string()),
  pass_env: z.array(z.string()),
  poll: z.object({
    runtime_interval_ms: z.number().int().min(0),
    runtime_attempts: z.number().int().min(1),
    launch_interval_ms: z.number().int().min(0),
    launch_attempts: z.number().int().min(1),
    probe_timeout_ms: z.number().int().min(1),
  }),
});

export type Settings = z.infer<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: Settings = {
  container_name: "openhands-app",
  project_name: "berth",
  port: 80,
  workspace_dir: "~/Docker_Workspace",
  state_dir: "~/.openhands-state",
  sandbox_user_id: "1000",
  log_all_events: true,
  restart: "no",
  launch: "direct",
  pull_failure: "prompt",
  docker_args: "",
  images: {
    app: "docker.all-hands.dev/all-hands-ai/openhands",
    app_tag: "0.27",
    runtime: "docker.all-hands.dev/all-hands-ai/runtime",
    runtime_tag: "0.27-nikolaik",
  },
  env: {},
  pass_env: [],
  poll: {
    runtime_interval_ms: 5000,
    runtime_attempts: 60,
    launch_interval_ms: 2000,
    launch_attempts: 15,
    probe_timeout_ms: 10000,
  },
};

export const CONTAINER_PORT = 3000;

const MERGE_OPTS = { arrayMerge: (_target: unknown[], source: unknown[]) => source };

type Env = Record<string, string | undefined>;
type Layer = Record<string, unknown>;

export interface CliOverrides {
  port?: number;
  workspaceDir?: string;
  stateDir?: string;
  launch?: LaunchMode;
  pullFailure?: PullFailurePolicy;
  local?: boolean;
}

function validate(source: string, value: unknown): Settings {
  const result = SettingsSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(source, issues);
  }
  return result.data;
}

async function readTomlLayer(path: string): Promise<Layer | null> {
  if (!(await fs.pathExists(path))) return null;
  const content = await fs.readFile(path, "utf8");
  try {
    return parse(content);
  } catch (e) {
    throw new ConfigError(path, errorMessage(e), { cause: e });
  }
}

/**
 * Defaults, then `<settings dir>/config.toml`, then `./berth.config.toml`.
 * Later files take precedence; arrays are replaced, tables merged.
 */
export async function loadSettings(cwd = process.cwd(), env: Env = process.env): Promise<Settings> {
  let merged: Layer = { ...DEFAULT_SETTINGS };
  for (const path of [GLOBAL_CONFIG_FILE(env), join(cwd, LOCAL_CONFIG_FILE_NAME)]) {
    const layer = await readTomlLayer(path);
    if (layer) {
      merged = deepmerge<Layer>(merged, layer, MERGE_OPTS);
      validate(path, merged);
    }
  }
  return validate("defaults", merged);
}

function parseBool(name: string, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  throw new ConfigError(name, `expected a boolean, got '${raw}'`);
}

function envLayer(env: Env): Layer {
  const layer: Layer = {};
  const images: Layer = {};
  if (env.BERTH_APP_TAG) images.app_tag = env.BERTH_APP_TAG;
  if (env.BERTH_RUNTIME_TAG) images.runtime_tag = env.BERTH_RUNTIME_TAG;
  if (Object.keys(images).length > 0) layer.images = images;
  if (env.SANDBOX_USER_ID) layer.sandbox_user_id = env.SANDBOX_USER_ID;
  if (env.BERTH_WORKSPACE_DIR) layer.workspace_dir = env.BERTH_WORKSPACE_DIR;
  if (env.BERTH_STATE_DIR) layer.state_dir = env.BERTH_STATE_DIR;
  if (env.LOG_ALL_EVENTS) layer.log_all_events = parseBool("LOG_ALL_EVENTS", env.LOG_ALL_EVENTS);
  if (env.BERTH_PORT) layer.port = Number(env.BERTH_PORT);
  return layer;
}

function cliLayer(overrides: CliOverrides): Layer {
  const layer: Layer = {};
  if (overrides.port !== undefined) layer.port = overrides.port;
  if (overrides.workspaceDir) layer.workspace_dir = overrides.workspaceDir;
  if (overrides.stateDir) layer.state_dir = overrides.stateDir;
  if (overrides.launch) layer.launch = overrides.launch;
  if (overrides.pullFailure) layer.pull_failure = overrides.pullFailure;
  return layer;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child && typeof child === "object") deepFreeze(child);
  }
  return Object.freeze(value);
}

/**
 * Applies environment overrides and command-line flags to the settings and
 * returns the immutable config every step reads from.
 */
export function resolveDeploymentConfig(
  settings: Settings,
  opts: { env?: Env; cwd?: string; home?: string; overrides?: CliOverrides } = {},
): DeploymentConfig {
  const env = opts.env ?? process.env;
  const overrides = opts.overrides ?? {};

  let layered: Layer = deepmerge<Layer>({ ...settings }, envLayer(env), MERGE_OPTS);
  layered = deepmerge<Layer>(layered, cliLayer(overrides), MERGE_OPTS);
  const s = validate("environment/flags", layered);

  let dockerArgs: string[];
  try {
    dockerArgs = parseArgsString(s.docker_args);
  } catch (e) {
    throw new ConfigError("docker_args", errorMessage(e), { cause: e });
  }

  return deepFreeze({
    containerName: s.container_name,
    serviceName: s.container_name,
    projectName: s.project_name,
    appImage: { repository: s.images.app, tag: s.images.app_tag },
    runtimeImage: { repository: s.images.runtime, tag: s.images.runtime_tag },
    workspaceDir: expandHome(s.workspace_dir, opts.home),
    stateDir: expandHome(s.state_dir, opts.home),
    hostPort: s.port,
    containerPort: CONTAINER_PORT,
    sandboxUserId: s.sandbox_user_id,
    logAllEvents: s.log_all_events,
    restart: s.restart,
    env: { ...getEnvVars(s.pass_env, env), ...s.env },
    launch: s.launch,
    pullFailure: s.pull_failure,
    composeFile: composeFilePath(overrides.local ?? false, opts.cwd, env),
    dockerArgs,
    poll: {
      runtimeIntervalMs: s.poll.runtime_interval_ms,
      runtimeAttempts: s.poll.runtime_attempts,
      launchIntervalMs: s.poll.launch_interval_ms,
      launchAttempts: s.poll.launch_attempts,
      probeTimeoutMs: s.poll.probe_timeout_ms,
    },
  });
}

export async function loadConfig(
  opts: { cwd?: string; env?: Env; overrides?: CliOverrides } = {},
): Promise<DeploymentConfig> {
  const settings = await loadSettings(opts.cwd, opts.env);
  return resolveDeploymentConfig(settings, opts);
}

/** Writes the defaults as TOML; returns false when a file exists and `force` is off. */
export async function writeDefaultSettings(env: Env = process.env, force = false): Promise<{ path: string; written: boolean }> {
  const path = GLOBAL_CONFIG_FILE(env);
  if (!force && (await fs.pathExists(path))) {
    return { path, written: false };
  }
  await fs.outputFile(path, stringify(DEFAULT_SETTINGS), "utf8");
  return { path, written: true };
}

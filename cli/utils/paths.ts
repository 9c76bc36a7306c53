import { homedir } from "node:os";
import { join, resolve } from "node:path";

export const BERTH_DIR_NAME = ".berth";
export const CONFIG_FILE_NAME = "config.toml";
export const LOCAL_CONFIG_FILE_NAME = "berth.config.toml";
export const COMPOSE_FILE_NAME = "docker-compose.yaml";
export const LOG_FILE_NAME = "berth.log";

type Env = Record<string, string | undefined>;

// Per-user settings directory (config.toml, berth.log, generated compose file)
export const SETTINGS_DIR = (env: Env = process.env) => env.BERTH_HOME || join(homedir(), BERTH_DIR_NAME);
export const GLOBAL_CONFIG_FILE = (env: Env = process.env) => join(SETTINGS_DIR(env), CONFIG_FILE_NAME);
export const LOG_FILE = (env: Env = process.env) => join(SETTINGS_DIR(env), LOG_FILE_NAME);

/**
 * Where the compose document is written.
 * @param local write beside the invocation instead of the settings directory
 */
export function composeFilePath(local: boolean, cwd = process.cwd(), env: Env = process.env): string {
  return local ? join(cwd, COMPOSE_FILE_NAME) : join(SETTINGS_DIR(env), COMPOSE_FILE_NAME);
}

export function expandHome(path: string, home = homedir()): string {
  if (path === "~") return home;
  if (path.startsWith("~/") || path.startsWith("~\\")) {
    return join(home, path.slice(2));
  }
  return resolve(path);
}

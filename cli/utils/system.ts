import { statfs } from "node:fs/promises";

export type Platform = "linux" | "win32" | "darwin";

export const MIN_FREE_DISK_GB = 10;

export function currentPlatform(platform: string = process.platform): Platform | null {
  if (platform === "linux" || platform === "win32" || platform === "darwin") return platform;
  return null;
}

export function getEnvVars(keys: string[], env: Record<string, string | undefined> = process.env): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const key of keys) {
    const val = env[key];
    if (val !== undefined) {
      vars[key] = val;
    }
  }
  return vars;
}

/** Free space available to unprivileged users on the filesystem holding `path`, in GB. */
export async function getFreeDiskGb(path: string): Promise<number> {
  const stats = await statfs(path);
  return (stats.bavail * stats.bsize) / (1024 * 1024 * 1024);
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

import fs from "fs-extra"

export interface Workspace {
  exists(path: string): Promise<boolean>
  create(path: string): Promise<void>
}

/** Host directories backed by the local filesystem. */
export const localWorkspace: Workspace = {
  async exists(path) {
    if (!(await fs.pathExists(path))) return false
    const stat = await fs.stat(path)
    return stat.isDirectory()
  },
  create(path) {
    return fs.ensureDir(path)
  },
}

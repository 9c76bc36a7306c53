import { tmpdir } from "node:os"
import { join } from "node:path"
import fs from "fs-extra"
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest"
import { createDockerDeps } from "../commands/common.ts"
import { Orchestrator } from "../runtime/orchestrator.ts"
import { subPipeline } from "../runtime/steps.ts"
import { DEFAULT_SETTINGS, resolveDeploymentConfig } from "../utils/config.ts"
import type { Logger } from "../utils/logger.ts"
import { createFixedPrompter } from "../utils/prompt.ts"
import { localWorkspace } from "./workspace.ts"

let tempDir: string

beforeEach(async () => {
  tempDir = await fs.mkdtemp(join(tmpdir(), "berth-workspace-"))
})

afterEach(async () => {
  await fs.remove(tempDir)
})

describe("localWorkspace", () => {
  test("an existing directory is left untouched", async () => {
    await fs.outputFile(join(tempDir, "ws", "notes.txt"), "keep me")

    expect(await localWorkspace.exists(join(tempDir, "ws"))).toBe(true)
    await localWorkspace.create(join(tempDir, "ws"))
    expect(await fs.readFile(join(tempDir, "ws", "notes.txt"), "utf8")).toBe("keep me")
  })

  test("a missing directory is created with its parents", async () => {
    const dir = join(tempDir, "a", "b", "ws")

    expect(await localWorkspace.exists(dir)).toBe(false)
    await localWorkspace.create(dir)
    expect(await localWorkspace.exists(dir)).toBe(true)
  })

  test("a file at the path is not a workspace and cannot become one", async () => {
    const file = join(tempDir, "ws")
    await fs.outputFile(file, "")

    expect(await localWorkspace.exists(file)).toBe(false)
    await expect(localWorkspace.create(file)).rejects.toMatchObject({ code: "EEXIST" })
  })
})

test("WorkspaceReady fails when a file sits at the workspace path", async () => {
  const file = join(tempDir, "ws")
  await fs.outputFile(file, "")
  const config = {
    ...resolveDeploymentConfig(DEFAULT_SETTINGS, { env: {}, cwd: tempDir, home: tempDir }),
    workspaceDir: file,
    stateDir: join(tempDir, "state"),
  }
  const logger: Logger = {
    title: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    step: vi.fn(),
    block: vi.fn(),
  }

  const deps = createDockerDeps(config, logger, createFixedPrompter(false))
  const report = await new Orchestrator(deps, subPipeline(["WorkspaceReady"])).run()

  expect(report.state.WorkspaceReady).toBe("failed")
  const [{ result }] = report.executed
  expect(result.error).toBe("DirectoryCreateFailed")
  expect(result.reason?.startsWith(`cannot create ${file}: `)).toBe(true)
  expect(await fs.pathExists(join(tempDir, "state"))).toBe(false)
})

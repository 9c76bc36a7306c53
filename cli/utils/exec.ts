import { spawn } from "node:child_process"

const MAX_CAPTURE_BYTES = 1024 * 1024

export type StdioMode = "piped" | "inherit" | "null"

export interface CommandOptions {
  cwd?: string
  env?: Record<string, string>
  stdout?: StdioMode
  stderr?: StdioMode
  timeoutMs?: number
}

export interface CommandOutput {
  success: boolean
  code: number
  stdout: string
  stderr: string
  timedOut: boolean
}

function toStdio(mode: StdioMode | undefined): "pipe" | "inherit" | "ignore" {
  if (mode === "inherit") return "inherit"
  if (mode === "null") return "ignore"
  return "pipe"
}

function appendLimited(chunks: Buffer[], chunk: Buffer, state: { bytes: number }): void {
  if (state.bytes >= MAX_CAPTURE_BYTES) return
  const keep = Math.min(chunk.byteLength, MAX_CAPTURE_BYTES - state.bytes)
  chunks.push(chunk.subarray(0, keep))
  state.bytes += keep
}

/**
 * Runs a command to completion. A missing binary or a non-zero exit is
 * reported through `success`/`code`, never thrown.
 */
export function runCommand(cmd: string, args: string[], opts: CommandOptions = {}): Promise<CommandOutput> {
  return new Promise((resolve) => {
    const child = spawn(cmd, args, {
      cwd: opts.cwd,
      env: opts.env ? { ...process.env, ...opts.env } : process.env,
      stdio: ["ignore", toStdio(opts.stdout), toStdio(opts.stderr)],
    })

    const stdoutChunks: Buffer[] = []
    const stderrChunks: Buffer[] = []
    const stdoutState = { bytes: 0 }
    const stderrState = { bytes: 0 }
    child.stdout?.on("data", (chunk: Buffer) => appendLimited(stdoutChunks, chunk, stdoutState))
    child.stderr?.on("data", (chunk: Buffer) => appendLimited(stderrChunks, chunk, stderrState))

    let timedOut = false
    const timeout = opts.timeoutMs && opts.timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true
          child.kill("SIGKILL")
        }, opts.timeoutMs)
      : null

    let settled = false
    const settle = (out: CommandOutput) => {
      if (settled) return
      settled = true
      if (timeout) clearTimeout(timeout)
      resolve(out)
    }

    child.on("error", (err) => {
      // ENOENT and friends: the binary could not be started
      settle({ success: false, code: 127, stdout: "", stderr: err.message, timedOut })
    })

    child.on("close", (code) => {
      const exitCode = code ?? 1
      settle({
        success: exitCode === 0 && !timedOut,
        code: exitCode,
        stdout: Buffer.concat(stdoutChunks).toString("utf8"),
        stderr: Buffer.concat(stderrChunks).toString("utf8"),
        timedOut,
      })
    })
  })
}

import { spawn, type ChildProcess } from "node:child_process"

export type RunCommandResult = {
  exitCode: number | null
  signal: NodeJS.Signals | null
  stdout: string
  stderr: string
  durationMs: number
  timedOut: boolean
  outputLimited: boolean
}

// The command runs in its own process group so that a kill reaches everything the shell started.
function killGroup(child: ChildProcess): void {
  if (child.exitCode !== null || child.signalCode !== null) return
  if (child.pid !== undefined && process.platform !== "win32") {
    try {
      process.kill(-child.pid, "SIGKILL")
      return
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "ESRCH")) throw error
    }
  }
  child.kill("SIGKILL")
}

export async function runCommand(
  command: string,
  options: { cwd: string; timeoutMs: number; maxOutputChars: number; env?: NodeJS.ProcessEnv },
): Promise<RunCommandResult> {
  const startedAt = Date.now()
  const child = spawn(command, {
    cwd: options.cwd,
    shell: true,
    env: options.env ?? process.env,
    stdio: ["ignore", "pipe", "pipe"],
    detached: process.platform !== "win32",
  })

  let stdout = ""
  let stderr = ""
  let outputLimited = false

  const append = (target: "stdout" | "stderr", chunk: Buffer) => {
    const text = chunk.toString("utf8")
    if (target === "stdout") stdout += text
    else stderr += text

    if (!outputLimited && stdout.length + stderr.length > options.maxOutputChars) {
      outputLimited = true
      killGroup(child)
    }
  }

  child.stdout?.on("data", (c: Buffer) => append("stdout", c))
  child.stderr?.on("data", (c: Buffer) => append("stderr", c))

  let timeoutHandle: NodeJS.Timeout | undefined
  let timedOut = false
  if (options.timeoutMs > 0) {
    timeoutHandle = setTimeout(() => {
      timedOut = true
      killGroup(child)
    }, options.timeoutMs)
  }

  try {
    const result = await new Promise<Pick<RunCommandResult, "exitCode" | "signal">>((resolve, reject) => {
      child.on("error", reject)
      child.on("close", (exitCode, signal) => {
        resolve({ exitCode, signal })
      })
    })

    return {
      ...result,
      stdout,
      stderr,
      timedOut,
      outputLimited,
      durationMs: Date.now() - startedAt,
    }
  } finally {
    if (timeoutHandle) clearTimeout(timeoutHandle)
  }
}

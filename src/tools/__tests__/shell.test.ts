import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { createToolRegistry } from "../index.js"
import type { ToolContext } from "../types.js"

let root: string

function registry(overrides: Partial<ToolContext> = {}) {
  return createToolRegistry({
    targetDir: root,
    enableShell: true,
    enableWrite: false,
    maxFileReadChars: 10_000,
    maxToolOutputChars: 10_000,
    shellTimeoutMs: 5000,
    ...overrides,
  })
}

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "taskloop-shell-"))
  await fs.writeFile(path.join(root, "marker.txt"), "here")
})

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true })
})

describe.skipIf(process.platform === "win32")("run_shell_command", () => {
  it("is disabled unless shell is enabled", async () => {
    const result = await registry({ enableShell: false }).dispatch({
      id: "c1",
      name: "run_shell_command",
      arguments: { command: "echo hi" },
    })
    expect(result.error).toBe("ExecutionError")
    expect(result.output).toBe("run_shell_command is disabled. Set TASKLOOP_ENABLE_SHELL=1 to enable.")
  })

  it("runs in the target directory and captures output", async () => {
    const result = await registry().dispatch({
      id: "c1",
      name: "run_shell_command",
      arguments: { command: "cat marker.txt; echo oops 1>&2; exit 3" },
    })
    expect(result.error).toBeNull()
    expect(result.output).toMatchObject({ exitCode: 3, stdout: "here", stderr: "oops\n", timedOut: false })
  })

  it("kills the command on timeout and keeps partial output", async () => {
    const startedAt = Date.now()
    const result = await registry().dispatch({
      id: "c1",
      name: "run_shell_command",
      arguments: { command: "echo partial; sleep 5", timeoutMs: 500 },
    })
    expect(Date.now() - startedAt).toBeLessThan(4000)
    expect(result.error).toBe("TimeoutError")
    expect(result.output).toMatchObject({ timedOut: true, stdout: "partial\n" })
  })

  it("stops commands that exceed the output limit", async () => {
    const result = await registry({ maxToolOutputChars: 1000 }).dispatch({
      id: "c1",
      name: "run_shell_command",
      arguments: { command: "yes taskloop" },
    })
    expect(result.error).toBeNull()
    expect(result.output).toMatchObject({ outputLimited: true, timedOut: false })
  })
})

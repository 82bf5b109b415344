import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { loadConfig, type TaskloopConfig } from "../../config.js"
import { ScriptedProvider, type ScriptStep } from "../../llm/scripted.js"
import { createTaskRuntime, runTask } from "../run-task.js"
import type { AgentEvent } from "../types.js"

let root: string

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "taskloop-run-"))
  await fs.writeFile(path.join(root, "a.txt"), "alpha")
})

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true })
})

const readThenAnswer: ScriptStep[] = [
  { toolCalls: [{ name: "read_file", arguments: { path: "a.txt" } }] },
  { content: "It says alpha." },
]

async function runtimeFor(steps: ScriptStep[], overrides: Partial<TaskloopConfig> = {}) {
  const provider = new ScriptedProvider(steps)
  const config = loadConfig({ targetDir: root, model: "mock", stream: false, ...overrides }, {})
  return { provider, runtime: await createTaskRuntime(config, { adapter: provider }) }
}

describe("runTask", () => {
  it("runs a task and hands every event to the consumer", async () => {
    const { runtime } = await runtimeFor(readThenAnswer)
    const seen: AgentEvent["type"][] = []

    const outcome = await runTask({
      runtime,
      task: "Read a.txt",
      consume: async (events) => {
        for await (const event of events) seen.push(event.type)
      },
    })

    expect(outcome.status).toBe("done")
    expect(seen.at(-1)).toBe("run_done")
    expect(outcome.messages[0].role).toBe("system")
  })

  it("offers only the selected tools", async () => {
    const { runtime, provider } = await runtimeFor([{ content: "ok" }], { tools: ["read_file", "glob"] })
    await runTask({ runtime, task: "anything" })

    expect(provider.requests[0].tools.map((t) => t.name)).toEqual(["read_file", "glob"])
    const system = provider.requests[0].messages[0]
    expect(system.role === "system" ? system.content : "").toContain("- Available tools: read_file, glob.")
  })

  it("lets the run finish before reporting a failed consumer", async () => {
    const { runtime, provider } = await runtimeFor(readThenAnswer, { eventBufferSize: 1 })

    const pending = runTask({
      runtime,
      task: "Read a.txt",
      consume: async (events) => {
        for await (const event of events) throw new Error(`renderer crashed on ${event.type}`)
      },
    })

    await expect(pending).rejects.toThrow("renderer crashed on turn_started")
    expect(provider.calls).toBe(2)
  })
})

import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { createTaskRuntime } from "../../agent/run-task.js"
import { loadConfig } from "../../config.js"
import { MOCK_REPLY, ScriptedProvider, type ScriptStep } from "../../llm/scripted.js"
import { parseClientMessage, type ServerMessage } from "../protocol.js"
import { GatewaySession } from "../server.js"

let root: string

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "taskloop-gateway-"))
  await fs.writeFile(path.join(root, "a.txt"), "alpha")
})

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true })
})

async function session(steps: ScriptStep[]) {
  const sent: ServerMessage[] = []
  const config = loadConfig({ targetDir: root, model: "mock", stream: false }, {})
  const provider = new ScriptedProvider(steps)
  const runtime = await createTaskRuntime(config, { adapter: provider })
  const gateway = new GatewaySession((message) => sent.push(message), { runtime })
  return { gateway, sent, provider }
}

describe("parseClientMessage", () => {
  it("accepts the three client messages", () => {
    expect(parseClientMessage('{"type":"run_task","task":"list files"}')).toEqual({
      ok: true,
      message: { type: "run_task", task: "list files" },
    })
    expect(parseClientMessage('{"type":"abort"}')).toEqual({ ok: true, message: { type: "abort" } })
    expect(parseClientMessage('{"type":"ping"}')).toEqual({ ok: true, message: { type: "ping" } })
  })

  it("rejects invalid JSON and unknown shapes", () => {
    const invalid = parseClientMessage("{nope")
    expect(invalid.ok).toBe(false)
    if (!invalid.ok) expect(invalid.error.startsWith("Invalid JSON:")).toBe(true)

    expect(parseClientMessage('{"type":"run_task","task":"  "}')).toEqual({
      ok: false,
      error: "Invalid message: task: task must not be empty",
    })
    const unknown = parseClientMessage('{"type":"reboot"}')
    expect(unknown.ok).toBe(false)
    if (!unknown.ok) expect(unknown.error.startsWith("Invalid message: type:")).toBe(true)
  })
})

describe("GatewaySession", () => {
  it("answers ping and reports a stray abort", async () => {
    const { gateway, sent } = await session([])
    await gateway.handle('{"type":"ping"}')
    await gateway.handle('{"type":"abort"}')
    expect(sent).toEqual([{ type: "pong" }, { type: "error", message: "No task is running" }])
  })

  it("streams a run's events and finishes with its outcome", async () => {
    const { gateway, sent } = await session([
      { toolCalls: [{ name: "read_file", arguments: { path: "a.txt" } }] },
      { content: "It says alpha." },
    ])

    await gateway.handle('{"type":"run_task","task":"Read a.txt"}')

    const events = sent.flatMap((m) => (m.type === "event" ? [m.event.type] : []))
    expect(events).toEqual([
      "turn_started",
      "turn_completed",
      "tool_call_started",
      "tool_call_finished",
      "turn_started",
      "run_done",
    ])
    expect(sent.at(-1)).toMatchObject({ type: "outcome", status: "done", exitCode: 0 })
    expect(gateway.running).toBe(false)
  })

  it("refuses a second task while one is running", async () => {
    const { gateway, sent } = await session([{ content: "done" }])
    const first = gateway.handle('{"type":"run_task","task":"one"}')
    await gateway.handle('{"type":"run_task","task":"two"}')
    await first

    expect(sent[0]).toEqual({ type: "error", message: "A task is already running" })
    expect(sent.at(-1)).toMatchObject({ type: "outcome", status: "done" })
  })

  it("aborts the running task when the connection closes", async () => {
    const holder: { gateway?: GatewaySession } = {}
    const { gateway, sent } = await session([
      () => {
        holder.gateway?.close()
        return { toolCalls: [{ name: "read_file", arguments: { path: "a.txt" } }] }
      },
    ])
    holder.gateway = gateway

    await gateway.handle('{"type":"run_task","task":"Read a.txt"}')

    expect(sent.at(-1)).toMatchObject({ type: "outcome", status: "aborted", exitCode: 2 })
  })

  it("runs task after task over the same registry and client", async () => {
    const sent: ServerMessage[] = []
    const runtime = await createTaskRuntime(loadConfig({ targetDir: root, model: "mock", stream: false }, {}))
    const gateway = new GatewaySession((message) => sent.push(message), { runtime })

    await gateway.handle('{"type":"run_task","task":"one"}')
    await gateway.handle('{"type":"run_task","task":"two"}')

    const outcomes = sent.filter((m) => m.type === "outcome")
    expect(outcomes).toHaveLength(2)
    expect(outcomes.every((m) => m.type === "outcome" && m.status === "done")).toBe(true)
    const finals = sent.flatMap((m) => (m.type === "event" && m.event.type === "run_done" ? [m.event.finalText] : []))
    expect(finals).toEqual([MOCK_REPLY, MOCK_REPLY])
  })

  it("refuses a missing target directory when the runtime is built", async () => {
    const missing = path.join(root, "missing")
    await expect(createTaskRuntime(loadConfig({ targetDir: missing, model: "mock" }, {}))).rejects.toThrow(
      `Target directory does not exist: ${missing}`,
    )
  })
})

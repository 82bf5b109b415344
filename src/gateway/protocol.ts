import type { RawData } from "ws"
import { z } from "zod"
import type { AgentEvent, RunOutcome } from "../agent/types.js"

const ClientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("run_task"), task: z.string().trim().min(1, "task must not be empty") }),
  z.object({ type: z.literal("abort") }),
  z.object({ type: z.literal("ping") }),
])

export type ClientMessage = z.infer<typeof ClientMessageSchema>

export type ServerMessage =
  | { type: "welcome"; sessionId: string }
  | { type: "pong" }
  | { type: "event"; event: AgentEvent }
  | { type: "outcome"; runId: string; status: RunOutcome["status"]; exitCode: number }
  | { type: "error"; message: string }

export type ParsedClientMessage = { ok: true; message: ClientMessage } | { ok: false; error: string }

export function parseClientMessage(raw: string): ParsedClientMessage {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (e) {
    return { ok: false, error: `Invalid JSON: ${String(e)}` }
  }
  const parsed = ClientMessageSchema.safeParse(json)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ")
    return { ok: false, error: `Invalid message: ${issues}` }
  }
  return { ok: true, message: parsed.data }
}

export function rawDataToString(raw: RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf8")
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString("utf8")
  return raw.toString("utf8")
}

import { ulid } from "ulid"
import type { AssistantMessage, ToolCall } from "../agent/types.js"
import { isRecord } from "../util/text.js"

export function generateToolCallId(): string {
  return `call_${ulid()}`
}

export function toolCallFromJson(id: string, name: string, raw: string): ToolCall {
  const text = raw.trim()
  if (text === "") return { id, name, arguments: {} }
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    return { id, name, arguments: {}, malformedArguments: raw }
  }
  if (isRecord(parsed)) return { id, name, arguments: parsed }
  return { id, name, arguments: {}, malformedArguments: raw }
}

export function toolCallFromObject(id: string, name: string, input: unknown): ToolCall {
  if (isRecord(input)) return { id, name, arguments: input }
  if (typeof input === "string") return toolCallFromJson(id, name, input)
  if (input === undefined || input === null) return { id, name, arguments: {} }
  return { id, name, arguments: {}, malformedArguments: JSON.stringify(input) }
}

/** Empty or repeated ids are replaced with generated ones; the first holder of an id keeps it. */
export function withUniqueIds(toolCalls: ToolCall[]): ToolCall[] {
  const seen = new Set<string>()
  return toolCalls.map((call) => {
    const id = call.id === "" || seen.has(call.id) ? generateToolCallId() : call.id
    seen.add(id)
    return id === call.id ? call : { ...call, id }
  })
}

/** Shared by both completion paths so that they normalise identically. */
export function buildAssistantMessage(text: string | null | undefined, toolCalls: ToolCall[]): AssistantMessage {
  return {
    role: "assistant",
    content: text ? text : null,
    toolCalls: toolCalls.length > 0 ? withUniqueIds(toolCalls) : null,
  }
}

type PartialToolCall = { id?: string; name: string; args: string }

/**
 * Collects streamed text and tool-call fragments for one assistant turn.
 * Tool calls only become ToolCall records in `finish()`.
 */
export class StreamAccumulator {
  private text = ""
  private readonly partials = new Map<number, PartialToolCall>()

  public appendText(text: string): void {
    this.text += text
  }

  public appendToolCallFragment(index: number, fragment: { id?: string; name?: string; arguments?: string }): void {
    const current = this.partials.get(index) ?? { name: "", args: "" }
    if (fragment.id) current.id = fragment.id
    if (fragment.name) current.name += fragment.name
    if (fragment.arguments) current.args += fragment.arguments
    this.partials.set(index, current)
  }

  public get content(): string {
    return this.text
  }

  public get pendingToolCalls(): number {
    return this.partials.size
  }

  public finish(): AssistantMessage {
    const calls = [...this.partials.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, partial]) => toolCallFromJson(partial.id ?? generateToolCallId(), partial.name, partial.args))
    return buildAssistantMessage(this.text, calls)
  }
}

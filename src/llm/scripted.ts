import type { AssistantMessage, ChatMessage, ToolCall } from "../agent/types.js"
import { ProviderError } from "../errors.js"
import { StreamAccumulator, buildAssistantMessage, toolCallFromJson } from "./accumulator.js"
import type { CompletionRequest, ProviderAdapter, StreamEvent } from "./types.js"

export type ScriptedToolCall = {
  id?: string
  name: string
  arguments: Record<string, unknown> | string
}

export type ScriptedTurn = {
  content?: string
  toolCalls?: ScriptedToolCall[]
}

/** A fixed reply, a reply computed from the conversation so far, or an error to throw. */
export type ScriptStep = ScriptedTurn | Error | ((messages: ReadonlyArray<ChatMessage>) => ScriptedTurn)

export type ScriptedProviderOptions = {
  /** Keep answering with the last step once the script runs out. */
  repeatLast?: boolean
  /** Streamed text and argument fragments are split into pieces of this size. */
  chunkSize?: number
}

export const MOCK_REPLY =
  "(mock model) I am running without a real model. Set OPENAI_API_KEY or ANTHROPIC_API_KEY and pick a model to do real work."

/**
 * Deterministic in-process model. Tool call ids are `call_<n>_<i>` where n is
 * the 1-based completion number and i the call's index.
 */
export class ScriptedProvider implements ProviderAdapter {
  public readonly name = "scripted"
  private readonly steps: ScriptStep[]
  private readonly repeatLast: boolean
  private readonly chunkSize: number
  private count = 0
  public readonly requests: CompletionRequest[] = []

  public constructor(steps: ScriptStep[] = [{ content: MOCK_REPLY }], options: ScriptedProviderOptions = {}) {
    this.steps = steps
    this.repeatLast = options.repeatLast ?? false
    this.chunkSize = Math.max(1, options.chunkSize ?? 8)
  }

  public get calls(): number {
    return this.count
  }

  public async complete(request: CompletionRequest): Promise<AssistantMessage> {
    const turn = this.nextTurn(request)
    return buildAssistantMessage(turn.content, this.toolCalls(turn))
  }

  public async *stream(request: CompletionRequest): AsyncGenerator<StreamEvent> {
    const turn = this.nextTurn(request)
    const accumulator = new StreamAccumulator()

    for (const piece of chunks(turn.content ?? "", this.chunkSize)) {
      accumulator.appendText(piece)
      yield { type: "token_delta", text: piece }
    }
    const calls = this.toolCalls(turn)
    for (const [index, call] of calls.entries()) {
      const raw = call.malformedArguments ?? JSON.stringify(call.arguments)
      accumulator.appendToolCallFragment(index, { id: call.id, name: call.name })
      yield { type: "tool_call_delta", index, id: call.id, name: call.name, argumentsFragment: "" }
      for (const piece of chunks(raw, this.chunkSize)) {
        accumulator.appendToolCallFragment(index, { arguments: piece })
        yield { type: "tool_call_delta", index, argumentsFragment: piece }
      }
    }

    yield { type: "completed", message: accumulator.finish() }
  }

  private nextTurn(request: CompletionRequest): ScriptedTurn {
    this.requests.push(request)
    const position = this.count
    this.count += 1
    const step = this.steps[position] ?? (this.repeatLast ? this.steps.at(-1) : undefined)
    if (step === undefined) {
      throw new ProviderError("InvalidRequest", `Scripted model has no reply for call ${this.count}`)
    }
    if (step instanceof Error) throw step
    return typeof step === "function" ? step(request.messages) : step
  }

  private toolCalls(turn: ScriptedTurn): ToolCall[] {
    return (turn.toolCalls ?? []).map((call, i) => {
      const id = call.id ?? `call_${this.count}_${i}`
      if (typeof call.arguments === "string") return toolCallFromJson(id, call.name, call.arguments)
      return { id, name: call.name, arguments: call.arguments }
    })
  }
}

function chunks(text: string, size: number): string[] {
  const out: string[] = []
  for (let i = 0; i < text.length; i += size) out.push(text.slice(i, i + size))
  return out
}

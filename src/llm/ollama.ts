import type { AssistantMessage, ChatMessage } from "../agent/types.js"
import { ProviderError } from "../errors.js"
import type { ToolSpec } from "../tools/types.js"
import { StreamAccumulator, buildAssistantMessage, generateToolCallId, toolCallFromObject } from "./accumulator.js"
import { defaultFetch, postJson, readJson, responseBody, type FetchLike } from "./http.js"
import { readLines } from "./sse.js"
import type { CompletionRequest, ProviderAdapter, StreamEvent } from "./types.js"

type OllamaToolCall = { function: { name: string; arguments: Record<string, unknown> } }

type OllamaAssistantMessage = { role: "assistant"; content: string; tool_calls?: OllamaToolCall[] }

type OllamaMessage =
  | { role: "system" | "user"; content: string }
  | OllamaAssistantMessage
  | { role: "tool"; content: string; tool_name?: string }

type OllamaChunk = {
  message?: {
    content?: string
    tool_calls?: Array<{ function?: { name?: string; arguments?: unknown } }>
  }
  done?: boolean
  error?: string
}

export function toOllamaMessages(messages: ReadonlyArray<ChatMessage>): OllamaMessage[] {
  return messages.map((m): OllamaMessage => {
    if (m.role === "system" || m.role === "user") return { role: m.role, content: m.content }
    if (m.role === "tool") return { role: "tool", content: m.content, tool_name: m.name }
    const out: OllamaAssistantMessage = { role: "assistant", content: m.content ?? "" }
    if (m.toolCalls) {
      out.tool_calls = m.toolCalls.map((tc) => ({ function: { name: tc.name, arguments: tc.arguments } }))
    }
    return out
  })
}

/** `ollama/llama3.1` → `llama3.1` */
export function ollamaModelName(model: string): string {
  return model.startsWith("ollama/") ? model.slice("ollama/".length) : model
}

export type OllamaProviderOptions = {
  host?: string
  fetch?: FetchLike
}

export class OllamaProvider implements ProviderAdapter {
  public readonly name = "ollama"
  private readonly host: string
  private readonly fetchImpl: FetchLike

  public constructor(options: OllamaProviderOptions = {}) {
    this.host = (options.host ?? "http://127.0.0.1:11434").replace(/\/+$/, "")
    this.fetchImpl = options.fetch ?? defaultFetch
  }

  public async complete(request: CompletionRequest): Promise<AssistantMessage> {
    const res = await this.post(request, false)
    const data = (await readJson(res, this.name)) as OllamaChunk
    if (data.error) throw new ProviderError("Unknown", `Ollama error: ${data.error}`)
    const toolCalls = (data.message?.tool_calls ?? []).map((tc) =>
      toolCallFromObject(generateToolCallId(), tc.function?.name ?? "", tc.function?.arguments),
    )
    return buildAssistantMessage(data.message?.content, toolCalls)
  }

  public async *stream(request: CompletionRequest): AsyncGenerator<StreamEvent> {
    const res = await this.post(request, true)
    const accumulator = new StreamAccumulator()
    let index = 0

    for await (const line of readLines(responseBody(res, this.name))) {
      if (line.trim() === "") continue
      const chunk = JSON.parse(line) as OllamaChunk
      if (chunk.error) throw new ProviderError("Unknown", `Ollama stream error: ${chunk.error}`)

      const content = chunk.message?.content
      if (content) {
        accumulator.appendText(content)
        yield { type: "token_delta", text: content }
      }
      // tool calls arrive whole and without ids
      for (const tc of chunk.message?.tool_calls ?? []) {
        const id = generateToolCallId()
        const name = tc.function?.name ?? ""
        const args = JSON.stringify(tc.function?.arguments ?? {})
        accumulator.appendToolCallFragment(index, { id, name, arguments: args })
        yield { type: "tool_call_delta", index, id, name, argumentsFragment: args }
        index += 1
      }
      if (chunk.done) break
    }

    yield { type: "completed", message: accumulator.finish() }
  }

  private async post(request: CompletionRequest, stream: boolean): Promise<Response> {
    const body: Record<string, unknown> = {
      model: ollamaModelName(request.model),
      messages: toOllamaMessages(request.messages),
      stream,
    }
    if (request.tools.length > 0) body.tools = toOllamaTools(request.tools)
    return postJson(this.fetchImpl, this.name, `${this.host}/api/chat`, {}, body, request.signal)
  }
}

function toOllamaTools(tools: ReadonlyArray<ToolSpec>) {
  return tools.map((t) => ({
    type: "function",
    function: { name: t.name, description: t.description, parameters: t.parameters },
  }))
}

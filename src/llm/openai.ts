import type { AssistantMessage, ChatMessage } from "../agent/types.js"
import { ProviderError } from "../errors.js"
import type { ToolSpec } from "../tools/types.js"
import { StreamAccumulator, buildAssistantMessage, generateToolCallId, toolCallFromJson } from "./accumulator.js"
import { defaultFetch, postJson, readJson, responseBody, type FetchLike } from "./http.js"
import { readSse } from "./sse.js"
import type { CompletionRequest, ProviderAdapter, StreamEvent } from "./types.js"

type OpenAiTool = {
  type: "function"
  function: {
    name: string
    description?: string
    parameters?: Record<string, unknown>
  }
}

type OpenAiMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | {
      role: "assistant"
      content: string | null
      tool_calls?: Array<{
        id: string
        type: "function"
        function: { name: string; arguments: string }
      }>
    }
  | { role: "tool"; tool_call_id: string; content: string }

type OpenAiResponse = {
  choices?: Array<{
    message?: {
      content?: string | null
      tool_calls?: Array<{ id: string; function: { name: string; arguments: string } }>
    }
  }>
}

type OpenAiChunk = {
  choices?: Array<{
    delta?: {
      content?: string | null
      tool_calls?: Array<{ index: number; id?: string; function?: { name?: string; arguments?: string } }>
    }
    finish_reason?: string | null
  }>
  error?: { message?: string }
}

function toOpenAiTools(tools: ReadonlyArray<ToolSpec>): OpenAiTool[] {
  return tools.map((t) => ({
    type: "function",
    function: {
      name: t.name,
      description: t.description,
      parameters: t.parameters,
    },
  }))
}

export function toOpenAiMessages(messages: ReadonlyArray<ChatMessage>): OpenAiMessage[] {
  return messages.map((m): OpenAiMessage => {
    if (m.role === "system") return { role: "system", content: m.content }
    if (m.role === "user") return { role: "user", content: m.content }
    if (m.role === "tool") return { role: "tool", tool_call_id: m.toolCallId, content: m.content }
    return {
      role: "assistant",
      content: m.content,
      tool_calls: m.toolCalls?.map((tc) => ({
        id: tc.id,
        type: "function",
        function: { name: tc.name, arguments: tc.malformedArguments ?? JSON.stringify(tc.arguments) },
      })),
    }
  })
}

export type OpenAiProviderOptions = {
  apiKey?: string
  baseUrl?: string
  fetch?: FetchLike
}

export class OpenAiProvider implements ProviderAdapter {
  public readonly name = "openai"
  private readonly apiKey?: string
  private readonly baseUrl: string
  private readonly fetchImpl: FetchLike

  public constructor(options: OpenAiProviderOptions = {}) {
    this.apiKey = options.apiKey
    this.baseUrl = (options.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "")
    this.fetchImpl = options.fetch ?? defaultFetch
  }

  public async complete(request: CompletionRequest): Promise<AssistantMessage> {
    const res = await this.post(request, false)
    const data = (await readJson(res, this.name)) as OpenAiResponse
    const message = data.choices?.[0]?.message
    if (!message) throw new ProviderError("Unknown", "OpenAI response has no choices")

    const toolCalls = (message.tool_calls ?? []).map((tc) =>
      toolCallFromJson(tc.id || generateToolCallId(), tc.function.name, tc.function.arguments),
    )
    return buildAssistantMessage(message.content, toolCalls)
  }

  public async *stream(request: CompletionRequest): AsyncGenerator<StreamEvent> {
    const res = await this.post(request, true)
    const accumulator = new StreamAccumulator()

    for await (const sse of readSse(responseBody(res, this.name))) {
      if (sse.data === "[DONE]") break
      const chunk = JSON.parse(sse.data) as OpenAiChunk
      if (chunk.error) throw new ProviderError("Unavailable", `OpenAI stream error: ${chunk.error.message ?? "unknown"}`)

      const delta = chunk.choices?.[0]?.delta
      if (!delta) continue
      if (delta.content) {
        accumulator.appendText(delta.content)
        yield { type: "token_delta", text: delta.content }
      }
      for (const tc of delta.tool_calls ?? []) {
        const fragment = { id: tc.id, name: tc.function?.name, arguments: tc.function?.arguments }
        accumulator.appendToolCallFragment(tc.index, fragment)
        yield {
          type: "tool_call_delta",
          index: tc.index,
          id: tc.id,
          name: tc.function?.name,
          argumentsFragment: tc.function?.arguments ?? "",
        }
      }
    }

    yield { type: "completed", message: accumulator.finish() }
  }

  private async post(request: CompletionRequest, stream: boolean): Promise<Response> {
    if (!this.apiKey) {
      throw new ProviderError("Unauthorized", "Missing OPENAI_API_KEY. Set it in .env or environment variables.")
    }
    const body: Record<string, unknown> = {
      model: request.model,
      messages: toOpenAiMessages(request.messages),
      stream,
    }
    if (request.tools.length > 0) {
      body.tools = toOpenAiTools(request.tools)
      body.tool_choice = "auto"
    }
    return postJson(this.fetchImpl, this.name, `${this.baseUrl}/chat/completions`, {
      Authorization: `Bearer ${this.apiKey}`,
    }, body, request.signal)
  }
}

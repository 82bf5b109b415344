import type { AssistantMessage, ChatMessage, ToolCall } from "../agent/types.js"
import { ProviderError, type ProviderErrorKind } from "../errors.js"
import type { ToolSpec } from "../tools/types.js"
import { StreamAccumulator, buildAssistantMessage, toolCallFromObject } from "./accumulator.js"
import { defaultFetch, postJson, readJson, responseBody, type FetchLike } from "./http.js"
import { readSse } from "./sse.js"
import type { CompletionRequest, ProviderAdapter, StreamEvent } from "./types.js"

const ANTHROPIC_VERSION = "2023-06-01"

type AnthropicBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; tool_use_id: string; content: string; is_error?: boolean }

type AnthropicMessage = { role: "user" | "assistant"; content: string | AnthropicBlock[] }

type AnthropicResponse = {
  content?: Array<{ type: string; text?: string; id?: string; name?: string; input?: unknown }>
}

type AnthropicStreamPayload = {
  type: string
  index?: number
  content_block?: { type: string; id?: string; name?: string }
  delta?: { type: string; text?: string; partial_json?: string }
  error?: { type?: string; message?: string }
}

const STREAM_ERROR_KINDS: Record<string, ProviderErrorKind> = {
  authentication_error: "Unauthorized",
  permission_error: "Unauthorized",
  invalid_request_error: "InvalidRequest",
  rate_limit_error: "RateLimited",
  overloaded_error: "Unavailable",
  api_error: "Unavailable",
}

export function toAnthropicRequest(messages: ReadonlyArray<ChatMessage>): {
  system?: string
  messages: AnthropicMessage[]
} {
  const system: string[] = []
  const out: AnthropicMessage[] = []

  for (const m of messages) {
    if (m.role === "system") {
      system.push(m.content)
      continue
    }
    if (m.role === "user") {
      out.push({ role: "user", content: m.content })
      continue
    }
    if (m.role === "assistant") {
      const blocks: AnthropicBlock[] = []
      if (m.content) blocks.push({ type: "text", text: m.content })
      for (const call of m.toolCalls ?? []) {
        blocks.push({ type: "tool_use", id: call.id, name: call.name, input: call.arguments })
      }
      out.push({ role: "assistant", content: blocks.length > 0 ? blocks : "" })
      continue
    }

    // consecutive tool results travel together in one user turn
    const result: AnthropicBlock = {
      type: "tool_result",
      tool_use_id: m.toolCallId,
      content: m.content,
      ...(m.error ? { is_error: true } : {}),
    }
    const previous = out.at(-1)
    const continuesResults =
      previous?.role === "user" && Array.isArray(previous.content) && previous.content[0]?.type === "tool_result"
    if (previous && continuesResults && Array.isArray(previous.content)) {
      previous.content.push(result)
    } else {
      out.push({ role: "user", content: [result] })
    }
  }

  return { system: system.length > 0 ? system.join("\n\n") : undefined, messages: out }
}

export type AnthropicProviderOptions = {
  apiKey?: string
  baseUrl?: string
  maxOutputTokens?: number
  fetch?: FetchLike
}

export class AnthropicProvider implements ProviderAdapter {
  public readonly name = "anthropic"
  private readonly apiKey?: string
  private readonly baseUrl: string
  private readonly maxOutputTokens: number
  private readonly fetchImpl: FetchLike

  public constructor(options: AnthropicProviderOptions = {}) {
    this.apiKey = options.apiKey
    this.baseUrl = (options.baseUrl ?? "https://api.anthropic.com/v1").replace(/\/+$/, "")
    this.maxOutputTokens = options.maxOutputTokens ?? 4096
    this.fetchImpl = options.fetch ?? defaultFetch
  }

  public async complete(request: CompletionRequest): Promise<AssistantMessage> {
    const res = await this.post(request, false)
    const data = (await readJson(res, this.name)) as AnthropicResponse
    let text = ""
    const toolCalls: ToolCall[] = []
    for (const block of data.content ?? []) {
      if (block.type === "text") text += block.text ?? ""
      if (block.type === "tool_use" && block.id && block.name) {
        toolCalls.push(toolCallFromObject(block.id, block.name, block.input))
      }
    }
    return buildAssistantMessage(text, toolCalls)
  }

  public async *stream(request: CompletionRequest): AsyncGenerator<StreamEvent> {
    const res = await this.post(request, true)
    const accumulator = new StreamAccumulator()

    for await (const sse of readSse(responseBody(res, this.name))) {
      const payload = JSON.parse(sse.data) as AnthropicStreamPayload
      if (payload.type === "error") {
        const kind = STREAM_ERROR_KINDS[payload.error?.type ?? ""] ?? "Unknown"
        throw new ProviderError(kind, `Anthropic stream error: ${payload.error?.message ?? "unknown"}`)
      }
      if (payload.type === "message_stop") break

      const index = payload.index ?? 0
      if (payload.type === "content_block_start" && payload.content_block?.type === "tool_use") {
        const { id, name } = payload.content_block
        accumulator.appendToolCallFragment(index, { id, name })
        yield { type: "tool_call_delta", index, id, name, argumentsFragment: "" }
        continue
      }
      if (payload.type !== "content_block_delta" || !payload.delta) continue

      if (payload.delta.type === "text_delta" && payload.delta.text) {
        accumulator.appendText(payload.delta.text)
        yield { type: "token_delta", text: payload.delta.text }
      }
      if (payload.delta.type === "input_json_delta" && payload.delta.partial_json) {
        accumulator.appendToolCallFragment(index, { arguments: payload.delta.partial_json })
        yield { type: "tool_call_delta", index, argumentsFragment: payload.delta.partial_json }
      }
    }

    yield { type: "completed", message: accumulator.finish() }
  }

  private async post(request: CompletionRequest, stream: boolean): Promise<Response> {
    if (!this.apiKey) {
      throw new ProviderError("Unauthorized", "Missing ANTHROPIC_API_KEY. Set it in .env or environment variables.")
    }
    const { system, messages } = toAnthropicRequest(request.messages)
    const body: Record<string, unknown> = {
      model: request.model,
      max_tokens: this.maxOutputTokens,
      messages,
      stream,
    }
    if (system) body.system = system
    if (request.tools.length > 0) body.tools = toAnthropicTools(request.tools)
    return postJson(
      this.fetchImpl,
      this.name,
      `${this.baseUrl}/messages`,
      { "x-api-key": this.apiKey, "anthropic-version": ANTHROPIC_VERSION },
      body,
      request.signal,
    )
  }
}

function toAnthropicTools(tools: ReadonlyArray<ToolSpec>) {
  return tools.map((t) => ({ name: t.name, description: t.description, input_schema: t.parameters }))
}

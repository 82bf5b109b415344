import type { AssistantMessage, ChatMessage } from "../agent/types.js"
import type { ProviderError } from "../errors.js"
import type { ToolSpec } from "../tools/types.js"

export type CompletionRequest = {
  model: string
  messages: ReadonlyArray<ChatMessage>
  tools: ReadonlyArray<ToolSpec>
  signal?: AbortSignal
}

export type StreamEvent =
  | { type: "token_delta"; text: string }
  | { type: "tool_call_delta"; index: number; id?: string; name?: string; argumentsFragment: string }
  | { type: "completed"; message: AssistantMessage }
  | { type: "failed"; error: ProviderError }

export type CompletionResult =
  | { type: "message"; message: AssistantMessage }
  | { type: "stream"; events: AsyncIterable<StreamEvent> }

/**
 * One backend. Adapters throw ProviderError (or let transport errors escape);
 * retry and classification of foreign errors happen in LlmClient.
 * `stream` ends with a single `completed` event.
 */
export interface ProviderAdapter {
  readonly name: string
  complete(request: CompletionRequest): Promise<AssistantMessage>
  stream(request: CompletionRequest): AsyncIterable<StreamEvent>
}

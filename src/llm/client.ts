import type { Conversation } from "../agent/conversation.js"
import type { ChatMessage } from "../agent/types.js"
import type { ProviderError } from "../errors.js"
import type { ToolSpec } from "../tools/types.js"
import { silentLogger, type Logger } from "../util/log.js"
import { classifyError } from "./http.js"
import { DEFAULT_RETRY_POLICY, backoffDelay, callWithRetry, shouldRetry, sleep, type RetryPolicy } from "./retry.js"
import type { CompletionRequest, CompletionResult, ProviderAdapter, StreamEvent } from "./types.js"

export type LlmClientOptions = {
  model: string
  retry?: RetryPolicy
  /** Per-attempt limit; 0 disables it. */
  requestTimeoutMs?: number
  logger?: Logger
  sleep?: (ms: number) => Promise<void>
  random?: () => number
}

/**
 * Provider-agnostic completion contract. Process-wide and stateless between calls.
 */
export class LlmClient {
  private readonly retry: RetryPolicy
  private readonly logger: Logger

  public constructor(
    private readonly adapter: ProviderAdapter,
    private readonly options: LlmClientOptions,
  ) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY
    this.logger = options.logger ?? silentLogger
  }

  public get providerName(): string {
    return this.adapter.name
  }

  public get model(): string {
    return this.options.model
  }

  public async complete(
    conversation: Conversation | ReadonlyArray<ChatMessage>,
    tools: ReadonlyArray<ToolSpec>,
    stream: boolean,
  ): Promise<CompletionResult> {
    const messages = "messages" in conversation ? conversation.messages : [...conversation]
    if (stream) return { type: "stream", events: this.streamWithRetry(messages, tools) }

    const message = await callWithRetry(
      () => this.adapter.complete(this.request(messages, tools)),
      this.retry,
      { sleep: this.options.sleep, random: this.options.random, onRetry: (e, n, d) => this.logRetry(e, n, d) },
    )
    return { type: "message", message }
  }

  private request(messages: ReadonlyArray<ChatMessage>, tools: ReadonlyArray<ToolSpec>): CompletionRequest {
    const timeoutMs = this.options.requestTimeoutMs ?? 0
    return {
      model: this.options.model,
      messages,
      tools,
      signal: timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined,
    }
  }

  private logRetry(error: ProviderError, attempt: number, delayMs: number): void {
    this.logger.warn(`${this.adapter.name} ${error.kind} on attempt ${attempt}, retrying in ${delayMs}ms: ${error.message}`)
  }

  // Retries only while nothing has been yielded; later failures end the stream with `failed`.
  private async *streamWithRetry(
    messages: ReadonlyArray<ChatMessage>,
    tools: ReadonlyArray<ToolSpec>,
  ): AsyncGenerator<StreamEvent> {
    for (let attempt = 1; ; attempt += 1) {
      const iterator = this.adapter.stream(this.request(messages, tools))[Symbol.asyncIterator]()
      let emitted = false
      let failure: ProviderError | undefined
      try {
        for (;;) {
          let next: IteratorResult<StreamEvent>
          try {
            next = await iterator.next()
          } catch (e) {
            failure = classifyError(e)
            break
          }
          if (next.done) return
          emitted = true
          yield next.value
          if (next.value.type === "completed" || next.value.type === "failed") return
        }
      } finally {
        if (failure === undefined) await iterator.return?.()
      }
      if (failure === undefined) return

      if (emitted || !shouldRetry(failure, attempt, this.retry)) {
        yield { type: "failed", error: failure }
        return
      }
      const delayMs = backoffDelay(failure, attempt, this.retry, this.options.random ?? Math.random)
      this.logRetry(failure, attempt, delayMs)
      await (this.options.sleep ?? sleep)(delayMs)
    }
  }
}

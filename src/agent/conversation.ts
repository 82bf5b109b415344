import type { AssistantMessage, ChatMessage, ToolMessage } from "./types.js"

/**
 * Append-only message log for a single run.
 *
 * Every tool call of an assistant message must be answered by exactly one tool
 * message, in call order, before anything else is appended.
 */
export class Conversation {
  private readonly log: ChatMessage[] = []
  private pending: string[] = []

  public constructor(initial: readonly ChatMessage[] = []) {
    for (const message of initial) this.append(message)
  }

  public append(message: ChatMessage): void {
    if (message.role === "tool") {
      this.appendToolMessage(message)
      return
    }
    if (this.pending.length > 0) {
      throw new Error(`Cannot append ${message.role} message: tool calls ${this.pending.join(", ")} are unanswered`)
    }
    if (message.role === "assistant") this.appendAssistantMessage(message)
    else this.log.push(message)
  }

  public get messages(): readonly ChatMessage[] {
    return [...this.log]
  }

  public get length(): number {
    return this.log.length
  }

  public get pendingToolCallIds(): readonly string[] {
    return [...this.pending]
  }

  public last(): ChatMessage | undefined {
    return this.log.at(-1)
  }

  private appendAssistantMessage(message: AssistantMessage): void {
    const calls = message.toolCalls ?? []
    const ids = new Set(calls.map((c) => c.id))
    if (ids.size !== calls.length) {
      throw new Error("Assistant message repeats a tool call id")
    }
    this.log.push(message)
    this.pending = calls.map((c) => c.id)
  }

  private appendToolMessage(message: ToolMessage): void {
    const expected = this.pending[0]
    if (expected === undefined) {
      throw new Error(`Tool message ${message.toolCallId} does not answer a pending tool call`)
    }
    if (message.toolCallId !== expected) {
      throw new Error(`Tool message ${message.toolCallId} is out of order, expected ${expected}`)
    }
    this.log.push(message)
    this.pending = this.pending.slice(1)
  }
}

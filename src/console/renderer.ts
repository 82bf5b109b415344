import type { AgentEvent } from "../agent/types.js"
import { truncate } from "../util/text.js"

type Output = { write(chunk: string): unknown }

export type ConsoleRendererOptions = {
  /** Adds turn markers. */
  debug?: boolean
}

function oneLine(text: string, maxChars: number): string {
  return truncate(text.replace(/\s+/g, " ").trim(), maxChars)
}

/**
 * Turns agent events into terminal output: streamed tokens verbatim, and one
 * `(tag) …` line per tool call, failure and abort.
 */
export class ConsoleRenderer {
  private readonly streamedTurns = new Set<number>()
  private openLine = false

  public constructor(
    private readonly out: Output = process.stdout,
    private readonly options: ConsoleRendererOptions = {},
  ) {}

  public render(event: AgentEvent): string {
    switch (event.type) {
      case "turn_started":
        return this.options.debug ? this.line(`(turn) ${event.turn}`) : ""
      case "token_streamed":
        if (event.text === "") return ""
        this.streamedTurns.add(event.turn)
        this.openLine = !event.text.endsWith("\n")
        return event.text
      case "turn_completed":
        return ""
      case "tool_call_started":
        return this.line(`(tool_call) ${event.toolName} ${JSON.stringify(event.args)}`)
      case "tool_call_finished":
        if (event.error) return this.line(`(tool_error) ${event.toolName} ${oneLine(event.output, 200)}`)
        return this.line(`(tool_result) ${event.toolName} ${event.durationMs}ms`)
      case "run_done":
        if (this.streamedTurns.has(event.turn)) return this.line("")
        return event.finalText ? this.line(event.finalText) : ""
      case "run_failed":
        return this.line(`(error) ${event.errorKind}: ${event.message} (last completed turn: ${event.lastCompletedTurn})`)
      case "run_aborted":
        return this.line(`(aborted) from ${event.fromState} (last completed turn: ${event.lastCompletedTurn})`)
    }
  }

  public async consume(events: AsyncIterable<AgentEvent>): Promise<void> {
    for await (const event of events) {
      const text = this.render(event)
      if (text) this.out.write(text)
    }
  }

  // Closes a line left open by streamed tokens first. An empty text only does that.
  private line(text: string): string {
    const prefix = this.openLine ? "\n" : ""
    this.openLine = false
    return text === "" ? prefix : `${prefix}${text}\n`
  }
}

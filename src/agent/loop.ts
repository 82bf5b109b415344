import { ulid } from "ulid"
import { LoopError, ProviderError, BudgetExceededError, errorMessage } from "../errors.js"
import type { EventBus } from "../events/bus.js"
import type { LlmClient } from "../llm/client.js"
import { formatToolOutput, type ToolRegistry } from "../tools/registry.js"
import type { ToolResult } from "../tools/types.js"
import { silentLogger, type Logger } from "../util/log.js"
import { Conversation } from "./conversation.js"
import type { AgentEvent, AssistantMessage, RunOutcome, RunState, ToolCall } from "./types.js"

export type AgentLoopOptions = {
  client: LlmClient
  registry: ToolRegistry
  bus: EventBus<AgentEvent>
  maxTurns: number
  /** 1 runs a turn's tool calls one after another. */
  maxConcurrentTools?: number
  stream?: boolean
  systemPrompt?: string
  signal?: AbortSignal
  logger?: Logger
}

/** Raised inside the loop when the abort signal is observed; never escapes `run()`. */
class RunAborted extends Error {
  public constructor(public readonly fromState: RunState) {
    super(`Run aborted while ${fromState}`)
  }
}

/**
 * Drives one task: model call, tool round, model call, … until the model
 * answers without tool calls, a fatal error occurs, the turn budget runs out,
 * or the signal aborts the run. Single use.
 */
export class AgentLoop {
  public readonly runId = ulid()
  public readonly conversation = new Conversation()
  private current: RunState = "idle"
  private turn = 0
  private lastCompletedTurn = 0
  private started = false
  private readonly logger: Logger

  public constructor(private readonly options: AgentLoopOptions) {
    this.logger = options.logger ?? silentLogger
  }

  public get state(): RunState {
    return this.current
  }

  public async run(task: string): Promise<RunOutcome> {
    if (this.started) throw new Error("AgentLoop.run() can only be called once")
    this.started = true

    try {
      if (this.options.signal?.aborted) throw new RunAborted("idle")
      if (this.options.systemPrompt) this.conversation.append({ role: "system", content: this.options.systemPrompt })
      this.conversation.append({ role: "user", content: task })
      return await this.cycle()
    } catch (e) {
      if (e instanceof RunAborted) return await this.abort(e.fromState)
      return await this.fail(e)
    } finally {
      await this.options.bus.close()
    }
  }

  private async cycle(): Promise<RunOutcome> {
    for (;;) {
      this.transition("awaiting_model")
      if (this.options.signal?.aborted) throw new RunAborted("awaiting_model")

      this.turn += 1
      if (this.turn > this.options.maxTurns) throw new BudgetExceededError(this.options.maxTurns)
      await this.emit({ type: "turn_started", runId: this.runId, turn: this.turn })

      const message = await this.requestCompletion()
      const calls = message.toolCalls ?? []

      if (calls.length === 0) {
        this.conversation.append(message)
        this.lastCompletedTurn = this.turn
        this.transition("done")
        const finalText = message.content ?? ""
        await this.emit({ type: "run_done", runId: this.runId, turn: this.turn, finalText })
        return {
          status: "done",
          runId: this.runId,
          finalText,
          turns: this.turn,
          messages: this.conversation.messages,
        }
      }

      await this.emit({
        type: "turn_completed",
        runId: this.runId,
        turn: this.turn,
        content: message.content,
        toolCalls: calls,
      })
      this.transition("executing_tools")
      // the assistant message is only recorded together with its answers
      if (this.options.signal?.aborted) throw new RunAborted("executing_tools")

      const results = await this.executeTools(calls)
      this.conversation.append(message)
      for (const result of results) {
        this.conversation.append({
          role: "tool",
          toolCallId: result.toolCallId,
          name: result.toolName,
          content: this.toolContent(result),
          error: result.error,
        })
      }
      this.lastCompletedTurn = this.turn
    }
  }

  private async requestCompletion(): Promise<AssistantMessage> {
    const { client, registry } = this.options
    const result = await client.complete(this.conversation, registry.specs(), this.options.stream ?? true)
    if (result.type === "message") return result.message

    for await (const event of result.events) {
      if (event.type === "token_delta") {
        await this.emit({ type: "token_streamed", runId: this.runId, turn: this.turn, text: event.text })
      } else if (event.type === "completed") {
        return event.message
      } else if (event.type === "failed") {
        throw event.error
      }
    }
    throw new ProviderError("Unknown", `${client.providerName} stream ended without a completion`)
  }

  private executeTools(calls: ToolCall[]): Promise<ToolResult[]> {
    return this.options.registry.dispatchAll(calls, {
      concurrency: this.options.maxConcurrentTools ?? 4,
      onStart: (call) =>
        this.emit({
          type: "tool_call_started",
          runId: this.runId,
          turn: this.turn,
          toolCallId: call.id,
          toolName: call.name,
          args: call.malformedArguments ?? call.arguments,
        }),
      onFinish: (call, result) =>
        this.emit({
          type: "tool_call_finished",
          runId: this.runId,
          turn: this.turn,
          toolCallId: call.id,
          toolName: call.name,
          error: result.error,
          durationMs: result.durationMs,
          output: this.toolContent(result),
        }),
    })
  }

  private toolContent(result: ToolResult): string {
    return formatToolOutput(result, this.options.registry.toolContext.maxToolOutputChars)
  }

  private async fail(error: unknown): Promise<RunOutcome> {
    const errorKind = error instanceof ProviderError || error instanceof LoopError ? error.kind : "Unknown"
    const message = errorMessage(error)
    this.logger.debug(`run ${this.runId} failed in ${this.current}: ${errorKind} ${message}`)
    this.transition("failed")
    await this.emit({ type: "run_failed", runId: this.runId, errorKind, message, lastCompletedTurn: this.lastCompletedTurn })
    return {
      status: "failed",
      runId: this.runId,
      errorKind,
      message,
      lastCompletedTurn: this.lastCompletedTurn,
      messages: this.conversation.messages,
    }
  }

  private async abort(fromState: RunState): Promise<RunOutcome> {
    this.transition("aborted")
    await this.emit({ type: "run_aborted", runId: this.runId, fromState, lastCompletedTurn: this.lastCompletedTurn })
    return {
      status: "aborted",
      runId: this.runId,
      fromState,
      lastCompletedTurn: this.lastCompletedTurn,
      messages: this.conversation.messages,
    }
  }

  private transition(next: RunState): void {
    this.logger.debug(`run ${this.runId}: ${this.current} -> ${next} (turn ${this.turn})`)
    this.current = next
  }

  private emit(event: AgentEvent): Promise<void> {
    return this.options.bus.publish(event)
  }
}

import type { ToolResultErrorKind } from "../errors.js"

export type ToolCall = {
  id: string
  name: string
  arguments: Record<string, unknown>
  /** Raw argument text the model produced when it was not a JSON object. */
  malformedArguments?: string
}

export type SystemMessage = { role: "system"; content: string }
export type UserMessage = { role: "user"; content: string }
export type AssistantMessage = { role: "assistant"; content: string | null; toolCalls: ToolCall[] | null }
export type ToolMessage = {
  role: "tool"
  toolCallId: string
  name: string
  content: string
  error: ToolResultErrorKind | null
}

export type ChatMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage

export type RunState = "idle" | "awaiting_model" | "executing_tools" | "done" | "failed" | "aborted"

export type AgentEvent =
  | { type: "turn_started"; runId: string; turn: number }
  | { type: "token_streamed"; runId: string; turn: number; text: string }
  | { type: "turn_completed"; runId: string; turn: number; content: string | null; toolCalls: ToolCall[] }
  | { type: "tool_call_started"; runId: string; turn: number; toolCallId: string; toolName: string; args: unknown }
  | {
      type: "tool_call_finished"
      runId: string
      turn: number
      toolCallId: string
      toolName: string
      error: ToolResultErrorKind | null
      durationMs: number
      output: string
    }
  | { type: "run_done"; runId: string; turn: number; finalText: string }
  | { type: "run_failed"; runId: string; errorKind: string; message: string; lastCompletedTurn: number }
  | { type: "run_aborted"; runId: string; fromState: RunState; lastCompletedTurn: number }

export type AgentEventType = AgentEvent["type"]

export type RunOutcome =
  | { status: "done"; runId: string; finalText: string; turns: number; messages: readonly ChatMessage[] }
  | {
      status: "failed"
      runId: string
      errorKind: string
      message: string
      lastCompletedTurn: number
      messages: readonly ChatMessage[]
    }
  | { status: "aborted"; runId: string; fromState: RunState; lastCompletedTurn: number; messages: readonly ChatMessage[] }

export const EXIT_CODES = {
  done: 0,
  failed: 1,
  aborted: 2,
} as const satisfies Record<RunOutcome["status"], number>

export function exitCodeFor(outcome: Pick<RunOutcome, "status">): number {
  return EXIT_CODES[outcome.status]
}

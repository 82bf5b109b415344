import { z } from "zod"
import type { ToolResultErrorKind } from "../errors.js"

export type ToolRisk = "safe" | "dangerous"

export type ToolContext = {
  targetDir: string
  enableShell: boolean
  enableWrite: boolean
  maxFileReadChars: number
  maxToolOutputChars: number
  shellTimeoutMs: number
}

export type ToolDefinition<InputSchema extends z.ZodTypeAny = z.ZodTypeAny> = {
  name: string
  description: string
  risk: ToolRisk
  parametersJsonSchema: Record<string, unknown>
  inputSchema: InputSchema
  handler(input: z.output<InputSchema>, ctx: ToolContext): Promise<unknown>
}

/** What a provider sees of a tool. */
export type ToolSpec = {
  name: string
  description: string
  parameters: Record<string, unknown>
}

export type ToolResult = {
  toolCallId: string
  toolName: string
  output: unknown
  error: ToolResultErrorKind | null
  durationMs: number
}

import { z } from "zod"
import { ToolError } from "../errors.js"
import { runCommand } from "../util/run-command.js"
import { resolveRoot } from "../util/workspace-path.js"
import type { ToolDefinition } from "./types.js"

const RunShellCommandInput = z.object({
  command: z.string().min(1),
  timeoutMs: z.number().int().min(1).max(10 * 60 * 1000).optional(),
})

export function createShellTools(): ToolDefinition[] {
  const run_shell_command: ToolDefinition<typeof RunShellCommandInput> = {
    name: "run_shell_command",
    description: "Run a shell command in the target directory (disabled unless shell is enabled)",
    risk: "dangerous",
    parametersJsonSchema: {
      type: "object",
      additionalProperties: false,
      properties: {
        command: { type: "string", description: "Command line passed to the shell" },
        timeoutMs: { type: "integer", minimum: 1, maximum: 600000, description: "Wall-clock limit in milliseconds" },
      },
      required: ["command"],
    },
    inputSchema: RunShellCommandInput,
    handler: async (input, ctx) => {
      if (!ctx.enableShell) {
        throw new ToolError("ExecutionError", "run_shell_command is disabled. Set TASKLOOP_ENABLE_SHELL=1 to enable.")
      }
      const timeoutMs = input.timeoutMs ?? ctx.shellTimeoutMs
      const result = await runCommand(input.command, {
        cwd: await resolveRoot(ctx.targetDir),
        timeoutMs,
        maxOutputChars: ctx.maxToolOutputChars,
      })
      if (result.timedOut) {
        throw new ToolError("TimeoutError", `Command timed out after ${timeoutMs}ms`, { output: result })
      }
      return result
    },
  }

  return [run_shell_command]
}

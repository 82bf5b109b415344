import type { ZodError } from "zod"
import type { ToolCall } from "../agent/types.js"
import { DuplicateToolError, NotFoundError, ToolError, errorMessage, type ToolResultErrorKind } from "../errors.js"
import { silentLogger, type Logger } from "../util/log.js"
import { safeJsonStringify, truncate } from "../util/text.js"
import type { ToolContext, ToolDefinition, ToolResult, ToolSpec } from "./types.js"

export type DispatchAllOptions = {
  concurrency: number
  onStart?: (call: ToolCall) => Promise<void> | void
  onFinish?: (call: ToolCall, result: ToolResult) => Promise<void> | void
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ")
}

/** Renders a tool result as the text the model reads back. */
export function formatToolOutput(result: ToolResult, maxChars: number): string {
  const body = typeof result.output === "string" ? result.output : safeJsonStringify(result.output)
  const text = result.error ? `[${result.error}] ${body}` : body
  return truncate(text, maxChars)
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>()
  private sealed = false

  public constructor(
    private readonly context: ToolContext,
    private readonly logger: Logger = silentLogger,
  ) {}

  public register(tool: ToolDefinition): this {
    if (this.sealed) throw new Error(`Tool registry is sealed; cannot register ${tool.name}`)
    if (this.tools.has(tool.name)) throw new DuplicateToolError(tool.name)
    this.tools.set(tool.name, tool)
    this.logger.debug(`registered tool ${tool.name} (${tool.risk})`)
    return this
  }

  /** No registrations are accepted afterwards. */
  public seal(): this {
    this.sealed = true
    return this
  }

  public get isSealed(): boolean {
    return this.sealed
  }

  public get toolContext(): ToolContext {
    return this.context
  }

  public resolve(name: string): ToolDefinition {
    const tool = this.tools.get(name)
    if (!tool) throw new NotFoundError(name)
    return tool
  }

  public list(): ToolDefinition[] {
    return [...this.tools.values()]
  }

  public specs(): ToolSpec[] {
    return this.list().map((t) => ({ name: t.name, description: t.description, parameters: t.parametersJsonSchema }))
  }

  public async dispatch(call: ToolCall): Promise<ToolResult> {
    const startedAt = Date.now()
    const finish = (output: unknown, error: ToolResultErrorKind | null): ToolResult => ({
      toolCallId: call.id,
      toolName: call.name,
      output,
      error,
      durationMs: Date.now() - startedAt,
    })

    const tool = this.tools.get(call.name)
    if (!tool) return finish(`Unknown tool: ${call.name}`, "NotFoundError")

    if (call.malformedArguments !== undefined) {
      return finish(
        `Invalid JSON arguments for tool ${call.name}: expected a JSON object, got ${truncate(call.malformedArguments, 200)}`,
        "SchemaValidationError",
      )
    }

    const parsed = tool.inputSchema.safeParse(call.arguments)
    if (!parsed.success) {
      return finish(`Invalid arguments for tool ${call.name}: ${formatIssues(parsed.error)}`, "SchemaValidationError")
    }

    try {
      const output = await tool.handler(parsed.data, this.context)
      this.logger.debug(`tool ${call.name} (${call.id}) finished in ${Date.now() - startedAt}ms`)
      return finish(output, null)
    } catch (e) {
      if (e instanceof ToolError) {
        this.logger.debug(`tool ${call.name} (${call.id}) failed: ${e.kind} ${e.message}`)
        return finish(e.output ?? e.message, e.kind)
      }
      this.logger.debug(`tool ${call.name} (${call.id}) threw: ${errorMessage(e)}`)
      return finish(`Tool ${call.name} failed: ${errorMessage(e)}`, "ExecutionError")
    }
  }

  /**
   * Runs one turn's calls with at most `concurrency` in flight. Results come back
   * in the order the calls were given, whatever order they complete in.
   */
  public async dispatchAll(calls: readonly ToolCall[], options: DispatchAllOptions): Promise<ToolResult[]> {
    const results: ToolResult[] = new Array(calls.length)
    const limit = Math.max(1, Math.min(options.concurrency, calls.length))
    let nextIndex = 0

    const worker = async () => {
      while (nextIndex < calls.length) {
        const index = nextIndex
        nextIndex += 1
        const call = calls[index]
        await options.onStart?.(call)
        const result = await this.dispatch(call)
        results[index] = result
        await options.onFinish?.(call, result)
      }
    }

    await Promise.all(Array.from({ length: limit }, () => worker()))
    return results
  }
}

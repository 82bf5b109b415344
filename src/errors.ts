export type ProviderErrorKind = "RateLimited" | "Unauthorized" | "InvalidRequest" | "Unavailable" | "Unknown"

export type ToolErrorKind = "SchemaValidationError" | "PathEscapeError" | "TimeoutError" | "ExecutionError"

export type LoopErrorKind = "BudgetExceededError" | "DuplicateToolError" | "NotFoundError"

/** Error kinds a tool result can carry. An unknown tool name is reported back to the model, not raised. */
export type ToolResultErrorKind = ToolErrorKind | "NotFoundError"

export class ProviderError extends Error {
  public constructor(
    public readonly kind: ProviderErrorKind,
    message: string,
    public readonly retryAfterMs?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "ProviderError"
  }

  public get retryable(): boolean {
    return this.kind === "RateLimited" || this.kind === "Unavailable" || this.kind === "Unknown"
  }
}

/**
 * Thrown by tool handlers. The registry turns it into a populated `error` on the
 * tool result; `output` (when set) replaces the message as the result body.
 */
export class ToolError extends Error {
  public readonly output: unknown

  public constructor(
    public readonly kind: ToolErrorKind,
    message: string,
    options?: { output?: unknown; cause?: unknown },
  ) {
    super(message, { cause: options?.cause })
    this.name = "ToolError"
    this.output = options?.output
  }
}

export class LoopError extends Error {
  public constructor(
    public readonly kind: LoopErrorKind,
    message: string,
  ) {
    super(message)
    this.name = kind
  }
}

export class BudgetExceededError extends LoopError {
  public constructor(public readonly maxTurns: number) {
    super("BudgetExceededError", `Turn budget of ${maxTurns} exhausted`)
  }
}

export class DuplicateToolError extends LoopError {
  public constructor(public readonly toolName: string) {
    super("DuplicateToolError", `Tool already registered: ${toolName}`)
  }
}

export class NotFoundError extends LoopError {
  public constructor(public readonly toolName: string) {
    super("NotFoundError", `Unknown tool: ${toolName}`)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

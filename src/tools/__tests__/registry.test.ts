import { describe, expect, it } from "vitest"
import { z } from "zod"
import type { ToolCall } from "../../agent/types.js"
import { DuplicateToolError, NotFoundError, ToolError } from "../../errors.js"
import { createToolRegistry } from "../index.js"
import { ToolRegistry, formatToolOutput } from "../registry.js"
import type { ToolContext, ToolDefinition } from "../types.js"

const ctx: ToolContext = {
  targetDir: "/tmp/does-not-matter",
  enableShell: false,
  enableWrite: false,
  maxFileReadChars: 10_000,
  maxToolOutputChars: 10_000,
  shellTimeoutMs: 1000,
}

const EchoInput = z.object({ text: z.string(), delayMs: z.number().int().min(0).default(0) })

function echoTool(log: string[] = []): ToolDefinition<typeof EchoInput> {
  return {
    name: "echo",
    description: "Echo text back",
    risk: "safe",
    parametersJsonSchema: { type: "object", properties: { text: { type: "string" } }, required: ["text"] },
    inputSchema: EchoInput,
    handler: async (input) => {
      log.push(`start ${input.text}`)
      await new Promise((resolve) => setTimeout(resolve, input.delayMs))
      log.push(`end ${input.text}`)
      return input.text
    },
  }
}

const failing: ToolDefinition = {
  name: "fail",
  description: "Always fails",
  risk: "safe",
  parametersJsonSchema: { type: "object" },
  inputSchema: z.object({ how: z.enum(["tool", "plain"]) }),
  handler: async (input: { how: "tool" | "plain" }) => {
    if (input.how === "tool") throw new ToolError("TimeoutError", "took too long", { output: { partial: "x" } })
    throw new Error("boom")
  },
}

const call = (name: string, args: Record<string, unknown>, id = `id-${name}`): ToolCall => ({ id, name, arguments: args })

describe("ToolRegistry", () => {
  it("rejects duplicate names", () => {
    const registry = new ToolRegistry(ctx).register(echoTool())
    expect(() => registry.register(echoTool())).toThrow(DuplicateToolError)
  })

  it("refuses registration after seal", () => {
    const registry = new ToolRegistry(ctx).seal()
    expect(registry.isSealed).toBe(true)
    expect(() => registry.register(echoTool())).toThrow("Tool registry is sealed; cannot register echo")
  })

  it("resolves registered tools and throws NotFoundError otherwise", () => {
    const registry = new ToolRegistry(ctx).register(echoTool())
    expect(registry.resolve("echo").name).toBe("echo")
    expect(() => registry.resolve("nope")).toThrow(NotFoundError)
  })

  it("exposes provider-facing specs", () => {
    const registry = new ToolRegistry(ctx).register(echoTool())
    expect(registry.specs()).toEqual([
      {
        name: "echo",
        description: "Echo text back",
        parameters: { type: "object", properties: { text: { type: "string" } }, required: ["text"] },
      },
    ])
  })

  describe("dispatch", () => {
    const registry = new ToolRegistry(ctx).register(echoTool()).register(failing).seal()

    it("returns the handler output", async () => {
      const result = await registry.dispatch(call("echo", { text: "hi" }))
      expect(result).toMatchObject({ toolCallId: "id-echo", toolName: "echo", output: "hi", error: null })
    })

    it("reports unknown tools as NotFoundError results", async () => {
      const result = await registry.dispatch(call("missing", {}))
      expect(result.error).toBe("NotFoundError")
      expect(result.output).toBe("Unknown tool: missing")
    })

    it("reports schema violations without running the handler", async () => {
      const log: string[] = []
      const local = new ToolRegistry(ctx).register(echoTool(log))
      const result = await local.dispatch(call("echo", { text: 42 }))
      expect(result.error).toBe("SchemaValidationError")
      expect(result.output).toBe("Invalid arguments for tool echo: text: Expected string, received number")
      expect(log).toEqual([])
    })

    it("reports malformed JSON arguments as SchemaValidationError", async () => {
      const result = await registry.dispatch({ id: "c1", name: "echo", arguments: {}, malformedArguments: "{oops" })
      expect(result.error).toBe("SchemaValidationError")
      expect(result.output).toBe("Invalid JSON arguments for tool echo: expected a JSON object, got {oops")
    })

    it("maps a thrown ToolError to its kind and output", async () => {
      const result = await registry.dispatch(call("fail", { how: "tool" }))
      expect(result.error).toBe("TimeoutError")
      expect(result.output).toEqual({ partial: "x" })
    })

    it("maps any other error to ExecutionError", async () => {
      const result = await registry.dispatch(call("fail", { how: "plain" }))
      expect(result.error).toBe("ExecutionError")
      expect(result.output).toBe("Tool fail failed: boom")
    })
  })

  describe("dispatchAll", () => {
    it("returns results in call order when later calls finish first", async () => {
      const registry = new ToolRegistry(ctx).register(echoTool())
      const calls = [
        call("echo", { text: "slow", delayMs: 40 }, "c1"),
        call("echo", { text: "fast", delayMs: 0 }, "c2"),
      ]
      const finished: string[] = []
      const results = await registry.dispatchAll(calls, {
        concurrency: 2,
        onFinish: (c) => {
          finished.push(c.id)
        },
      })
      expect(results.map((r) => r.toolCallId)).toEqual(["c1", "c2"])
      expect(finished).toEqual(["c2", "c1"])
    })

    it("never has more calls in flight than the concurrency limit", async () => {
      const load = { inFlight: 0, peak: 0 }
      const tracked: ToolDefinition = {
        name: "tracked",
        description: "Records how many calls overlap",
        risk: "safe",
        parametersJsonSchema: { type: "object" },
        inputSchema: z.object({}),
        handler: async () => {
          load.inFlight += 1
          load.peak = Math.max(load.peak, load.inFlight)
          await new Promise((resolve) => setTimeout(resolve, 10))
          load.inFlight -= 1
          return "ok"
        },
      }
      const registry = new ToolRegistry(ctx).register(tracked)
      const calls = ["c1", "c2", "c3", "c4"].map((id) => call("tracked", {}, id))

      const results = await registry.dispatchAll(calls, { concurrency: 2 })

      expect(load.peak).toBe(2)
      expect(results.map((r) => r.toolCallId)).toEqual(["c1", "c2", "c3", "c4"])
    })

    it("runs one call at a time with concurrency 1", async () => {
      const log: string[] = []
      const registry = new ToolRegistry(ctx).register(echoTool(log))
      await registry.dispatchAll(
        [call("echo", { text: "a", delayMs: 10 }, "c1"), call("echo", { text: "b" }, "c2")],
        { concurrency: 1 },
      )
      expect(log).toEqual(["start a", "end a", "start b", "end b"])
    })
  })
})

describe("createToolRegistry", () => {
  const names = (registry: ToolRegistry) => registry.list().map((t) => t.name)

  it("registers every built-in tool by default", () => {
    expect(names(createToolRegistry(ctx))).toEqual(["read_file", "list_directory", "write_file", "glob", "run_shell_command"])
  })

  it("keeps only the included tools minus the excluded ones", () => {
    const registry = createToolRegistry(ctx, { include: ["glob", "read_file", "write_file"], exclude: ["write_file"] })
    expect(names(registry)).toEqual(["read_file", "glob"])
    expect(registry.isSealed).toBe(true)
  })

  it("rejects names that are not built-in tools", () => {
    expect(() => createToolRegistry(ctx, { exclude: ["rm_rf"] })).toThrow("Unknown tool names: rm_rf")
  })
})

describe("formatToolOutput", () => {
  it("prefixes errors with their kind", () => {
    const text = formatToolOutput(
      { toolCallId: "c1", toolName: "x", output: "Unknown tool: x", error: "NotFoundError", durationMs: 0 },
      1000,
    )
    expect(text).toBe("[NotFoundError] Unknown tool: x")
  })

  it("serialises structured output as JSON", () => {
    const text = formatToolOutput({ toolCallId: "c1", toolName: "x", output: { ok: true }, error: null, durationMs: 0 }, 1000)
    expect(text).toBe('{\n  "ok": true\n}')
  })
})

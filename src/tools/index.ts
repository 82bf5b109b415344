import type { Logger } from "../util/log.js"
import { createFsTools } from "./fs.js"
import { createGlobTools } from "./glob.js"
import { ToolRegistry } from "./registry.js"
import { createShellTools } from "./shell.js"
import type { ToolContext, ToolDefinition } from "./types.js"

export type ToolSelection = {
  /** Only these tools are registered; unset means all of them. */
  include?: readonly string[]
  /** Never registered, even when included. */
  exclude?: readonly string[]
}

export function createBuiltInTools(): ToolDefinition[] {
  return [...createFsTools(), ...createGlobTools(), ...createShellTools()]
}

export function selectTools(tools: ToolDefinition[], selection: ToolSelection = {}): ToolDefinition[] {
  const known = new Set(tools.map((t) => t.name))
  const unknown = [...(selection.include ?? []), ...(selection.exclude ?? [])].filter((name) => !known.has(name))
  if (unknown.length > 0) throw new Error(`Unknown tool names: ${unknown.join(", ")}`)

  const include = selection.include ? new Set(selection.include) : null
  const exclude = new Set(selection.exclude ?? [])
  return tools.filter((t) => !exclude.has(t.name) && (include === null || include.has(t.name)))
}

/** Registers the selected built-in tools and seals the registry. */
export function createToolRegistry(ctx: ToolContext, options: ToolSelection & { logger?: Logger } = {}): ToolRegistry {
  const registry = new ToolRegistry(ctx, options.logger)
  for (const tool of selectTools(createBuiltInTools(), options)) registry.register(tool)
  return registry.seal()
}

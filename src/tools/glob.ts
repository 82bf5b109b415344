import path from "node:path"
import { glob, hasMagic } from "glob"
import { z } from "zod"
import { ToolError } from "../errors.js"
import { resolveRoot, resolveWorkspacePath, toWorkspaceRelative } from "../util/workspace-path.js"
import type { ToolDefinition } from "./types.js"

const GlobInput = z.object({
  pattern: z.string().min(1),
  path: z.string().default("."),
  maxResults: z.number().int().min(1).max(5000).default(1000),
})

const IGNORED = ["**/node_modules/**", "**/.git/**"]

function assertConfinedPattern(pattern: string): void {
  const segments = pattern.split(/[\\/]/)
  if (path.isAbsolute(pattern) || segments.includes("..")) {
    throw new ToolError("PathEscapeError", `Pattern escapes target directory: ${pattern}`)
  }
}

// Literal directories at the head of the pattern are checked before any globbing.
async function assertConfinedPrefix(targetDir: string, base: string, pattern: string): Promise<void> {
  const segments = pattern.split("/").slice(0, -1)
  let prefix = base
  for (const segment of segments) {
    if (hasMagic(segment)) return
    prefix = path.join(prefix, segment)
    await resolveWorkspacePath(targetDir, prefix)
  }
}

async function confinedMatches(targetDir: string, cwd: string, matches: string[]): Promise<string[]> {
  const root = await resolveRoot(targetDir)
  for (const match of matches) {
    await resolveWorkspacePath(targetDir, toWorkspaceRelative(root, path.join(cwd, match)))
  }
  return matches
}

export function createGlobTools(): ToolDefinition[] {
  const globTool: ToolDefinition<typeof GlobInput> = {
    name: "glob",
    description: "Find files matching a glob pattern (e.g. src/**/*.ts) under a directory of the target directory",
    risk: "safe",
    parametersJsonSchema: {
      type: "object",
      additionalProperties: false,
      properties: {
        pattern: { type: "string", description: "Glob pattern, relative to path" },
        path: { type: "string", description: "Directory to search, relative to the target directory", default: "." },
        maxResults: { type: "integer", minimum: 1, maximum: 5000, default: 1000 },
      },
      required: ["pattern"],
    },
    inputSchema: GlobInput,
    handler: async (input, ctx) => {
      assertConfinedPattern(input.pattern)
      await assertConfinedPrefix(ctx.targetDir, input.path, input.pattern)
      const cwd = await resolveWorkspacePath(ctx.targetDir, input.path)
      const found = await glob(input.pattern, { cwd, nodir: true, posix: true, ignore: IGNORED })
      const matches = await confinedMatches(ctx.targetDir, cwd, found.sort())
      const shown = matches.slice(0, input.maxResults)
      if (shown.length === 0) return `No files match ${input.pattern}`
      const more = matches.length > shown.length ? `\n…(${matches.length - shown.length} more)` : ""
      return shown.join("\n") + more
    },
  }

  return [globTool]
}

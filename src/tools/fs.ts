import fs from "node:fs/promises"
import path from "node:path"
import { z } from "zod"
import { ToolError } from "../errors.js"
import { truncate } from "../util/text.js"
import { resolveRoot, resolveWorkspacePath, toWorkspaceRelative } from "../util/workspace-path.js"
import type { ToolDefinition } from "./types.js"

const SECRET_TEMPLATE_FILENAMES = new Set([".env.example", ".env.sample", ".env.template"])

function isSecretFile(fullPath: string): boolean {
  const base = path.basename(fullPath).toLowerCase()
  if (SECRET_TEMPLATE_FILENAMES.has(base)) return false
  return base === ".env" || base.startsWith(".env.")
}

async function resolveToolPath(targetDir: string, inputPath: string): Promise<string> {
  const fullPath = await resolveWorkspacePath(targetDir, inputPath)
  if (isSecretFile(fullPath)) {
    throw new ToolError("ExecutionError", `Access denied for secret file: ${inputPath}`)
  }
  return fullPath
}

const ReadFileInput = z
  .object({
    path: z.string().min(1),
    startLine: z.number().int().min(1).optional(),
    endLine: z.number().int().min(1).optional(),
  })
  .refine((v) => v.startLine === undefined || v.endLine === undefined || v.endLine >= v.startLine, {
    message: "endLine must not be before startLine",
    path: ["endLine"],
  })

const WriteFileInput = z.object({
  path: z.string().min(1),
  content: z.string(),
  mode: z.enum(["overwrite", "append"]).default("overwrite"),
})

const ListDirectoryInput = z.object({
  path: z.string().default("."),
  depth: z.number().int().min(0).max(5).default(0),
  maxEntries: z.number().int().min(1).max(5000).default(500),
  showHidden: z.boolean().default(false),
})

async function listDirRecursive(
  dir: string,
  options: { depth: number; maxEntries: number; showHidden: boolean },
  prefix = "",
): Promise<string[]> {
  if (options.maxEntries <= 0) return []
  const entries = await fs.readdir(dir, { withFileTypes: true })
  entries.sort((a, b) => a.name.localeCompare(b.name))
  const lines: string[] = []
  for (const entry of entries) {
    if (lines.length >= options.maxEntries) break
    if (!options.showHidden && entry.name.startsWith(".")) continue
    const marker = entry.isDirectory() ? "/" : ""
    lines.push(`${prefix}${entry.name}${marker}`)
    if (entry.isDirectory() && options.depth > 0) {
      const child = path.join(dir, entry.name)
      const childLines = await listDirRecursive(
        child,
        { depth: options.depth - 1, maxEntries: options.maxEntries - lines.length, showHidden: options.showHidden },
        `${prefix}${entry.name}/`,
      )
      lines.push(...childLines)
    }
  }
  return lines
}

function sliceLines(content: string, startLine?: number, endLine?: number): string {
  if (startLine === undefined && endLine === undefined) return content
  const lines = content.split("\n")
  return lines.slice((startLine ?? 1) - 1, endLine ?? lines.length).join("\n")
}

export function createFsTools(): ToolDefinition[] {
  const read_file: ToolDefinition<typeof ReadFileInput> = {
    name: "read_file",
    description: "Read a UTF-8 text file inside the target directory, optionally a 1-based inclusive line range",
    risk: "safe",
    parametersJsonSchema: {
      type: "object",
      additionalProperties: false,
      properties: {
        path: { type: "string", description: "Path relative to the target directory" },
        startLine: { type: "integer", minimum: 1, description: "First line to return" },
        endLine: { type: "integer", minimum: 1, description: "Last line to return" },
      },
      required: ["path"],
    },
    inputSchema: ReadFileInput,
    handler: async (input, ctx) => {
      const fullPath = await resolveToolPath(ctx.targetDir, input.path)
      const content = await fs.readFile(fullPath, "utf8")
      return truncate(sliceLines(content, input.startLine, input.endLine), ctx.maxFileReadChars)
    },
  }

  const write_file: ToolDefinition<typeof WriteFileInput> = {
    name: "write_file",
    description: "Write a text file inside the target directory (disabled unless writes are enabled)",
    risk: "dangerous",
    parametersJsonSchema: {
      type: "object",
      additionalProperties: false,
      properties: {
        path: { type: "string", description: "Path relative to the target directory" },
        content: { type: "string", description: "Text to write" },
        mode: { type: "string", enum: ["overwrite", "append"], default: "overwrite" },
      },
      required: ["path", "content"],
    },
    inputSchema: WriteFileInput,
    handler: async (input, ctx) => {
      if (!ctx.enableWrite) {
        throw new ToolError("ExecutionError", "write_file is disabled. Set TASKLOOP_ENABLE_WRITE=1 to enable.")
      }
      const fullPath = await resolveToolPath(ctx.targetDir, input.path)
      await fs.mkdir(path.dirname(fullPath), { recursive: true })
      if (input.mode === "append") await fs.appendFile(fullPath, input.content, "utf8")
      else await fs.writeFile(fullPath, input.content, "utf8")
      return { ok: true, path: input.path, mode: input.mode, bytes: Buffer.byteLength(input.content, "utf8") }
    },
  }

  const list_directory: ToolDefinition<typeof ListDirectoryInput> = {
    name: "list_directory",
    description: "List entries of a directory inside the target directory; directories end with /",
    risk: "safe",
    parametersJsonSchema: {
      type: "object",
      additionalProperties: false,
      properties: {
        path: { type: "string", description: "Path relative to the target directory (default .)", default: "." },
        depth: { type: "integer", minimum: 0, maximum: 5, default: 0, description: "How many levels to descend" },
        maxEntries: { type: "integer", minimum: 1, maximum: 5000, default: 500 },
        showHidden: { type: "boolean", default: false },
      },
    },
    inputSchema: ListDirectoryInput,
    handler: async (input, ctx) => {
      const fullPath = await resolveToolPath(ctx.targetDir, input.path)
      const lines = await listDirRecursive(fullPath, {
        depth: input.depth,
        maxEntries: input.maxEntries,
        showHidden: input.showHidden,
      })
      if (lines.length === 0) {
        const root = await resolveRoot(ctx.targetDir)
        return `(empty directory: ${toWorkspaceRelative(root, fullPath)})`
      }
      return lines.join("\n")
    },
  }

  return [read_file, list_directory, write_file]
}

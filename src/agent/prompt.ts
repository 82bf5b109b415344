import fs from "node:fs/promises"
import path from "node:path"
import type { ToolSpec } from "../tools/types.js"

export const PROJECT_NOTES_FILE = "AGENTS.md"

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8")
  } catch (e) {
    if (e instanceof Error && "code" in e && (e.code === "ENOENT" || e.code === "EISDIR")) return null
    throw e
  }
}

export function basePrompt(targetDir: string, tools: ReadonlyArray<Pick<ToolSpec, "name">>): string {
  const names = tools.map((t) => t.name).join(", ")
  return `
You are a terminal task agent working inside the directory ${targetDir}.
Complete the user's task, then answer with a short summary of what you found or changed.

### Tool rules
- Available tools: ${names || "(none)"}.
- Paths are relative to the target directory; anything outside it is refused.
- Tool arguments must be a strict JSON object matching the tool's schema.
- Tool output may be truncated. Read large files in line ranges.
- Do not invent file contents; read them first.
- A tool result starting with [ErrorKind] failed. Fix the arguments or try another approach.
- When you are done, reply without calling any tool.
`.trim()
}

/** Base instructions plus the target directory's AGENTS.md, when there is one. */
export async function buildSystemPrompt(targetDir: string, tools: ReadonlyArray<Pick<ToolSpec, "name">>): Promise<string> {
  const notes = (await readIfExists(path.join(targetDir, PROJECT_NOTES_FILE)))?.trim()
  const sections = [basePrompt(targetDir, tools)]
  if (notes) sections.push(`### Project notes (${PROJECT_NOTES_FILE})\n${notes}`)
  return sections.join("\n\n")
}

import fs from "node:fs/promises"
import path from "node:path"
import { ToolError } from "../errors.js"

function isInside(root: string, candidate: string): boolean {
  if (candidate === root) return true
  const rel = path.relative(root, candidate)
  return rel !== "" && rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel)
}

function escapeError(inputPath: string): ToolError {
  return new ToolError("PathEscapeError", `Path escapes target directory: ${inputPath}`)
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR")
}

// Resolves symlinks in the longest existing prefix; the missing tail is appended as-is.
async function realpathOfExistingPrefix(target: string): Promise<string> {
  try {
    return await fs.realpath(target)
  } catch (error) {
    if (!isMissing(error)) throw error
    const parent = path.dirname(target)
    if (parent === target) return target
    return path.join(await realpathOfExistingPrefix(parent), path.basename(target))
  }
}

export async function resolveRoot(targetDir: string): Promise<string> {
  return realpathOfExistingPrefix(path.resolve(targetDir))
}

/**
 * Maps a tool-supplied path onto the target directory. Throws a PathEscapeError
 * when the path leaves the root lexically or through a symlink.
 */
export async function resolveWorkspacePath(targetDir: string, inputPath: string): Promise<string> {
  const root = await resolveRoot(targetDir)
  const lexical = path.resolve(root, inputPath)
  if (!isInside(root, lexical)) throw escapeError(inputPath)

  const real = await realpathOfExistingPrefix(lexical)
  if (!isInside(root, real)) throw escapeError(inputPath)
  return real
}

export function toWorkspaceRelative(root: string, fullPath: string): string {
  const rel = path.relative(root, fullPath)
  return rel === "" ? "." : rel.split(path.sep).join("/")
}

import { z } from "zod"

export const PROVIDER_NAMES = ["openai", "anthropic", "ollama", "mock"] as const

export type ProviderName = (typeof PROVIDER_NAMES)[number]

export type TaskloopConfig = {
  /** Unset means inferred from the model id. */
  provider?: ProviderName
  model: string
  openaiApiKey?: string
  openaiBaseUrl?: string
  anthropicApiKey?: string
  anthropicBaseUrl?: string
  ollamaHost?: string
  targetDir: string
  enableShell: boolean
  enableWrite: boolean
  /** Names of the tools to register; unset registers all of them. */
  tools?: string[]
  excludeTools: string[]
  maxTurns: number
  maxConcurrentTools: number
  stream: boolean
  debug: boolean
  port: number
  maxToolOutputChars: number
  maxFileReadChars: number
  shellTimeoutMs: number
  requestTimeoutMs: number
  maxAttempts: number
  maxOutputTokens: number
  eventBufferSize: number
}

const EnvSchema = z
  .object({
    TASKLOOP_PROVIDER: z.enum(PROVIDER_NAMES).optional(),
    TASKLOOP_MODEL: z.string().optional(),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_BASE_URL: z.string().optional(),
    ANTHROPIC_API_KEY: z.string().optional(),
    ANTHROPIC_BASE_URL: z.string().optional(),
    OLLAMA_HOST: z.string().optional(),
    TASKLOOP_TARGET_DIR: z.string().optional(),
    TASKLOOP_ENABLE_SHELL: z.string().optional(),
    TASKLOOP_ENABLE_WRITE: z.string().optional(),
    TASKLOOP_TOOLS: z.string().optional(),
    TASKLOOP_EXCLUDE_TOOLS: z.string().optional(),
    TASKLOOP_MAX_TURNS: z.string().optional(),
    TASKLOOP_MAX_CONCURRENT_TOOLS: z.string().optional(),
    TASKLOOP_STREAM: z.string().optional(),
    TASKLOOP_DEBUG: z.string().optional(),
    TASKLOOP_PORT: z.string().optional(),
    TASKLOOP_MAX_TOOL_OUTPUT_CHARS: z.string().optional(),
    TASKLOOP_MAX_FILE_READ_CHARS: z.string().optional(),
    TASKLOOP_SHELL_TIMEOUT_MS: z.string().optional(),
    TASKLOOP_REQUEST_TIMEOUT_MS: z.string().optional(),
    TASKLOOP_MAX_ATTEMPTS: z.string().optional(),
    TASKLOOP_MAX_OUTPUT_TOKENS: z.string().optional(),
    TASKLOOP_EVENT_BUFFER: z.string().optional(),
  })
  .passthrough()

export function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue
  const normalized = value.trim().toLowerCase()
  if (["1", "true", "yes", "y", "on"].includes(normalized)) return true
  if (["0", "false", "no", "n", "off"].includes(normalized)) return false
  return defaultValue
}

export function parseIntWithDefault(value: string | undefined, defaultValue: number, min = 0): number {
  if (value === undefined) return defaultValue
  const parsed = Number.parseInt(value, 10)
  return Number.isFinite(parsed) && parsed >= min ? parsed : defaultValue
}

export function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "")
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

/** Overrides (CLI flags) win over the environment, the environment over defaults. */
export function loadConfig(
  overrides: Partial<TaskloopConfig> = {},
  env: Record<string, string | undefined> = process.env,
): TaskloopConfig {
  const e = EnvSchema.parse(env)

  return {
    provider: overrides.provider ?? e.TASKLOOP_PROVIDER,
    model: overrides.model ?? nonEmpty(e.TASKLOOP_MODEL) ?? "gpt-4o-mini",
    openaiApiKey: overrides.openaiApiKey ?? nonEmpty(e.OPENAI_API_KEY),
    openaiBaseUrl: overrides.openaiBaseUrl ?? nonEmpty(e.OPENAI_BASE_URL),
    anthropicApiKey: overrides.anthropicApiKey ?? nonEmpty(e.ANTHROPIC_API_KEY),
    anthropicBaseUrl: overrides.anthropicBaseUrl ?? nonEmpty(e.ANTHROPIC_BASE_URL),
    ollamaHost: overrides.ollamaHost ?? nonEmpty(e.OLLAMA_HOST),
    targetDir: overrides.targetDir ?? nonEmpty(e.TASKLOOP_TARGET_DIR) ?? process.cwd(),
    enableShell: overrides.enableShell ?? parseBool(e.TASKLOOP_ENABLE_SHELL, /* default */ false),
    enableWrite: overrides.enableWrite ?? parseBool(e.TASKLOOP_ENABLE_WRITE, /* default */ false),
    tools: overrides.tools ?? parseList(nonEmpty(e.TASKLOOP_TOOLS)),
    excludeTools: overrides.excludeTools ?? parseList(e.TASKLOOP_EXCLUDE_TOOLS) ?? [],
    maxTurns: overrides.maxTurns ?? parseIntWithDefault(e.TASKLOOP_MAX_TURNS, 25, 1),
    maxConcurrentTools: overrides.maxConcurrentTools ?? parseIntWithDefault(e.TASKLOOP_MAX_CONCURRENT_TOOLS, 4, 1),
    stream: overrides.stream ?? parseBool(e.TASKLOOP_STREAM, true),
    debug: overrides.debug ?? parseBool(e.TASKLOOP_DEBUG, false),
    port: overrides.port ?? parseIntWithDefault(e.TASKLOOP_PORT, 18790, 1),
    maxToolOutputChars: overrides.maxToolOutputChars ?? parseIntWithDefault(e.TASKLOOP_MAX_TOOL_OUTPUT_CHARS, 12_000, 100),
    maxFileReadChars: overrides.maxFileReadChars ?? parseIntWithDefault(e.TASKLOOP_MAX_FILE_READ_CHARS, 120_000, 100),
    shellTimeoutMs: overrides.shellTimeoutMs ?? parseIntWithDefault(e.TASKLOOP_SHELL_TIMEOUT_MS, 60_000, 1),
    requestTimeoutMs: overrides.requestTimeoutMs ?? parseIntWithDefault(e.TASKLOOP_REQUEST_TIMEOUT_MS, 120_000),
    maxAttempts: overrides.maxAttempts ?? parseIntWithDefault(e.TASKLOOP_MAX_ATTEMPTS, 4, 1),
    maxOutputTokens: overrides.maxOutputTokens ?? parseIntWithDefault(e.TASKLOOP_MAX_OUTPUT_TOKENS, 4096, 1),
    eventBufferSize: overrides.eventBufferSize ?? parseIntWithDefault(e.TASKLOOP_EVENT_BUFFER, 256, 1),
  }
}

import fs from "node:fs/promises"
import path from "node:path"
import type { TaskloopConfig } from "../config.js"
import { EventBus, type Subscription } from "../events/bus.js"
import type { LlmClient } from "../llm/client.js"
import { createLlmClient } from "../llm/factory.js"
import type { FetchLike } from "../llm/http.js"
import type { ProviderAdapter } from "../llm/types.js"
import { createToolRegistry } from "../tools/index.js"
import type { ToolRegistry } from "../tools/registry.js"
import type { ToolContext } from "../tools/types.js"
import { silentLogger, type Logger } from "../util/log.js"
import { AgentLoop } from "./loop.js"
import { buildSystemPrompt } from "./prompt.js"
import type { AgentEvent, RunOutcome } from "./types.js"

/** Built once per process and shared read-only by every run. */
export type TaskRuntime = {
  config: TaskloopConfig
  targetDir: string
  registry: ToolRegistry
  client: LlmClient
}

export type TaskRuntimeOptions = {
  logger?: Logger
  /** Replaces the provider the config selects. */
  adapter?: ProviderAdapter
  fetch?: FetchLike
}

export type RunTaskOptions = {
  runtime: TaskRuntime
  task: string
  signal?: AbortSignal
  logger?: Logger
  /** Receives the run's events; subscribed before the run starts. */
  consume?: (events: AsyncIterable<AgentEvent>) => Promise<void>
}

export function createToolContext(config: TaskloopConfig, targetDir = config.targetDir): ToolContext {
  return {
    targetDir,
    enableShell: config.enableShell,
    enableWrite: config.enableWrite,
    maxFileReadChars: config.maxFileReadChars,
    maxToolOutputChars: config.maxToolOutputChars,
    shellTimeoutMs: config.shellTimeoutMs,
  }
}

async function ensureDirectory(dir: string): Promise<string> {
  const resolved = path.resolve(dir)
  const stat = await fs.stat(resolved).catch((e: unknown) => {
    throw new Error(`Target directory does not exist: ${resolved}`, { cause: e })
  })
  if (!stat.isDirectory()) throw new Error(`Target directory is not a directory: ${resolved}`)
  return resolved
}

/** Checks the target directory and builds the tool registry and LLM client. */
export async function createTaskRuntime(config: TaskloopConfig, options: TaskRuntimeOptions = {}): Promise<TaskRuntime> {
  const logger = options.logger ?? silentLogger
  const targetDir = await ensureDirectory(config.targetDir)
  const registry = createToolRegistry(createToolContext(config, targetDir), {
    logger,
    include: config.tools,
    exclude: config.excludeTools,
  })
  const client = createLlmClient(config, { logger, fetch: options.fetch, adapter: options.adapter })
  return { config, targetDir, registry, client }
}

async function drain(subscription: Subscription<AgentEvent>, consume: RunTaskOptions["consume"]): Promise<void> {
  try {
    if (consume) await consume(subscription)
  } finally {
    // a consumer that stops early must not leave the loop blocked on a full buffer
    await subscription.return()
  }
}

/** Runs one task with a fresh bus and loop over the shared runtime. */
export async function runTask(options: RunTaskOptions): Promise<RunOutcome> {
  const { config, targetDir, registry, client } = options.runtime
  const logger = options.logger ?? silentLogger
  const bus = new EventBus<AgentEvent>(config.eventBufferSize)
  const subscription = options.consume ? bus.subscribe() : undefined

  const loop = new AgentLoop({
    client,
    registry,
    bus,
    maxTurns: config.maxTurns,
    maxConcurrentTools: config.maxConcurrentTools,
    stream: config.stream,
    systemPrompt: await buildSystemPrompt(targetDir, registry.specs()),
    signal: options.signal,
    logger,
  })
  logger.debug(`run ${loop.runId}: ${client.providerName}/${client.model} in ${targetDir}`)

  const [run, consumed] = await Promise.allSettled([
    loop.run(options.task),
    subscription ? drain(subscription, options.consume) : Promise.resolve(),
  ])
  if (run.status === "rejected") throw run.reason
  if (consumed.status === "rejected") throw consumed.reason
  return run.value
}

#!/usr/bin/env node
import "dotenv/config"
import { Command, InvalidArgumentError, Option } from "commander"
import process from "node:process"
import { createTaskRuntime, runTask } from "./agent/run-task.js"
import { exitCodeFor } from "./agent/types.js"
import { PROVIDER_NAMES, loadConfig, parseList, type ProviderName, type TaskloopConfig } from "./config.js"
import { ConsoleRenderer } from "./console/renderer.js"
import { connectAndRun } from "./gateway/client.js"
import { startGateway } from "./gateway/server.js"
import { createLogger, type Logger } from "./util/log.js"

type CommonFlags = {
  provider?: ProviderName
  model?: string
  targetDir?: string
  debug?: boolean
  enableShell?: boolean
  enableWrite?: boolean
  tools?: string[]
  excludeTools?: string[]
  maxTurns?: number
  maxConcurrentTools?: number
  stream?: boolean
  port?: number
}

type RunFlags = CommonFlags & { task?: string }

function positiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10)
  if (!Number.isFinite(parsed) || parsed < 1) throw new InvalidArgumentError("Expected a positive integer.")
  return parsed
}

function nameList(value: string): string[] {
  return parseList(value) ?? []
}

function toOverrides(flags: CommonFlags): Partial<TaskloopConfig> {
  return {
    provider: flags.provider,
    model: flags.model,
    targetDir: flags.targetDir,
    debug: flags.debug ? true : undefined,
    enableShell: flags.enableShell ? true : undefined,
    enableWrite: flags.enableWrite ? true : undefined,
    tools: flags.tools,
    excludeTools: flags.excludeTools,
    maxTurns: flags.maxTurns,
    maxConcurrentTools: flags.maxConcurrentTools,
    // --no-stream only; otherwise the environment decides
    stream: flags.stream === false ? false : undefined,
    port: flags.port,
  }
}

/** First Ctrl-C asks for a cooperative stop, the second one exits at once. */
function interruptController(logger: Logger): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController()
  let interrupts = 0
  const onSigint = () => {
    interrupts += 1
    if (interrupts > 1) process.exit(130)
    logger.warn("Interrupted; stopping at the next step. Press Ctrl-C again to exit immediately.")
    controller.abort()
  }
  process.on("SIGINT", onSigint)
  return { signal: controller.signal, dispose: () => process.off("SIGINT", onSigint) }
}

async function runOnce(taskArg: string | undefined, flags: RunFlags): Promise<number> {
  const task = (flags.task ?? taskArg ?? "").trim()
  if (!task) throw new InvalidArgumentError("Missing task. Pass it with --task <text>.")

  const config = loadConfig(toOverrides(flags))
  const logger = createLogger({ debug: config.debug })
  const renderer = new ConsoleRenderer(process.stdout, { debug: config.debug })
  const runtime = await createTaskRuntime(config, { logger })
  const interrupt = interruptController(logger)
  try {
    const outcome = await runTask({
      runtime,
      task,
      signal: interrupt.signal,
      logger,
      consume: (events) => renderer.consume(events),
    })
    return exitCodeFor(outcome)
  } finally {
    interrupt.dispose()
  }
}

async function main() {
  const program = new Command()

  program.name("taskloop").description("LLM-driven task agent for a local directory").version("0.1.0")

  const withCommonOptions = (cmd: Command) =>
    cmd
      .addOption(new Option("--provider <provider>", "model backend (default: inferred from --model)").choices(PROVIDER_NAMES))
      .option("--model <model>", "model id, e.g. gpt-4o-mini, claude-sonnet-4-5, ollama/llama3.1, mock")
      .option("--target-dir <path>", "directory the tools are confined to")
      .option("--debug", "verbose logging and turn markers")
      .option("--enable-shell", "enable run_shell_command (dangerous)")
      .option("--enable-write", "enable write_file (dangerous)")
      .option("--tools <names>", "comma-separated tools to register (default: all)", nameList)
      .option("--exclude-tools <names>", "comma-separated tools to leave out", nameList)
      .option("--max-turns <n>", "model call budget per run", positiveInt)
      .option("--max-concurrent-tools <n>", "tool calls run in parallel per turn", positiveInt)
      .option("--no-stream", "wait for whole completions instead of streaming tokens")
      .option("--port <port>", "gateway port", positiveInt)

  withCommonOptions(
    program
      .command("run", { isDefault: true })
      .description("run one task and exit (0 done, 1 failed, 2 aborted)")
      .argument("[task]", "task to perform")
      .option("--task <text>", "task to perform")
      .action(async (task: string | undefined, flags: RunFlags) => {
        process.exitCode = await runOnce(task, flags)
      }),
  )

  withCommonOptions(
    program
      .command("gateway")
      .description("serve runs over WebSocket")
      .action(async (flags: CommonFlags) => {
        const config = loadConfig(toOverrides(flags))
        const logger = createLogger({ debug: config.debug })
        await startGateway({ config, logger })
        logger.info(`Gateway listening on ws://127.0.0.1:${config.port}/ws`)
      }),
  )

  program
    .command("connect")
    .description("send a task to a running gateway")
    .argument("[task]", "task to perform")
    .option("--task <text>", "task to perform")
    .option("--url <wsUrl>", "WebSocket URL")
    .option("--debug", "show turn markers")
    .action(async (taskArg: string | undefined, flags: { task?: string; url?: string; debug?: boolean }) => {
      const task = (flags.task ?? taskArg ?? "").trim()
      if (!task) throw new InvalidArgumentError("Missing task. Pass it with --task <text>.")
      const config = loadConfig({ debug: flags.debug ? true : undefined })
      const interrupt = interruptController(createLogger({ debug: config.debug }))
      try {
        const url = flags.url ?? `ws://127.0.0.1:${config.port}/ws`
        process.exitCode = await connectAndRun(url, task, { debug: config.debug, signal: interrupt.signal })
      } finally {
        interrupt.dispose()
      }
    })

  // Some runners (pnpm+tsx) may inject a leading "--" which breaks option parsing.
  const argv = process.argv.slice()
  if (argv[2] === "--") argv.splice(2, 1)
  await program.parseAsync(argv)
}

main().catch((e) => {
  process.stderr.write(`[error] ${e instanceof Error ? e.message : String(e)}\n`)
  process.exitCode = 1
})

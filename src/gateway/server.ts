import http from "node:http"
import { ulid } from "ulid"
import { WebSocketServer } from "ws"
import { createTaskRuntime, runTask, type TaskRuntime, type TaskRuntimeOptions } from "../agent/run-task.js"
import { exitCodeFor } from "../agent/types.js"
import type { TaskloopConfig } from "../config.js"
import { errorMessage } from "../errors.js"
import { silentLogger, type Logger } from "../util/log.js"
import { parseClientMessage, rawDataToString, type ServerMessage } from "./protocol.js"

export type GatewaySessionOptions = {
  runtime: TaskRuntime
  logger?: Logger
}

export type GatewayOptions = TaskRuntimeOptions & {
  config: TaskloopConfig
}

/**
 * One connection. Runs at most one task at a time, each with a fresh loop and bus
 * over the runtime every session shares.
 */
export class GatewaySession {
  public readonly sessionId = ulid()
  private active: AbortController | null = null
  private readonly logger: Logger

  public constructor(
    private readonly send: (message: ServerMessage) => void,
    private readonly options: GatewaySessionOptions,
  ) {
    this.logger = options.logger ?? silentLogger
  }

  public get running(): boolean {
    return this.active !== null
  }

  public async handle(raw: string): Promise<void> {
    const parsed = parseClientMessage(raw)
    if (!parsed.ok) {
      this.send({ type: "error", message: parsed.error })
      return
    }

    const message = parsed.message
    if (message.type === "ping") {
      this.send({ type: "pong" })
      return
    }
    if (message.type === "abort") {
      if (!this.active) this.send({ type: "error", message: "No task is running" })
      else this.active.abort()
      return
    }
    if (this.active) {
      this.send({ type: "error", message: "A task is already running" })
      return
    }
    await this.run(message.task)
  }

  /** Aborts the running task, if any. */
  public close(): void {
    this.active?.abort()
  }

  private async run(task: string): Promise<void> {
    const controller = new AbortController()
    this.active = controller
    try {
      const outcome = await runTask({
        runtime: this.options.runtime,
        task,
        signal: controller.signal,
        logger: this.logger,
        consume: async (events) => {
          for await (const event of events) this.send({ type: "event", event })
        },
      })
      this.send({ type: "outcome", runId: outcome.runId, status: outcome.status, exitCode: exitCodeFor(outcome) })
    } catch (e) {
      this.logger.error(`session ${this.sessionId}: ${errorMessage(e)}`)
      this.send({ type: "error", message: errorMessage(e) })
    } finally {
      this.active = null
    }
  }
}

export async function startGateway(options: GatewayOptions): Promise<http.Server> {
  const logger = options.logger ?? silentLogger
  const runtime = await createTaskRuntime(options.config, options)
  const server = http.createServer((req, res) => {
    if (req.method === "GET" && req.url === "/health") {
      res.writeHead(200, { "content-type": "application/json" })
      res.end(JSON.stringify({ ok: true }))
      return
    }
    res.writeHead(404, { "content-type": "text/plain" })
    res.end("Not found")
  })

  const wss = new WebSocketServer({ server, path: "/ws" })

  wss.on("connection", (ws) => {
    const session = new GatewaySession((message) => ws.send(JSON.stringify(message)), { runtime, logger })
    logger.info(`session ${session.sessionId} connected`)
    ws.send(JSON.stringify({ type: "welcome", sessionId: session.sessionId } satisfies ServerMessage))

    ws.on("message", (raw) => {
      session.handle(rawDataToString(raw)).catch((e: unknown) => {
        logger.error(`session ${session.sessionId}: ${errorMessage(e)}`)
      })
    })
    ws.on("close", () => {
      logger.info(`session ${session.sessionId} closed`)
      session.close()
    })
  })

  await new Promise<void>((resolve) => server.listen(options.config.port, resolve))
  return server
}

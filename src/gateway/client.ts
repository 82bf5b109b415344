import { WebSocket } from "ws"
import { EXIT_CODES } from "../agent/types.js"
import { ConsoleRenderer } from "../console/renderer.js"
import { rawDataToString, type ServerMessage } from "./protocol.js"

export type ConnectOptions = {
  out?: { write(chunk: string): unknown }
  debug?: boolean
  signal?: AbortSignal
}

/** Sends one task to a gateway, renders its events, and resolves with the run's exit code. */
export async function connectAndRun(url: string, task: string, options: ConnectOptions = {}): Promise<number> {
  const out = options.out ?? process.stdout
  const renderer = new ConsoleRenderer(out, { debug: options.debug })
  const ws = new WebSocket(url)

  return new Promise<number>((resolve, reject) => {
    let settled = false
    const finish = (code: number) => {
      if (settled) return
      settled = true
      resolve(code)
      ws.close()
    }

    options.signal?.addEventListener("abort", () => {
      if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify({ type: "abort" }))
    })

    ws.on("open", () => ws.send(JSON.stringify({ type: "run_task", task })))
    ws.on("message", (raw) => {
      let msg: ServerMessage
      try {
        msg = JSON.parse(rawDataToString(raw)) as ServerMessage
      } catch {
        out.write(`${rawDataToString(raw)}\n`)
        return
      }

      if (msg.type === "welcome" && options.debug) out.write(`(connected) session=${msg.sessionId}\n`)
      if (msg.type === "event") {
        const text = renderer.render(msg.event)
        if (text) out.write(text)
      }
      if (msg.type === "error") {
        out.write(`(error) ${msg.message}\n`)
        finish(EXIT_CODES.failed)
      }
      if (msg.type === "outcome") finish(msg.exitCode)
    })
    ws.on("error", (e) => {
      if (settled) return
      settled = true
      reject(e)
    })
    ws.on("close", () => finish(EXIT_CODES.failed))
  })
}

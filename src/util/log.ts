export type LogLevel = "debug" | "info" | "warn" | "error"

export type Logger = {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

type Sink = { write(chunk: string): unknown }

export function createLogger(options: { debug?: boolean; sink?: Sink } = {}): Logger {
  const sink = options.sink ?? process.stderr
  const write = (level: LogLevel, message: string) => {
    if (level === "debug" && !options.debug) return
    sink.write(`[${level}] ${message}\n`)
  }
  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}

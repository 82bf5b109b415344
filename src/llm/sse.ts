export type SseMessage = { event?: string; data: string }

/**
 * Splits a byte stream into lines. Stopping early cancels the underlying
 * reader, which closes the HTTP connection.
 */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader()
  const decoder = new TextDecoder()
  let buffer = ""
  let exhausted = false
  try {
    for (;;) {
      const { done, value } = await reader.read()
      if (done) {
        exhausted = true
        break
      }
      buffer += decoder.decode(value, { stream: true })
      let newline = buffer.indexOf("\n")
      while (newline >= 0) {
        const line = buffer.slice(0, newline).replace(/\r$/, "")
        buffer = buffer.slice(newline + 1)
        yield line
        newline = buffer.indexOf("\n")
      }
    }
    buffer += decoder.decode()
    if (buffer.length > 0) yield buffer.replace(/\r$/, "")
  } finally {
    if (!exhausted) await reader.cancel()
    reader.releaseLock()
  }
}

export async function* readSse(body: ReadableStream<Uint8Array>): AsyncGenerator<SseMessage> {
  let event: string | undefined
  let data: string[] = []
  for await (const line of readLines(body)) {
    if (line === "") {
      if (data.length > 0) yield { event, data: data.join("\n") }
      event = undefined
      data = []
      continue
    }
    if (line.startsWith(":")) continue
    const colon = line.indexOf(":")
    const field = colon >= 0 ? line.slice(0, colon) : line
    const value = colon >= 0 ? line.slice(colon + 1).replace(/^ /, "") : ""
    if (field === "event") event = value
    else if (field === "data") data.push(value)
  }
  if (data.length > 0) yield { event, data: data.join("\n") }
}

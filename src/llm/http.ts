import { ProviderError, errorMessage } from "../errors.js"
import { truncate } from "../util/text.js"

export type HttpRequest = {
  method: "POST"
  headers: Record<string, string>
  body: string
  signal?: AbortSignal
}

export type FetchLike = (url: string, init: HttpRequest) => Promise<Response>

export const defaultFetch: FetchLike = (url, init) => fetch(url, init)

function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined
  const seconds = Number(value)
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000)
  const date = Date.parse(value)
  return Number.isNaN(date) ? undefined : Math.max(0, date - Date.now())
}

export function providerErrorFromStatus(
  provider: string,
  status: number,
  body: string,
  retryAfter: string | null = null,
): ProviderError {
  const message = `${provider} error ${status}: ${truncate(body, 500)}`
  if (status === 401 || status === 403) return new ProviderError("Unauthorized", message)
  if (status === 429) return new ProviderError("RateLimited", message, parseRetryAfter(retryAfter))
  if (status === 400 || status === 404 || status === 413 || status === 422) {
    return new ProviderError("InvalidRequest", message)
  }
  if (status === 408 || status === 409 || status >= 500) return new ProviderError("Unavailable", message)
  return new ProviderError("Unknown", message)
}

/** Maps anything thrown during a completion attempt onto the provider taxonomy. */
export function classifyError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error
  if (error instanceof Error) {
    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return new ProviderError("Unavailable", `Request timed out: ${error.message}`, undefined, { cause: error })
    }
    const code = "code" in error ? String(error.code) : ""
    const causeCode = error.cause instanceof Error && "code" in error.cause ? String(error.cause.code) : ""
    const network = ["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "EAI_AGAIN", "UND_ERR_SOCKET"]
    if (
      network.includes(code) ||
      network.includes(causeCode) ||
      (error instanceof TypeError && error.message === "fetch failed")
    ) {
      return new ProviderError("Unavailable", `Network error: ${error.message}`, undefined, { cause: error })
    }
  }
  return new ProviderError("Unknown", errorMessage(error), undefined, { cause: error })
}

/** POSTs JSON and returns the response when it is 2xx; otherwise throws a classified ProviderError. */
export async function postJson(
  fetchImpl: FetchLike,
  provider: string,
  url: string,
  headers: Record<string, string>,
  body: unknown,
  signal?: AbortSignal,
): Promise<Response> {
  const res = await fetchImpl(url, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
    signal,
  })
  if (!res.ok) {
    const raw = await res.text()
    throw providerErrorFromStatus(provider, res.status, raw, res.headers.get("retry-after"))
  }
  return res
}

export async function readJson(res: Response, provider: string): Promise<unknown> {
  const raw = await res.text()
  try {
    return JSON.parse(raw)
  } catch (e) {
    throw new ProviderError("Unknown", `${provider} returned invalid JSON: ${truncate(raw, 200)}`, undefined, {
      cause: e,
    })
  }
}

export function responseBody(res: Response, provider: string): ReadableStream<Uint8Array> {
  if (!res.body) throw new ProviderError("Unknown", `${provider} returned an empty stream body`)
  return res.body
}

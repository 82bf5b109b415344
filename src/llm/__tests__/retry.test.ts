import { describe, expect, it, vi } from "vitest"
import { ProviderError } from "../../errors.js"
import { backoffDelay, callWithRetry, shouldRetry, type RetryPolicy } from "../retry.js"

const policy: RetryPolicy = { maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 1000 }

describe("shouldRetry", () => {
  it("retries transient kinds until maxAttempts", () => {
    const error = new ProviderError("Unavailable", "down")
    expect(shouldRetry(error, 1, policy)).toBe(true)
    expect(shouldRetry(error, 3, policy)).toBe(true)
    expect(shouldRetry(error, 4, policy)).toBe(false)
  })

  it("never retries fatal kinds", () => {
    expect(shouldRetry(new ProviderError("Unauthorized", "no"), 1, policy)).toBe(false)
    expect(shouldRetry(new ProviderError("InvalidRequest", "bad"), 1, policy)).toBe(false)
  })

  it("gives Unknown a single retry", () => {
    const error = new ProviderError("Unknown", "?")
    expect(shouldRetry(error, 1, policy)).toBe(true)
    expect(shouldRetry(error, 2, policy)).toBe(false)
  })
})

describe("backoffDelay", () => {
  const error = new ProviderError("Unavailable", "down")

  it("doubles per attempt within the jitter band", () => {
    expect(backoffDelay(error, 1, policy, () => 0)).toBe(50)
    expect(backoffDelay(error, 1, policy, () => 0.999)).toBe(100)
    expect(backoffDelay(error, 3, policy, () => 0)).toBe(200)
  })

  it("caps at maxDelayMs", () => {
    expect(backoffDelay(error, 10, policy, () => 0)).toBe(500)
  })

  it("waits at least the retry-after hint", () => {
    const limited = new ProviderError("RateLimited", "slow down", 2500)
    expect(backoffDelay(limited, 1, policy, () => 0)).toBe(2500)
  })
})

describe("callWithRetry", () => {
  it("returns after transient failures", async () => {
    const sleep = vi.fn(async () => {})
    const onRetry = vi.fn()
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new ProviderError("RateLimited", "429"))
      .mockRejectedValueOnce(new ProviderError("Unavailable", "503"))
      .mockResolvedValue("ok")

    await expect(callWithRetry(fn, policy, { sleep, random: () => 0, onRetry })).resolves.toBe("ok")
    expect(fn).toHaveBeenCalledTimes(3)
    expect(sleep.mock.calls).toEqual([[50], [100]])
    expect(onRetry).toHaveBeenCalledTimes(2)
  })

  it("surfaces the last error once attempts are exhausted", async () => {
    const fn = vi.fn(async () => {
      throw new ProviderError("Unavailable", "still down")
    })
    const error = await callWithRetry(fn, policy, { sleep: async () => {} }).catch((e: unknown) => e)
    expect(error).toBeInstanceOf(ProviderError)
    expect(error).toMatchObject({ kind: "Unavailable", message: "still down" })
    expect(fn).toHaveBeenCalledTimes(4)
  })

  it("does not retry fatal errors", async () => {
    const fn = vi.fn(async () => {
      throw new ProviderError("Unauthorized", "bad key")
    })
    await expect(callWithRetry(fn, policy, { sleep: async () => {} })).rejects.toMatchObject({ kind: "Unauthorized" })
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it("classifies foreign errors as Unknown", async () => {
    const fn = vi.fn(async () => {
      throw new Error("weird")
    })
    await expect(callWithRetry(fn, policy, { sleep: async () => {} })).rejects.toMatchObject({
      kind: "Unknown",
      message: "weird",
    })
    expect(fn).toHaveBeenCalledTimes(2)
  })
})

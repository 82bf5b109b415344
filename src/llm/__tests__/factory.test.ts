import { describe, expect, it } from "vitest"
import { loadConfig } from "../../config.js"
import { AnthropicProvider } from "../anthropic.js"
import { createLlmClient, createProvider, inferProviderName, resolveProviderName } from "../factory.js"
import { OllamaProvider } from "../ollama.js"
import { OpenAiProvider } from "../openai.js"
import { MOCK_REPLY, ScriptedProvider } from "../scripted.js"

describe("provider selection", () => {
  it("infers the backend from the model id", () => {
    expect(inferProviderName("gpt-4o-mini")).toBe("openai")
    expect(inferProviderName("claude-sonnet-4-5")).toBe("anthropic")
    expect(inferProviderName("ollama/llama3.1")).toBe("ollama")
    expect(inferProviderName("mock")).toBe("mock")
  })

  it("prefers an explicit provider", () => {
    expect(resolveProviderName({ provider: "ollama", model: "gpt-4o-mini" })).toBe("ollama")
    expect(resolveProviderName({ provider: undefined, model: "claude-x" })).toBe("anthropic")
  })

  it("builds the matching adapter", () => {
    const env = {}
    expect(createProvider(loadConfig({ model: "gpt-4o-mini" }, env))).toBeInstanceOf(OpenAiProvider)
    expect(createProvider(loadConfig({ model: "claude-3-5-haiku" }, env))).toBeInstanceOf(AnthropicProvider)
    expect(createProvider(loadConfig({ model: "ollama/qwen2.5" }, env))).toBeInstanceOf(OllamaProvider)
    expect(createProvider(loadConfig({ model: "mock" }, env))).toBeInstanceOf(ScriptedProvider)
  })

  it("creates a client bound to the configured model", () => {
    const client = createLlmClient(loadConfig({ model: "claude-3-5-haiku" }, {}))
    expect(client.providerName).toBe("anthropic")
    expect(client.model).toBe("claude-3-5-haiku")
  })

  it("reports a missing key only when a completion is attempted", async () => {
    const client = createLlmClient(loadConfig({ model: "gpt-4o-mini", maxAttempts: 1 }, {}))
    await expect(client.complete([{ role: "user", content: "hi" }], [], false)).rejects.toMatchObject({
      kind: "Unauthorized",
      message: "Missing OPENAI_API_KEY. Set it in .env or environment variables.",
    })
  })

  it("keeps answering with the mock model across runs", async () => {
    const client = createLlmClient(loadConfig({ model: "mock" }, {}))
    for (const task of ["one", "two", "three"]) {
      const result = await client.complete([{ role: "user", content: task }], [], false)
      expect(result).toMatchObject({ type: "message", message: { content: MOCK_REPLY } })
    }
  })
})

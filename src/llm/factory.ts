import type { ProviderName, TaskloopConfig } from "../config.js"
import type { Logger } from "../util/log.js"
import { AnthropicProvider } from "./anthropic.js"
import { LlmClient } from "./client.js"
import type { FetchLike } from "./http.js"
import { OllamaProvider } from "./ollama.js"
import { OpenAiProvider } from "./openai.js"
import { DEFAULT_RETRY_POLICY } from "./retry.js"
import { ScriptedProvider } from "./scripted.js"
import type { ProviderAdapter } from "./types.js"

export function inferProviderName(model: string): ProviderName {
  if (model === "mock") return "mock"
  if (model.startsWith("claude-")) return "anthropic"
  if (model.startsWith("ollama/")) return "ollama"
  return "openai"
}

export function resolveProviderName(config: Pick<TaskloopConfig, "provider" | "model">): ProviderName {
  return config.provider ?? inferProviderName(config.model)
}

export function createProvider(config: TaskloopConfig, fetch?: FetchLike): ProviderAdapter {
  const provider = resolveProviderName(config)
  switch (provider) {
    case "openai":
      return new OpenAiProvider({ apiKey: config.openaiApiKey, baseUrl: config.openaiBaseUrl, fetch })
    case "anthropic":
      return new AnthropicProvider({
        apiKey: config.anthropicApiKey,
        baseUrl: config.anthropicBaseUrl,
        maxOutputTokens: config.maxOutputTokens,
        fetch,
      })
    case "ollama":
      return new OllamaProvider({ host: config.ollamaHost, fetch })
    case "mock":
      return new ScriptedProvider(undefined, { repeatLast: true })
  }
}

export function createLlmClient(
  config: TaskloopConfig,
  options: { logger?: Logger; fetch?: FetchLike; adapter?: ProviderAdapter } = {},
): LlmClient {
  return new LlmClient(options.adapter ?? createProvider(config, options.fetch), {
    model: config.model,
    retry: { ...DEFAULT_RETRY_POLICY, maxAttempts: config.maxAttempts },
    requestTimeoutMs: config.requestTimeoutMs,
    logger: options.logger,
  })
}

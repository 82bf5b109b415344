export { Conversation } from "./agent/conversation.js"
export { AgentLoop, type AgentLoopOptions } from "./agent/loop.js"
export { buildSystemPrompt } from "./agent/prompt.js"
export { createTaskRuntime, runTask, type RunTaskOptions, type TaskRuntime } from "./agent/run-task.js"
export * from "./agent/types.js"
export { loadConfig, type ProviderName, type TaskloopConfig } from "./config.js"
export { ConsoleRenderer } from "./console/renderer.js"
export * from "./errors.js"
export { EventBus, Subscription } from "./events/bus.js"
export { AnthropicProvider } from "./llm/anthropic.js"
export { LlmClient, type LlmClientOptions } from "./llm/client.js"
export { createLlmClient, createProvider, resolveProviderName } from "./llm/factory.js"
export { OllamaProvider } from "./llm/ollama.js"
export { OpenAiProvider } from "./llm/openai.js"
export { DEFAULT_RETRY_POLICY, type RetryPolicy } from "./llm/retry.js"
export { ScriptedProvider, type ScriptStep, type ScriptedTurn } from "./llm/scripted.js"
export type { CompletionRequest, CompletionResult, ProviderAdapter, StreamEvent } from "./llm/types.js"
export { createBuiltInTools, createToolRegistry, selectTools, type ToolSelection } from "./tools/index.js"
export { ToolRegistry, formatToolOutput } from "./tools/registry.js"
export type { ToolContext, ToolDefinition, ToolResult, ToolSpec } from "./tools/types.js"
export { createLogger, type Logger } from "./util/log.js"

import { describe, expect, it } from "vitest"
import { Conversation } from "../conversation.js"
import type { AssistantMessage } from "../types.js"

const withCalls = (...ids: string[]): AssistantMessage => ({
  role: "assistant",
  content: null,
  toolCalls: ids.map((id) => ({ id, name: "read_file", arguments: { path: "a.txt" } })),
})

const toolReply = (toolCallId: string) => ({
  role: "tool" as const,
  toolCallId,
  name: "read_file",
  content: "ok",
  error: null,
})

describe("Conversation", () => {
  it("keeps messages in append order", () => {
    const conversation = new Conversation([{ role: "system", content: "sys" }])
    conversation.append({ role: "user", content: "hi" })
    conversation.append({ role: "assistant", content: "hello", toolCalls: null })

    expect(conversation.messages.map((m) => m.role)).toEqual(["system", "user", "assistant"])
    expect(conversation.length).toBe(3)
    expect(conversation.last()).toEqual({ role: "assistant", content: "hello", toolCalls: null })
  })

  it("returns a snapshot that later appends do not change", () => {
    const conversation = new Conversation()
    conversation.append({ role: "user", content: "one" })
    const snapshot = conversation.messages
    conversation.append({ role: "user", content: "two" })
    expect(snapshot).toHaveLength(1)
  })

  it("accepts tool messages answering each call in order", () => {
    const conversation = new Conversation()
    conversation.append(withCalls("c1", "c2"))
    expect(conversation.pendingToolCallIds).toEqual(["c1", "c2"])

    conversation.append(toolReply("c1"))
    conversation.append(toolReply("c2"))
    expect(conversation.pendingToolCallIds).toEqual([])
    conversation.append({ role: "user", content: "next" })
    expect(conversation.length).toBe(4)
  })

  it("rejects a tool message out of order", () => {
    const conversation = new Conversation()
    conversation.append(withCalls("c1", "c2"))
    expect(() => conversation.append(toolReply("c2"))).toThrow("Tool message c2 is out of order, expected c1")
  })

  it("rejects a tool message with nothing pending", () => {
    const conversation = new Conversation()
    expect(() => conversation.append(toolReply("c1"))).toThrow("Tool message c1 does not answer a pending tool call")
  })

  it("rejects other messages while calls are unanswered", () => {
    const conversation = new Conversation()
    conversation.append(withCalls("c1"))
    expect(() => conversation.append({ role: "user", content: "hi" })).toThrow(
      "Cannot append user message: tool calls c1 are unanswered",
    )
  })

  it("rejects repeated tool call ids", () => {
    const conversation = new Conversation()
    expect(() => conversation.append(withCalls("c1", "c1"))).toThrow("Assistant message repeats a tool call id")
    expect(conversation.length).toBe(0)
  })
})

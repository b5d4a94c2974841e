import { pino } from "pino";
import type { ChatCompletionApi, ChatCompletionKind } from "../../src/core/api/chat-completion.js";
import type { ChatMessage } from "../../src/types/chat.js";

export const silentLogger = pino({ level: "silent" });

export class RecordingClient implements ChatCompletionApi {
  readonly kind: ChatCompletionKind = "mock";
  readonly calls: Array<{ messages: ChatMessage[]; model?: string }> = [];

  constructor(private readonly reply = "recorded answer") {}

  async chat(messages: readonly ChatMessage[], model?: string): Promise<string> {
    this.calls.push({ messages: [...messages], model });
    return this.reply;
  }
}

export class FailingClient implements ChatCompletionApi {
  readonly kind: ChatCompletionKind = "openai";

  constructor(private readonly error: unknown) {}

  async chat(): Promise<string> {
    throw this.error;
  }
}

export function sequentialIds(prefix = "sid"): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}

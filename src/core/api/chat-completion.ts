import type { ChatMessage } from "../../types/chat.js";

export type ChatCompletionKind = "openai" | "mock";

/**
 * Turns an ordered, role-tagged conversation into one answer. Implementations
 * reject only with UpstreamError.
 */
export interface ChatCompletionApi {
  readonly kind: ChatCompletionKind;
  chat(messages: readonly ChatMessage[], model?: string): Promise<string>;
}

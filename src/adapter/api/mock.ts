import { createHash } from "node:crypto";
import type { ChatCompletionApi } from "../../core/api/chat-completion.js";
import type { ChatMessage } from "../../types/chat.js";

export const MOCK_ANSWER_PREFIX = "[MockAnswer:";
const FINGERPRINT_LENGTH = 12;
const QUESTION_ECHO_LIMIT = 160;

export interface MockClientOptions {
  seed: string;
  defaultModel: string;
}

type Canonical = null | boolean | number | string | Canonical[] | { [key: string]: Canonical };

function canonicalize(value: unknown): Canonical {
  if (value === null || typeof value === "boolean" || typeof value === "number" || typeof value === "string") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (typeof value === "object") {
    const sorted: { [key: string]: Canonical } = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      if (entry !== undefined) {
        sorted[key] = canonicalize(entry);
      }
    }
    return sorted;
  }
  return null;
}

function lastUserQuestion(messages: readonly ChatMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i -= 1) {
    const message = messages[i];
    if (message?.role === "user") {
      return [...message.content.trim()].slice(0, QUESTION_ECHO_LIMIT).join("");
    }
  }
  return "";
}

/**
 * Offline stand-in for the provider. The answer embeds a fingerprint of
 * `{ seed, model, messages }`, so identical requests always read the same.
 */
export class MockChatCompletionApi implements ChatCompletionApi {
  readonly kind = "mock" as const;

  constructor(private readonly options: MockClientOptions) {}

  fingerprint(messages: readonly ChatMessage[], model?: string): string {
    const payload = canonicalize({
      seed: this.options.seed,
      model: model?.trim() || this.options.defaultModel,
      messages,
    });
    return createHash("sha256").update(JSON.stringify(payload), "utf8").digest("hex").slice(0, FINGERPRINT_LENGTH);
  }

  async chat(messages: readonly ChatMessage[], model?: string): Promise<string> {
    const digest = this.fingerprint(messages, model);
    const brief = lastUserQuestion(messages);
    const hint = brief ? ` Q="${brief}"` : "";
    return `${MOCK_ANSWER_PREFIX}${digest}] This is a simulated response for testing.${hint}`;
  }
}

import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type { ChatCompletionApi } from "../core/api/chat-completion.js";
import { UpstreamError, errorMessage } from "../core/errors.js";
import type {
  ChatMessage,
  ChatTurnResult,
  SessionHistory,
  SessionResolution,
  SessionStats,
  StoredMessage,
} from "../types/chat.js";
import { parseChatRequest, type ChatRequest } from "./chat-request.js";
import type { InMemorySessionStore } from "./session-store.js";

/**
 * Purpose:
 * - Runs one chat turn end to end and serves history reads.
 *
 * Dependencies:
 * - session-store: history before and after the model call
 * - core/api: the model client picked by the composition root
 * - chat-request: body validation
 *
 * Used by:
 * - src/server/app.ts, src/cli/chat.ts
 *
 * Flow of a turn:
 * 1) resolve or mint the session id
 * 2) validate the body
 * 3) store the user turn, then read the windowed history
 * 4) call the model with no store state held across the await
 * 5) store the assistant turn; on failure the user turn stays behind
 */

export interface ChatServiceOptions {
  store: InMemorySessionStore;
  client: ChatCompletionApi;
  model: string;
  logger: Logger;
  generateId?: () => string;
}

export interface AskInput {
  sessionToken?: string;
  body: unknown;
}

function toPromptMessages(history: readonly StoredMessage[], context?: string): ChatMessage[] {
  const messages: ChatMessage[] = [];
  for (const entry of history) {
    if (typeof entry.content !== "string") {
      continue;
    }
    messages.push({ role: entry.role, content: entry.content });
  }
  if (context) {
    messages.unshift({ role: "system", content: `Context: ${context}`.trim() });
  }
  return messages;
}

export class ChatService {
  private readonly generateId: () => string;

  constructor(private readonly options: ChatServiceOptions) {
    this.generateId = options.generateId ?? randomUUID;
  }

  get clientKind(): ChatCompletionApi["kind"] {
    return this.options.client.kind;
  }

  /** A fresh id that touches no store state. */
  newSessionId(): string {
    return this.generateId();
  }

  resolveSession(sessionToken?: string): SessionResolution {
    const trimmed = sessionToken?.trim();
    if (trimmed) {
      return { sessionId: trimmed, created: false };
    }
    return { sessionId: this.generateId(), created: true };
  }

  async ask(input: AskInput): Promise<ChatTurnResult> {
    const { sessionId, created } = this.resolveSession(input.sessionToken);
    const request = parseChatRequest(input.body, sessionId);
    const { store, logger } = this.options;

    store.append(sessionId, "user", request.question);
    const messages = this.buildPrompt(request);

    let answer: string;
    try {
      answer = await this.options.client.chat(messages, this.options.model);
    } catch (error) {
      logger.warn({ sessionId, reason: errorMessage(error) }, "model call failed; user turn kept without a reply");
      throw error instanceof UpstreamError ? error : new UpstreamError(errorMessage(error), { cause: error });
    }

    store.append(sessionId, "assistant", answer);
    logger.info({ sessionId, created, promptMessages: messages.length }, "chat turn completed");

    return { sessionId, answer, created };
  }

  /** Reading never creates a session record, even for a freshly minted id. */
  history(sessionToken?: string): SessionHistory {
    const { sessionId, created } = this.resolveSession(sessionToken);
    if (created) {
      return { sessionId, created, messages: [] };
    }
    return { sessionId, created, messages: this.options.store.getHistory(sessionId) };
  }

  clear(sessionToken?: string): void {
    const sessionId = sessionToken?.trim();
    if (!sessionId) {
      return;
    }
    this.options.store.clear(sessionId);
    this.options.logger.info({ sessionId }, "session cleared");
  }

  stats(sessionId: string): SessionStats {
    return this.options.store.stats(sessionId);
  }

  listSessions(): string[] {
    return this.options.store.listSessions();
  }

  private buildPrompt(request: ChatRequest): ChatMessage[] {
    const limit = Math.max(request.maxHistory, 0);
    const history = this.options.store.getHistory(request.sessionId, limit > 0 ? limit : undefined);
    return toPromptMessages(history, request.context);
  }
}

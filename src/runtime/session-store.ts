import { InvalidArgumentError } from "../core/errors.js";
import type { SessionStats, StoredMessage, StoredRole } from "../types/chat.js";

/**
 * Purpose:
 * - Keeps per-session chat turns for the lifetime of the process.
 *
 * Used by:
 * - src/runtime/chat-service.ts
 *
 * Every method is synchronous, so each call runs to completion on the event
 * loop before another request can touch the map. Callers must not hold
 * references across an await expecting them to stay current; reads return
 * copies.
 */

interface SessionRecord {
  history: StoredMessage[];
  createdAt: number;
  updatedAt: number;
}

export type Clock = () => number;

const STORED_ROLES: ReadonlySet<string> = new Set<StoredRole>(["user", "assistant"]);

function isStoredRole(value: string): value is StoredRole {
  return STORED_ROLES.has(value);
}

function wallClockSeconds(): number {
  return Date.now() / 1000;
}

export class InMemorySessionStore {
  private readonly sessions = new Map<string, SessionRecord>();
  private lastTimestamp = 0;

  constructor(private readonly clock: Clock = wallClockSeconds) {}

  append(sessionId: string, role: string, content: string): StoredMessage {
    const normalizedRole = role.trim().toLowerCase();
    if (!isStoredRole(normalizedRole)) {
      throw new InvalidArgumentError("role must be 'user' or 'assistant'");
    }
    if (typeof content !== "string" || !content.trim()) {
      throw new InvalidArgumentError("content must be a non-empty string");
    }

    const timestamp = this.nextTimestamp();
    const message: StoredMessage = Object.freeze({
      role: normalizedRole,
      content: content.trim(),
      timestamp,
    });

    const session = this.sessions.get(sessionId);
    if (session) {
      session.history.push(message);
      session.updatedAt = timestamp;
    } else {
      this.sessions.set(sessionId, { history: [message], createdAt: timestamp, updatedAt: timestamp });
    }

    return message;
  }

  /**
   * Most recent `limit` messages in chronological order, or all of them when
   * `limit` is absent or not positive. Unknown sessions read as empty.
   */
  getHistory(sessionId: string, limit?: number): StoredMessage[] {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return [];
    }
    if (limit !== undefined && limit > 0) {
      return session.history.slice(-limit);
    }
    return [...session.history];
  }

  clear(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  listSessions(): string[] {
    return [...this.sessions.keys()];
  }

  stats(sessionId: string): SessionStats {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return { createdAt: 0, updatedAt: 0, messageCount: 0 };
    }
    return {
      createdAt: session.createdAt,
      updatedAt: session.updatedAt,
      messageCount: session.history.length,
    };
  }

  private nextTimestamp(): number {
    // clock may step backwards; history timestamps must not
    this.lastTimestamp = Math.max(this.clock(), this.lastTimestamp);
    return this.lastTimestamp;
  }
}

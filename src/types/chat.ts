export type ChatRole = "system" | "user" | "assistant";

/** Roles a session history can hold; system prompts are never stored. */
export type StoredRole = Exclude<ChatRole, "system">;

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface StoredMessage {
  readonly role: StoredRole;
  readonly content: string;
  /** Wall-clock seconds at write time. */
  readonly timestamp: number;
}

export interface SessionStats {
  createdAt: number;
  updatedAt: number;
  messageCount: number;
}

export interface SessionResolution {
  sessionId: string;
  created: boolean;
}

export interface ChatTurnResult extends SessionResolution {
  answer: string;
}

export interface SessionHistory extends SessionResolution {
  messages: StoredMessage[];
}

import type { Conversation, SummaryItem, TranscriptItem } from "@callboard/contracts";

export interface ListConversationsOptions {
  active?: boolean;
}

export class UnknownConversationError extends Error {
  readonly conversationId: string;

  constructor(conversationId: string) {
    super(`No conversation found for conversation ID '${conversationId}'. Please verify the ID and try again.`);
    this.name = "UnknownConversationError";
    this.conversationId = conversationId;
  }
}

/**
 * Backing storage for the read API. The capture pipeline writes through
 * the append methods; the HTTP routes only read.
 */
export interface ConversationStore {
  set(conversation: Conversation): Promise<void>;
  get(id: string): Promise<Conversation | null>;
  list(options?: ListConversationsOptions): Promise<Conversation[]>;
  appendTranscript(id: string, item: TranscriptItem): Promise<void>;
  appendSummary(id: string, item: SummaryItem): Promise<void>;
  setActive(id: string, active: boolean): Promise<void>;
}

export class InMemoryConversationStore implements ConversationStore {
  private readonly conversations = new Map<string, Conversation>();

  async set(conversation: Conversation): Promise<void> {
    this.conversations.set(conversation.id, structuredClone(conversation));
  }

  async get(id: string): Promise<Conversation | null> {
    const conversation = this.conversations.get(id);
    return conversation ? structuredClone(conversation) : null;
  }

  async list(options: ListConversationsOptions = {}): Promise<Conversation[]> {
    const out: Conversation[] = [];
    for (const conversation of this.conversations.values()) {
      if (options.active !== undefined && conversation.active !== options.active) continue;
      out.push(structuredClone(conversation));
    }
    return out;
  }

  async appendTranscript(id: string, item: TranscriptItem): Promise<void> {
    this.require(id).transcript.push({ ...item });
  }

  async appendSummary(id: string, item: SummaryItem): Promise<void> {
    this.require(id).summary.push({ ...item });
  }

  async setActive(id: string, active: boolean): Promise<void> {
    this.require(id).active = active;
  }

  private require(id: string): Conversation {
    const conversation = this.conversations.get(id);
    if (!conversation) {
      throw new UnknownConversationError(id);
    }
    return conversation;
  }
}

/**
 * Session Service
 *
 * Conversation history on top of a SessionStore: session creation, user and
 * assistant turns, and the recent history handed to answer generation.
 */

import { randomUUID } from 'crypto';
import type {
  ConversationTurn,
  SessionMessage,
  SessionRecord,
  SessionStore,
} from '../../contracts/capabilities.js';
import type { Source } from '../../pipelines/query/types.js';
import { createChildLogger } from '../../utils/logger.js';

export const DEFAULT_HISTORY_LIMIT = 10;
export const DEFAULT_LLM_CONTEXT_MESSAGES = 6;

const ROLE_LABELS: Record<SessionMessage['role'], string> = {
  user: 'المستخدم',
  assistant: 'المساعد',
};

export interface CreateSessionOptions {
  /** Default country for the session's queries */
  country?: string;
  metadata?: Record<string, unknown>;
}

export class SessionService {
  private readonly logger = createChildLogger({ service: 'SessionService' });

  constructor(
    private readonly store: SessionStore,
    private readonly generateId: () => string = randomUUID,
    private readonly now: () => Date = () => new Date()
  ) {}

  async createSession(options: CreateSessionOptions = {}): Promise<SessionRecord> {
    const metadata: Record<string, unknown> = { ...(options.metadata ?? {}) };
    if (options.country) {
      metadata.country = options.country;
    }
    const session = await this.store.createSession(this.generateId(), metadata);
    this.logger.info({ sessionId: session.sessionId }, 'Created session');
    return session;
  }

  getSession(sessionId: string): Promise<SessionRecord | null> {
    return this.store.getSession(sessionId);
  }

  sessionExists(sessionId: string): Promise<boolean> {
    return this.store.sessionExists(sessionId);
  }

  addUserMessage(sessionId: string, content: string, metadata?: Record<string, unknown>): Promise<boolean> {
    return this.store.addMessage(sessionId, {
      role: 'user',
      content,
      timestamp: this.now().toISOString(),
      metadata: metadata ?? {},
    });
  }

  addAssistantMessage(
    sessionId: string,
    content: string,
    sources?: Source[],
    metadata?: Record<string, unknown>
  ): Promise<boolean> {
    const messageMetadata: Record<string, unknown> = { ...(metadata ?? {}) };
    if (sources && sources.length > 0) {
      messageMetadata.sources = sources;
    }
    return this.store.addMessage(sessionId, {
      role: 'assistant',
      content,
      timestamp: this.now().toISOString(),
      metadata: messageMetadata,
    });
  }

  getConversationHistory(sessionId: string, limit = DEFAULT_HISTORY_LIMIT): Promise<SessionMessage[]> {
    return this.store.getMessages(sessionId, limit);
  }

  /**
   * Most recent turns as generator history, oldest first
   */
  async getHistoryTurns(sessionId: string, maxMessages = DEFAULT_LLM_CONTEXT_MESSAGES): Promise<ConversationTurn[]> {
    const messages = await this.getConversationHistory(sessionId, maxMessages);
    return messages.map(({ role, content }) => ({ role, content }));
  }

  /**
   * Recent turns as labelled plain text, one block per message
   */
  async getContextForLlm(sessionId: string, maxMessages = DEFAULT_LLM_CONTEXT_MESSAGES): Promise<string> {
    const messages = await this.getConversationHistory(sessionId, maxMessages);
    return messages.map((message) => `${ROLE_LABELS[message.role]}: ${message.content}`).join('\n\n');
  }

  deleteSession(sessionId: string): Promise<boolean> {
    return this.store.deleteSession(sessionId);
  }

  listSessions(limit?: number): Promise<string[]> {
    return this.store.listSessions(limit);
  }

  healthCheck(): Promise<boolean> {
    return this.store.healthCheck();
  }
}

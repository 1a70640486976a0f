/**
 * Redis-backed conversation storage
 *
 * One JSON document per session under `session:<id>`. Every write resets the
 * key's TTL, so a session expires after a fixed period of inactivity.
 */

import type { Redis } from 'ioredis';
import type { SessionMessage, SessionRecord, SessionStore } from '../../contracts/capabilities.js';
import { createChildLogger } from '../../utils/logger.js';

export const SESSION_KEY_PREFIX = 'session:';

export function sessionKey(sessionId: string): string {
  return `${SESSION_KEY_PREFIX}${sessionId}`;
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSessionMessage(value: unknown): value is SessionMessage {
  return (
    isRecordObject(value) &&
    (value.role === 'user' || value.role === 'assistant') &&
    typeof value.content === 'string' &&
    typeof value.timestamp === 'string'
  );
}

export function isSessionRecord(value: unknown): value is SessionRecord {
  return (
    isRecordObject(value) &&
    typeof value.sessionId === 'string' &&
    typeof value.createdAt === 'string' &&
    typeof value.updatedAt === 'string' &&
    Array.isArray(value.messages) &&
    value.messages.every(isSessionMessage) &&
    isRecordObject(value.metadata)
  );
}

export class RedisSessionStore implements SessionStore {
  private readonly logger = createChildLogger({ service: 'RedisSessionStore' });

  constructor(
    private readonly client: Redis,
    private readonly ttlSeconds: number
  ) {}

  private async save(session: SessionRecord): Promise<void> {
    await this.client.set(sessionKey(session.sessionId), JSON.stringify(session), 'EX', this.ttlSeconds);
  }

  async createSession(sessionId: string, metadata: Record<string, unknown> = {}): Promise<SessionRecord> {
    const now = new Date().toISOString();
    const session: SessionRecord = { sessionId, createdAt: now, updatedAt: now, messages: [], metadata };
    await this.save(session);
    this.logger.info({ sessionId }, 'Created session');
    return session;
  }

  async getSession(sessionId: string): Promise<SessionRecord | null> {
    const raw = await this.client.get(sessionKey(sessionId));
    if (!raw) {
      return null;
    }
    const parsed: unknown = JSON.parse(raw);
    if (!isSessionRecord(parsed)) {
      this.logger.warn({ sessionId }, 'Discarding malformed session document');
      return null;
    }
    return parsed;
  }

  async sessionExists(sessionId: string): Promise<boolean> {
    return (await this.client.exists(sessionKey(sessionId))) > 0;
  }

  async addMessage(sessionId: string, message: SessionMessage): Promise<boolean> {
    const session = await this.getSession(sessionId);
    if (!session) {
      return false;
    }
    session.messages.push(message);
    session.updatedAt = message.timestamp;
    await this.save(session);
    return true;
  }

  async getMessages(sessionId: string, limit?: number): Promise<SessionMessage[]> {
    const session = await this.getSession(sessionId);
    if (!session) {
      return [];
    }
    return limit ? session.messages.slice(-limit) : session.messages;
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    const removed = await this.client.del(sessionKey(sessionId));
    if (removed > 0) {
      this.logger.info({ sessionId }, 'Deleted session');
    }
    return removed > 0;
  }

  /**
   * Session ids found by SCAN, up to `limit`
   */
  async listSessions(limit = 100): Promise<string[]> {
    const ids: string[] = [];
    let cursor = '0';
    do {
      const [next, keys] = await this.client.scan(cursor, 'MATCH', `${SESSION_KEY_PREFIX}*`, 'COUNT', 100);
      cursor = next;
      for (const key of keys) {
        ids.push(key.slice(SESSION_KEY_PREFIX.length));
        if (ids.length >= limit) {
          return ids;
        }
      }
    } while (cursor !== '0');
    return ids;
  }

  async healthCheck(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (error) {
      this.logger.debug({ error }, 'Redis health check failed');
      return false;
    }
  }
}

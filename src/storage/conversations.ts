/**
 * @file src/storage/conversations.ts
 * @description Repository для сессий и сообщений чата
 * @context История разговора: routing получает последние сообщения сессии,
 *          API отдаёт историю клиенту. Очистка старых сессий — по retention.
 */

import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { getDatabase } from './database';
import { logger } from '../utils/logger';
import { safeJsonParse } from '../utils/helpers';
import { ConversationMessage } from '../types/pipeline';

export interface SessionRecord {
  id: string;
  userId: string;
  metadata: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
}

export interface MessageRecord {
  id: string;
  sessionId: string;
  role: ConversationMessage['role'];
  content: string;
  agentName: string | null;
  metadata: Record<string, unknown>;
  createdAt: string;
}

export interface NewMessage {
  sessionId: string;
  role: ConversationMessage['role'];
  content: string;
  agentName?: string | null;
  metadata?: Record<string, unknown>;
}

export interface CleanupResult {
  sessionsDeleted: number;
  messagesDeleted: number;
  cutoff: string;
}

/**
 * Хранилище разговоров (реализация — SQLite, в тестах — in-memory база)
 */
export interface ConversationStore {
  createSession(userId: string, metadata?: Record<string, unknown>): SessionRecord;
  getSession(id: string): SessionRecord | null;
  addMessage(message: NewMessage): MessageRecord;
  /** Последние limit сообщений, от старых к новым */
  getMessages(sessionId: string, limit?: number): MessageRecord[];
  countMessages(sessionId: string): number;
  /** История для routing (role + content) */
  getRecentHistory(sessionId: string, limit: number): ConversationMessage[];
  cleanup(retentionDays: number, now?: Date): CleanupResult;
}

interface SessionRow {
  id: string;
  user_id: string;
  metadata: string;
  created_at: string;
  updated_at: string;
}

interface MessageRow {
  id: string;
  session_id: string;
  role: string;
  content: string;
  agent_name: string | null;
  metadata: string;
  created_at: string;
}

function parseMetadata(text: string): Record<string, unknown> {
  const parsed = safeJsonParse<unknown>(text, {});
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return Object.fromEntries(Object.entries(parsed));
}

function rowToSession(row: SessionRow): SessionRecord {
  return {
    id: row.id,
    userId: row.user_id,
    metadata: parseMetadata(row.metadata),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToMessage(row: MessageRow): MessageRecord {
  return {
    id: row.id,
    sessionId: row.session_id,
    role: row.role === 'assistant' ? 'assistant' : 'user',
    content: row.content,
    agentName: row.agent_name,
    metadata: parseMetadata(row.metadata),
    createdAt: row.created_at,
  };
}

export class SqliteConversationStore implements ConversationStore {
  constructor(private readonly db: Database.Database) {}

  createSession(userId: string, metadata: Record<string, unknown> = {}): SessionRecord {
    const now = new Date().toISOString();
    const session: SessionRecord = {
      id: uuidv4(),
      userId,
      metadata,
      createdAt: now,
      updatedAt: now,
    };

    this.db.prepare(`
      INSERT INTO sessions (id, user_id, metadata, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(session.id, userId, JSON.stringify(metadata), now, now);

    logger.debug('Session created', { session_id: session.id, user_id: userId });
    return session;
  }

  getSession(id: string): SessionRecord | null {
    const row = this.db
      .prepare<[string], SessionRow>('SELECT * FROM sessions WHERE id = ?')
      .get(id);
    return row ? rowToSession(row) : null;
  }

  addMessage(message: NewMessage): MessageRecord {
    const now = new Date().toISOString();
    const record: MessageRecord = {
      id: uuidv4(),
      sessionId: message.sessionId,
      role: message.role,
      content: message.content,
      agentName: message.agentName ?? null,
      metadata: message.metadata ?? {},
      createdAt: now,
    };

    const insert = this.db.transaction(() => {
      this.db.prepare(`
        INSERT INTO messages (id, session_id, role, content, agent_name, metadata, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `).run(
        record.id,
        record.sessionId,
        record.role,
        record.content,
        record.agentName,
        JSON.stringify(record.metadata),
        now
      );
      this.db.prepare('UPDATE sessions SET updated_at = ? WHERE id = ?').run(now, record.sessionId);
    });
    insert();

    return record;
  }

  getMessages(sessionId: string, limit: number = 50): MessageRecord[] {
    const rows = this.db
      .prepare<[string, number], MessageRow>(`
        SELECT id, session_id, role, content, agent_name, metadata, created_at
        FROM messages
        WHERE session_id = ?
        ORDER BY seq DESC
        LIMIT ?
      `)
      .all(sessionId, limit);

    return rows.reverse().map(rowToMessage);
  }

  countMessages(sessionId: string): number {
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) as count FROM messages WHERE session_id = ?')
      .get(sessionId);
    return row?.count ?? 0;
  }

  getRecentHistory(sessionId: string, limit: number): ConversationMessage[] {
    return this.getMessages(sessionId, limit).map(message => ({
      role: message.role,
      content: message.content,
    }));
  }

  /**
   * Удаляет сессии без активности дольше retentionDays вместе с их сообщениями
   */
  cleanup(retentionDays: number, now: Date = new Date()): CleanupResult {
    const cutoffDate = new Date(now.getTime());
    cutoffDate.setDate(cutoffDate.getDate() - retentionDays);
    const cutoff = cutoffDate.toISOString();

    const run = this.db.transaction(() => {
      const messages = this.db.prepare(`
        DELETE FROM messages
        WHERE session_id IN (SELECT id FROM sessions WHERE updated_at < ?)
      `).run(cutoff);
      const sessions = this.db.prepare('DELETE FROM sessions WHERE updated_at < ?').run(cutoff);
      return { sessionsDeleted: sessions.changes, messagesDeleted: messages.changes };
    });

    const result = { ...run(), cutoff };
    logger.info('Old conversations cleaned up', {
      sessions_deleted: result.sessionsDeleted,
      messages_deleted: result.messagesDeleted,
      cutoff_date: cutoff,
    });
    return result;
  }
}

let store: SqliteConversationStore | null = null;

/**
 * Singleton хранилища поверх основной базы
 */
export function getConversationStore(): SqliteConversationStore {
  if (!store) {
    store = new SqliteConversationStore(getDatabase());
  }
  return store;
}

export default SqliteConversationStore;

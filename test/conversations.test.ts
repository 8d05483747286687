/**
 * @file test/conversations.test.ts
 * @description Тесты SqliteConversationStore на in-memory базе
 */

import Database from 'better-sqlite3';
import { createTables } from '../src/storage/database';
import { SqliteConversationStore } from '../src/storage/conversations';

describe('SqliteConversationStore', () => {
  let db: Database.Database;
  let store: SqliteConversationStore;

  beforeEach(() => {
    db = new Database(':memory:');
    createTables(db);
    store = new SqliteConversationStore(db);
  });

  afterEach(() => {
    db.close();
  });

  it('should create and read a session', () => {
    const session = store.createSession('user-1', { advertiser: 'acme' });

    expect(store.getSession(session.id)).toEqual({
      id: session.id,
      userId: 'user-1',
      metadata: { advertiser: 'acme' },
      createdAt: session.createdAt,
      updatedAt: session.updatedAt,
    });
  });

  it('should return null for an unknown session', () => {
    expect(store.getSession('missing')).toBeNull();
  });

  it('should return the last messages oldest first', () => {
    const session = store.createSession('user-1');
    for (let i = 1; i <= 5; i++) {
      store.addMessage({ sessionId: session.id, role: i % 2 ? 'user' : 'assistant', content: `message ${i}` });
    }

    const messages = store.getMessages(session.id, 3);

    expect(messages.map(message => message.content)).toEqual(['message 3', 'message 4', 'message 5']);
    expect(store.countMessages(session.id)).toBe(5);
  });

  it('should keep assistant metadata and agent name', () => {
    const session = store.createSession('user-1');
    store.addMessage({
      sessionId: session.id,
      role: 'assistant',
      content: 'CTR is 1.8%.',
      agentName: 'orchestrator',
      metadata: { confidence: 0.8 },
    });

    const [message] = store.getMessages(session.id);

    expect(message.agentName).toBe('orchestrator');
    expect(message.metadata).toEqual({ confidence: 0.8 });
  });

  it('should build routing history from role and content', () => {
    const session = store.createSession('user-1');
    store.addMessage({ sessionId: session.id, role: 'user', content: 'How is campaign 42?' });
    store.addMessage({ sessionId: session.id, role: 'assistant', content: 'It is pacing well.' });

    expect(store.getRecentHistory(session.id, 6)).toEqual([
      { role: 'user', content: 'How is campaign 42?' },
      { role: 'assistant', content: 'It is pacing well.' },
    ]);
  });

  it('should delete sessions inactive longer than the retention period', () => {
    const stale = store.createSession('user-1');
    store.addMessage({ sessionId: stale.id, role: 'user', content: 'old question' });
    const fresh = store.createSession('user-2');
    store.addMessage({ sessionId: fresh.id, role: 'user', content: 'new question' });

    db.prepare('UPDATE sessions SET updated_at = ? WHERE id = ?').run('2025-12-01T00:00:00.000Z', stale.id);
    db.prepare('UPDATE sessions SET updated_at = ? WHERE id = ?').run('2026-01-20T00:00:00.000Z', fresh.id);

    const result = store.cleanup(30, new Date('2026-01-31T12:00:00.000Z'));

    expect(result).toEqual({
      sessionsDeleted: 1,
      messagesDeleted: 1,
      cutoff: '2026-01-01T12:00:00.000Z',
    });
    expect(store.getSession(stale.id)).toBeNull();
    expect(store.getSession(fresh.id)).not.toBeNull();
    expect(store.countMessages(stale.id)).toBe(0);
  });
});

import fs from 'fs';
import os from 'os';
import path from 'path';
import pino from 'pino';
import { DatabaseManager } from '../src/infrastructure/database/DatabaseManager.js';

describe('DatabaseManager', () => {
  let tmpDir: string;
  let dbPath: string;
  let db: DatabaseManager;

  const insertConversation = (sessionId: string, modelName = 'gemma3:1b'): number => {
    db.executeQuery('INSERT INTO conversations (session_id, model_name) VALUES (?, ?)', [
      sessionId,
      modelName,
    ]);
    const [row] = db.executeQuery<{ id: number }>(
      'SELECT id FROM conversations WHERE session_id = ?',
      [sessionId]
    );
    return row.id;
  };

  const countRows = (table: string): number =>
    db.executeQuery<{ count: number }>(`SELECT COUNT(*) AS count FROM ${table}`)[0].count;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'chat-store-db-'));
    dbPath = path.join(tmpDir, 'data', 'conversations', 'conversations.db');
    db = new DatabaseManager({ dbPath, logger: pino({ level: 'silent' }) });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('Schema', () => {
    test('should create the database file and its parent directories', () => {
      expect(fs.existsSync(dbPath)).toBe(true);
      expect(db.getDatabasePath()).toBe(path.resolve(dbPath));
    });

    test('should create extra directories', () => {
      const logsDir = path.join(tmpDir, 'other', 'logs');
      new DatabaseManager({
        dbPath: path.join(tmpDir, 'other', 'db.sqlite'),
        directories: [logsDir],
        logger: pino({ level: 'silent' }),
      });
      expect(fs.statSync(logsDir).isDirectory()).toBe(true);
    });

    test('should contain exactly the three tables', () => {
      const tables = db.executeQuery<{ name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
      );
      expect(tables.map((t) => t.name)).toEqual(['conversations', 'messages', 'model_usage']);
    });

    test('should contain the four named indexes', () => {
      const indexes = db.executeQuery<{ name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'index' AND name NOT LIKE 'sqlite_%' ORDER BY name"
      );
      expect(indexes.map((i) => i.name)).toEqual([
        'idx_conversations_session',
        'idx_messages_conversation',
        'idx_messages_timestamp',
        'idx_model_usage_timestamp',
      ]);
    });

    test('should contain the timestamp trigger', () => {
      const triggers = db.executeQuery<{ name: string; tbl_name: string }>(
        "SELECT name, tbl_name FROM sqlite_master WHERE type = 'trigger'"
      );
      expect(triggers).toEqual([{ name: 'update_conversation_timestamp', tbl_name: 'messages' }]);
    });

    test('should be safe to initialize again and keep data', () => {
      insertConversation('session1');

      const reopened = new DatabaseManager({ dbPath, logger: pino({ level: 'silent' }) });
      reopened.initializeDatabase();

      expect(
        reopened.executeQuery<{ session_id: string }>('SELECT session_id FROM conversations')
      ).toEqual([{ session_id: 'session1' }]);
    });
  });

  describe('Constraints', () => {
    test('should reject a message with an unknown role', () => {
      const conversationId = insertConversation('session1');

      expect(() =>
        db.executeQuery(
          'INSERT INTO messages (conversation_id, role, content) VALUES (?, ?, ?)',
          [conversationId, 'robot', 'beep']
        )
      ).toThrow(/CHECK constraint failed/);
      expect(countRows('messages')).toBe(0);
    });

    test('should accept the three known roles', () => {
      const conversationId = insertConversation('session1');
      db.executeMany('INSERT INTO messages (conversation_id, role, content) VALUES (?, ?, ?)', [
        [conversationId, 'system', 'Be brief'],
        [conversationId, 'user', 'Hello'],
        [conversationId, 'assistant', 'Hi'],
      ]);
      expect(countRows('messages')).toBe(3);
    });

    test('should reject a message for a missing conversation', () => {
      expect(() =>
        db.executeQuery(
          'INSERT INTO messages (conversation_id, role, content) VALUES (?, ?, ?)',
          [999, 'user', 'orphan']
        )
      ).toThrow(/FOREIGN KEY constraint failed/);
    });

    test('should reject a duplicate session id', () => {
      insertConversation('session1');
      expect(() => insertConversation('session1')).toThrow(/UNIQUE constraint failed/);
    });

    test('should delete messages with their conversation', () => {
      const keep = insertConversation('keep');
      const drop = insertConversation('drop');
      db.executeMany('INSERT INTO messages (conversation_id, role, content) VALUES (?, ?, ?)', [
        [drop, 'user', 'one'],
        [drop, 'assistant', 'two'],
        [keep, 'user', 'three'],
      ]);

      db.executeQuery('DELETE FROM conversations WHERE session_id = ?', ['drop']);

      expect(
        db.executeQuery<{ content: string }>('SELECT content FROM messages ORDER BY id')
      ).toEqual([{ content: 'three' }]);
    });
  });

  describe('Conversation timestamp trigger', () => {
    test('should bump updated_at to at least the message timestamp', () => {
      const conversationId = insertConversation('session1');
      db.executeQuery("UPDATE conversations SET updated_at = '2000-01-01 00:00:00' WHERE id = ?", [
        conversationId,
      ]);

      db.executeQuery('INSERT INTO messages (conversation_id, role, content) VALUES (?, ?, ?)', [
        conversationId,
        'user',
        'Hello',
      ]);

      const [{ updated_at }] = db.executeQuery<{ updated_at: string }>(
        'SELECT updated_at FROM conversations WHERE id = ?',
        [conversationId]
      );
      const [{ timestamp }] = db.executeQuery<{ timestamp: string }>(
        'SELECT timestamp FROM messages WHERE conversation_id = ?',
        [conversationId]
      );

      expect(updated_at).not.toBe('2000-01-01 00:00:00');
      expect(updated_at >= timestamp).toBe(true);
    });

    test('should follow a message stamped in the future', () => {
      const conversationId = insertConversation('session1');
      db.executeQuery(
        'INSERT INTO messages (conversation_id, role, content, timestamp) VALUES (?, ?, ?, ?)',
        [conversationId, 'user', 'Hello', '2999-01-01 00:00:00']
      );

      const [{ updated_at }] = db.executeQuery<{ updated_at: string }>(
        'SELECT updated_at FROM conversations WHERE id = ?',
        [conversationId]
      );
      expect(updated_at).toBe('2999-01-01 00:00:00');
    });

    test('should compare ISO timestamps by time, not text', () => {
      const today = new Date().toISOString().slice(0, 10);
      const conversationId = insertConversation('session1');
      db.executeQuery(
        'INSERT INTO messages (conversation_id, role, content, timestamp) VALUES (?, ?, ?, ?)',
        [conversationId, 'user', 'Hello', `${today}T00:00:00Z`]
      );

      const [{ updated_at }] = db.executeQuery<{ updated_at: string }>(
        'SELECT updated_at FROM conversations WHERE id = ?',
        [conversationId]
      );
      expect(updated_at).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
      expect(updated_at >= `${today} 00:00:00`).toBe(true);
    });
  });

  describe('Scoped connections', () => {
    test('should commit when the work returns', () => {
      const result = db.withConnection((conn) => {
        conn
          .prepare('INSERT INTO model_usage (model_name, tokens_used) VALUES (?, ?)')
          .run('m1', 10);
        return 'done';
      });

      expect(result).toBe('done');
      expect(countRows('model_usage')).toBe(1);
    });

    test('should roll back and rethrow when the work throws', () => {
      const failure = new Error('boom');

      expect(() =>
        db.withConnection((conn) => {
          conn
            .prepare('INSERT INTO model_usage (model_name, tokens_used) VALUES (?, ?)')
            .run('m1', 10);
          throw failure;
        })
      ).toThrow(failure);
      expect(countRows('model_usage')).toBe(0);
    });

    test('should log storage errors before rethrowing', () => {
      const lines: string[] = [];
      const logged = new DatabaseManager({
        dbPath,
        logger: pino({ level: 'error' }, { write: (line: string) => lines.push(line) }),
      });

      expect(() => logged.executeQuery('SELECT * FROM missing_table')).toThrow(
        /no such table: missing_table/
      );
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0]).msg).toBe('Database error');
    });

    test('should log and rethrow when a connection cannot be opened', () => {
      const lines: string[] = [];
      const logged = new DatabaseManager({
        dbPath,
        logger: pino({ level: 'error' }, { write: (line: string) => lines.push(line) }),
      });
      fs.rmSync(path.dirname(dbPath), { recursive: true, force: true });

      expect(() => logged.getStatistics()).toThrow(/directory does not exist/);
      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0]).msg).toBe('Database error');
    });
  });

  describe('Queries', () => {
    test('should return [] for statements without rows', () => {
      expect(
        db.executeQuery('INSERT INTO model_usage (model_name, tokens_used) VALUES (?, ?)', [
          'm1',
          5,
        ])
      ).toEqual([]);
    });

    test('should bind named parameters', () => {
      db.executeQuery(
        'INSERT INTO model_usage (model_name, tokens_used) VALUES (@model, @tokens)',
        [{ model: 'm1', tokens: 42 }]
      );
      expect(
        db.executeQuery<{ tokens_used: number }>('SELECT tokens_used FROM model_usage')
      ).toEqual([{ tokens_used: 42 }]);
    });

    test('should report the rows changed by a batch', () => {
      const changes = db.executeMany(
        'INSERT INTO model_usage (model_name, tokens_used) VALUES (?, ?)',
        [
          ['m1', 1],
          ['m2', 2],
          ['m3', 3],
        ]
      );
      expect(changes).toBe(3);
    });

    test('should roll back the whole batch when one set fails', () => {
      const conversationId = insertConversation('session1');

      expect(() =>
        db.executeMany('INSERT INTO messages (conversation_id, role, content) VALUES (?, ?, ?)', [
          [conversationId, 'user', 'fine'],
          [conversationId, 'robot', 'not fine'],
        ])
      ).toThrow(/CHECK constraint failed/);
      expect(countRows('messages')).toBe(0);
    });
  });

  describe('Maintenance', () => {
    test('should describe table columns', () => {
      const columns = db.getTableInfo('messages');
      expect(columns.map((c) => c.name)).toEqual([
        'id',
        'conversation_id',
        'role',
        'content',
        'timestamp',
        'token_count',
      ]);
      expect(columns.find((c) => c.name === 'id')?.pk).toBe(1);
      expect(columns.find((c) => c.name === 'content')?.notnull).toBe(1);
    });

    test('should return no columns for an unknown table', () => {
      expect(db.getTableInfo('nope')).toEqual([]);
    });

    test('should pass the integrity check', () => {
      expect(db.checkIntegrity()).toBe(true);
    });

    test('should vacuum without losing data', () => {
      insertConversation('session1');
      db.executeQuery('DELETE FROM conversations');
      insertConversation('session2');

      db.vacuum();

      expect(db.checkIntegrity()).toBe(true);
      expect(countRows('conversations')).toBe(1);
    });
  });

  describe('Statistics', () => {
    test('should report zeros for an empty database', () => {
      const stats = db.getStatistics();
      expect(stats.totalConversations).toBe(0);
      expect(stats.totalMessages).toBe(0);
      expect(stats.totalTokens).toBe(0);
      expect(stats.dbSizeBytes).toBeGreaterThan(0);
      expect(stats.dbSizeMb).toBeCloseTo(stats.dbSizeBytes / (1024 * 1024));
    });

    test('should count conversations, messages and tokens', () => {
      const a = insertConversation('a');
      const b = insertConversation('b');
      db.executeMany(
        'INSERT INTO messages (conversation_id, role, content, token_count) VALUES (?, ?, ?, ?)',
        [
          [a, 'user', 'Hello', 10],
          [a, 'assistant', 'Hi', 5],
          [b, 'user', 'Untracked', null],
        ]
      );

      const stats = db.getStatistics();
      expect(stats.totalConversations).toBe(2);
      expect(stats.totalMessages).toBe(3);
      expect(stats.totalTokens).toBe(15);
    });
  });
});

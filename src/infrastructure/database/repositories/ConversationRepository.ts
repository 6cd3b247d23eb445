import type Database from 'better-sqlite3';
import type {
  AppendMessageInput,
  IConversationRepository,
} from '../../../core/interfaces/IConversationRepository.js';
import {
  type Conversation,
  type ConversationRecord,
  type Message,
  type MessageRecord,
  type MessageRole,
  toConversation,
  toMessage,
} from '../../../core/entities/Conversation.js';
import type { DatabaseManager } from '../DatabaseManager.js';

/**
 * SQLite implementation of conversation repository
 */
export class ConversationRepository implements IConversationRepository {
  constructor(private db: DatabaseManager) {}

  createConversation(sessionId: string, modelName: string, title?: string): Conversation {
    return this.db.withConnection((conn) => {
      const { lastInsertRowid } = conn
        .prepare('INSERT INTO conversations (session_id, model_name, title) VALUES (?, ?, ?)')
        .run(sessionId, modelName, title ?? null);

      const row = conn
        .prepare<[number | bigint], ConversationRecord>('SELECT * FROM conversations WHERE id = ?')
        .get(lastInsertRowid);
      if (!row) {
        throw new Error(`Conversation not found after insert: ${sessionId}`);
      }
      return toConversation(row);
    });
  }

  getConversation(sessionId: string): Conversation | null {
    const row = this.db.withConnection((conn) =>
      conn
        .prepare<[string], ConversationRecord>('SELECT * FROM conversations WHERE session_id = ?')
        .get(sessionId)
    );
    return row ? toConversation(row) : null;
  }

  getOrCreateConversation(sessionId: string, modelName: string, title?: string): Conversation {
    return this.db.withConnection((conn) => {
      conn
        .prepare(
          'INSERT OR IGNORE INTO conversations (session_id, model_name, title) VALUES (?, ?, ?)'
        )
        .run(sessionId, modelName, title ?? null);

      const row = conn
        .prepare<[string], ConversationRecord>('SELECT * FROM conversations WHERE session_id = ?')
        .get(sessionId);
      if (!row) {
        throw new Error(`Conversation not found: ${sessionId}`);
      }
      return toConversation(row);
    });
  }

  listConversations(limit: number = 100): Conversation[] {
    const rows = this.db.executeQuery<ConversationRecord>(
      'SELECT * FROM conversations ORDER BY updated_at DESC, id DESC LIMIT ?',
      [limit]
    );
    return rows.map(toConversation);
  }

  updateTitle(sessionId: string, title: string): boolean {
    return this.db.withConnection(
      (conn) =>
        conn.prepare('UPDATE conversations SET title = ? WHERE session_id = ?').run(title, sessionId)
          .changes > 0
    );
  }

  addMessage(
    sessionId: string,
    role: MessageRole,
    content: string,
    tokenCount?: number
  ): Message {
    return this.db.withConnection((conn) => {
      const conversation = conn
        .prepare<[string], { id: number }>('SELECT id FROM conversations WHERE session_id = ?')
        .get(sessionId);
      if (!conversation) {
        throw new Error(`Conversation not found: ${sessionId}`);
      }
      return insertMessage(conn, conversation.id, role, content, tokenCount);
    });
  }

  appendMessage(input: AppendMessageInput): Message {
    return this.db.withConnection((conn) => {
      conn
        .prepare(
          'INSERT OR IGNORE INTO conversations (session_id, model_name, title) VALUES (?, ?, ?)'
        )
        .run(input.sessionId, input.modelName, input.title ?? null);

      const conversation = conn
        .prepare<[string], { id: number }>('SELECT id FROM conversations WHERE session_id = ?')
        .get(input.sessionId);
      if (!conversation) {
        throw new Error(`Conversation not found: ${input.sessionId}`);
      }

      const message = insertMessage(
        conn,
        conversation.id,
        input.role,
        input.content,
        input.tokenCount
      );

      if (input.usage) {
        conn
          .prepare(
            'INSERT INTO model_usage (model_name, tokens_used, response_time) VALUES (?, ?, ?)'
          )
          .run(input.modelName, input.usage.tokensUsed, input.usage.responseTimeMs ?? null);
      }
      return message;
    });
  }

  getMessages(sessionId: string): Message[] {
    const rows = this.db.executeQuery<MessageRecord>(
      `
      SELECT m.* FROM messages m
      JOIN conversations c ON c.id = m.conversation_id
      WHERE c.session_id = ?
      ORDER BY m.id
    `,
      [sessionId]
    );
    return rows.map(toMessage);
  }

  /**
   * Messages go with the conversation (ON DELETE CASCADE)
   */
  deleteConversation(sessionId: string): boolean {
    return this.db.withConnection(
      (conn) =>
        conn.prepare('DELETE FROM conversations WHERE session_id = ?').run(sessionId).changes > 0
    );
  }
}

function insertMessage(
  conn: Database.Database,
  conversationId: number,
  role: MessageRole,
  content: string,
  tokenCount?: number
): Message {
  const { lastInsertRowid } = conn
    .prepare(
      'INSERT INTO messages (conversation_id, role, content, token_count) VALUES (?, ?, ?, ?)'
    )
    .run(conversationId, role, content, tokenCount ?? null);

  const row = conn
    .prepare<[number | bigint], MessageRecord>('SELECT * FROM messages WHERE id = ?')
    .get(lastInsertRowid);
  if (!row) {
    throw new Error(`Message not found after insert in conversation ${conversationId}`);
  }
  return toMessage(row);
}

export const REQUIRED_TABLES = ['conversations', 'messages', 'model_usage'] as const;

export const INDEX_NAMES = [
  'idx_messages_conversation',
  'idx_conversations_session',
  'idx_messages_timestamp',
  'idx_model_usage_timestamp',
] as const;

/**
 * Idempotent: safe to run on every startup
 */
export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS conversations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id TEXT NOT NULL UNIQUE,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    title TEXT,
    model_name TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS messages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    conversation_id INTEGER NOT NULL,
    role TEXT NOT NULL CHECK(role IN ('user', 'assistant', 'system')),
    content TEXT NOT NULL,
    timestamp TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    token_count INTEGER,
    FOREIGN KEY (conversation_id) REFERENCES conversations(id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS model_usage (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    model_name TEXT NOT NULL,
    tokens_used INTEGER NOT NULL,
    response_time REAL,
    timestamp TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  );

  CREATE INDEX IF NOT EXISTS idx_messages_conversation ON messages(conversation_id);
  CREATE INDEX IF NOT EXISTS idx_conversations_session ON conversations(session_id);
  CREATE INDEX IF NOT EXISTS idx_messages_timestamp ON messages(timestamp DESC);
  CREATE INDEX IF NOT EXISTS idx_model_usage_timestamp ON model_usage(timestamp DESC);

  -- never moves updated_at behind the inserted message
  CREATE TRIGGER IF NOT EXISTS update_conversation_timestamp
  AFTER INSERT ON messages
  BEGIN
    UPDATE conversations
    SET updated_at = MAX(CURRENT_TIMESTAMP, COALESCE(datetime(NEW.timestamp), CURRENT_TIMESTAMP))
    WHERE id = NEW.conversation_id;
  END;
`;

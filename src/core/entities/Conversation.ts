/**
 * Conversation domain entities
 */
export const MESSAGE_ROLES = ['user', 'assistant', 'system'] as const;
export type MessageRole = (typeof MESSAGE_ROLES)[number];

export interface Conversation {
  id: number;
  sessionId: string;
  title: string | null;
  modelName: string;
  createdAt: string;
  updatedAt: string;
}

export interface Message {
  id: number;
  conversationId: number;
  role: MessageRole;
  content: string;
  timestamp: string;
  tokenCount: number | null;
}

/**
 * Rows as stored in SQLite
 */
export interface ConversationRecord {
  id: number;
  session_id: string;
  created_at: string;
  updated_at: string;
  title: string | null;
  model_name: string;
}

export interface MessageRecord {
  id: number;
  conversation_id: number;
  role: MessageRole;
  content: string;
  timestamp: string;
  token_count: number | null;
}

export function toConversation(row: ConversationRecord): Conversation {
  return {
    id: row.id,
    sessionId: row.session_id,
    title: row.title,
    modelName: row.model_name,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toMessage(row: MessageRecord): Message {
  return {
    id: row.id,
    conversationId: row.conversation_id,
    role: row.role,
    content: row.content,
    timestamp: row.timestamp,
    tokenCount: row.token_count,
  };
}

import type { Conversation, Message, MessageRole } from '../entities/Conversation.js';

export interface AppendMessageInput {
  sessionId: string;
  /** Used only when this message creates the conversation */
  modelName: string;
  role: MessageRole;
  content: string;
  tokenCount?: number;
  title?: string;
  /** Written to model_usage in the same transaction as the message */
  usage?: {
    tokensUsed: number;
    responseTimeMs?: number;
  };
}

/**
 * Interface for conversation persistence
 */
export interface IConversationRepository {
  createConversation(sessionId: string, modelName: string, title?: string): Conversation;

  getConversation(sessionId: string): Conversation | null;

  getOrCreateConversation(sessionId: string, modelName: string, title?: string): Conversation;

  listConversations(limit?: number): Conversation[];

  updateTitle(sessionId: string, title: string): boolean;

  addMessage(sessionId: string, role: MessageRole, content: string, tokenCount?: number): Message;

  /**
   * Create the conversation if needed and add the message, atomically
   */
  appendMessage(input: AppendMessageInput): Message;

  getMessages(sessionId: string): Message[];

  deleteConversation(sessionId: string): boolean;
}

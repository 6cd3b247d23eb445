import type { Logger } from 'pino';
import { z } from 'zod';
import type { IConversationRepository } from '../../core/interfaces/IConversationRepository.js';
import type { IModelUsageRepository } from '../../core/interfaces/IModelUsageRepository.js';
import type { Conversation, Message, MessageRole } from '../../core/entities/Conversation.js';
import type { ModelUsageSummary } from '../../core/entities/ModelUsage.js';

const TokenCountSchema = z.number().int().nonnegative();

const ResponseUsageSchema = z.object({
  tokensUsed: TokenCountSchema,
  responseTimeMs: z.number().finite().nonnegative().optional(),
});

export interface RecordMessageOptions {
  /** Model the conversation is created with on its first message */
  modelName: string;
  tokenCount?: number;
  title?: string;
}

export interface RecordModelResponseOptions {
  modelName: string;
  tokensUsed: number;
  responseTimeMs?: number;
}

/**
 * Service for persisting conversations
 */
export class ConversationService {
  constructor(
    private conversationRepo: IConversationRepository,
    private usageRepo: IModelUsageRepository,
    private logger: Logger
  ) {}

  /**
   * Append a message, creating the conversation on the first message of a session
   */
  recordMessage(
    sessionId: string,
    role: MessageRole,
    content: string,
    options: RecordMessageOptions
  ): Message {
    const message = this.conversationRepo.appendMessage({
      sessionId,
      modelName: options.modelName,
      role,
      content,
      tokenCount: TokenCountSchema.optional().parse(options.tokenCount),
      title: options.title,
    });

    this.logger.debug({ sessionId, role, messageId: message.id }, 'Message recorded');
    return message;
  }

  /**
   * Store an assistant reply together with its usage record, in one transaction
   */
  recordModelResponse(
    sessionId: string,
    content: string,
    options: RecordModelResponseOptions
  ): Message {
    const usage = ResponseUsageSchema.parse({
      tokensUsed: options.tokensUsed,
      responseTimeMs: options.responseTimeMs,
    });

    const message = this.conversationRepo.appendMessage({
      sessionId,
      modelName: options.modelName,
      role: 'assistant',
      content,
      tokenCount: usage.tokensUsed,
      usage,
    });

    this.logger.debug(
      { sessionId, messageId: message.id, model: options.modelName, tokens: usage.tokensUsed },
      'Model response recorded'
    );
    return message;
  }

  getHistory(sessionId: string): Message[] {
    return this.conversationRepo.getMessages(sessionId);
  }

  getConversation(sessionId: string): Conversation | null {
    return this.conversationRepo.getConversation(sessionId);
  }

  listConversations(limit?: number): Conversation[] {
    return this.conversationRepo.listConversations(limit);
  }

  getModelUsage(): ModelUsageSummary[] {
    return this.usageRepo.getUsageByModel();
  }

  deleteConversation(sessionId: string): boolean {
    const deleted = this.conversationRepo.deleteConversation(sessionId);
    if (deleted) {
      this.logger.info({ sessionId }, 'Conversation deleted');
    }
    return deleted;
  }
}

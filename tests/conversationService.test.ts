import fs from 'fs';
import os from 'os';
import path from 'path';
import pino from 'pino';
import { ZodError } from 'zod';
import { ConversationService } from '../src/application/services/ConversationService.js';
import { DatabaseManager } from '../src/infrastructure/database/DatabaseManager.js';
import { ConversationRepository } from '../src/infrastructure/database/repositories/ConversationRepository.js';
import { ModelUsageRepository } from '../src/infrastructure/database/repositories/ModelUsageRepository.js';

describe('ConversationService', () => {
  let tmpDir: string;
  let usage: ModelUsageRepository;
  let service: ConversationService;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'chat-store-service-'));
    const logger = pino({ level: 'silent' });
    const db = new DatabaseManager({ dbPath: path.join(tmpDir, 'conversations.db'), logger });
    usage = new ModelUsageRepository(db);
    service = new ConversationService(new ConversationRepository(db), usage, logger);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  test('should create the conversation on the first message', () => {
    expect(service.getConversation('session1')).toBeNull();

    service.recordMessage('session1', 'user', 'Hello', { modelName: 'gemma3:1b', title: 'Intro' });

    const conversation = service.getConversation('session1');
    expect(conversation?.modelName).toBe('gemma3:1b');
    expect(conversation?.title).toBe('Intro');
  });

  test('should append later messages to the same conversation', () => {
    const first = service.recordMessage('session1', 'system', 'Be brief', { modelName: 'gemma3:1b' });
    const second = service.recordMessage('session1', 'user', 'Hello', { modelName: 'llama3.2:1b' });

    expect(second.conversationId).toBe(first.conversationId);
    expect(service.getConversation('session1')?.modelName).toBe('gemma3:1b');
    expect(service.getHistory('session1').map((m) => m.role)).toEqual(['system', 'user']);
  });

  test('should store a model response with its usage record', () => {
    service.recordMessage('session1', 'user', 'What is 2+2?', { modelName: 'gemma3:1b' });
    const reply = service.recordModelResponse('session1', 'The answer is 4', {
      modelName: 'gemma3:1b',
      tokensUsed: 12,
      responseTimeMs: 40,
    });

    expect(reply.role).toBe('assistant');
    expect(reply.tokenCount).toBe(12);
    expect(service.getModelUsage()).toEqual([
      { modelName: 'gemma3:1b', calls: 1, totalTokens: 12, avgResponseTimeMs: 40 },
    ]);
  });

  test('should reject an invalid token count before writing anything', () => {
    expect(() =>
      service.recordModelResponse('session1', 'reply', { modelName: 'gemma3:1b', tokensUsed: NaN })
    ).toThrow(ZodError);
    expect(() =>
      service.recordMessage('session1', 'user', 'Hello', { modelName: 'gemma3:1b', tokenCount: 1.5 })
    ).toThrow(ZodError);

    expect(service.getConversation('session1')).toBeNull();
    expect(service.getHistory('session1')).toEqual([]);
    expect(usage.getUsageByModel()).toEqual([]);
  });

  test('should keep the first message and its usage together', () => {
    service.recordModelResponse('session1', 'Hi', { modelName: 'gemma3:1b', tokensUsed: 0 });

    expect(service.getConversation('session1')?.modelName).toBe('gemma3:1b');
    expect(service.getHistory('session1').map((m) => [m.role, m.tokenCount])).toEqual([
      ['assistant', 0],
    ]);
    expect(usage.getUsageByModel()).toEqual([
      { modelName: 'gemma3:1b', calls: 1, totalTokens: 0, avgResponseTimeMs: null },
    ]);
  });

  test('should list and delete conversations', () => {
    service.recordMessage('a', 'user', 'one', { modelName: 'gemma3:1b' });
    service.recordMessage('b', 'user', 'two', { modelName: 'gemma3:1b' });

    expect(service.listConversations()).toHaveLength(2);
    expect(service.deleteConversation('a')).toBe(true);
    expect(service.deleteConversation('a')).toBe(false);
    expect(service.listConversations().map((c) => c.sessionId)).toEqual(['b']);
    expect(service.getHistory('a')).toEqual([]);
  });
});

import type { Config } from './config.js';
import { ConversationService } from './application/services/ConversationService.js';
import { DatabaseManager } from './infrastructure/database/DatabaseManager.js';
import { ConversationRepository } from './infrastructure/database/repositories/ConversationRepository.js';
import { ModelUsageRepository } from './infrastructure/database/repositories/ModelUsageRepository.js';
import { createLoggers, getLogger, type Loggers } from './infrastructure/logging/loggers.js';

/**
 * Everything the process needs, built once at startup and passed by reference
 */
export interface AppContext {
  config: Config;
  loggers: Loggers;
  database: DatabaseManager;
  conversations: ConversationRepository;
  modelUsage: ModelUsageRepository;
  conversationService: ConversationService;
  close(): void;
}

export function bootstrap(config: Config): AppContext {
  const loggers = createLoggers({
    appName: config.appName,
    logsDir: config.paths.logsDir,
    level: config.logging.level,
    maxBytes: config.logging.maxBytes,
    backupCount: config.logging.backupCount,
    console: config.logging.console,
  });

  try {
    const database = new DatabaseManager({
      dbPath: config.paths.databaseFile,
      directories: [config.paths.dataDir, config.paths.conversationsDir, config.paths.logsDir],
      busyTimeoutMs: config.database.busyTimeoutMs,
      logger: getLogger(loggers, 'database'),
    });
    const conversations = new ConversationRepository(database);
    const modelUsage = new ModelUsageRepository(database);

    return {
      config,
      loggers,
      database,
      conversations,
      modelUsage,
      conversationService: new ConversationService(
        conversations,
        modelUsage,
        getLogger(loggers, 'conversations')
      ),
      close: () => loggers.close(),
    };
  } catch (error) {
    loggers.close();
    throw error;
  }
}

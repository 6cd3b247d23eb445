#!/usr/bin/env node

/**
 * Initialize the data directory: create directories, database schema and
 * log files, then report statistics and integrity.
 */

import { getConfig, printConfigInfo } from './config.js';
import { bootstrap, type AppContext } from './bootstrap.js';
import { logException, logStartup } from './infrastructure/logging/loggers.js';

function main(): number {
  const config = getConfig();
  if (config.debug) {
    printConfigInfo(config);
  }

  let app: AppContext | null = null;
  try {
    app = bootstrap(config);
    const { loggers, database } = app;
    logStartup(loggers, config.appName);

    const stats = database.getStatistics();
    loggers.app.info(
      `📊 Database Statistics: ${stats.totalConversations} conversations, ${stats.totalMessages} messages, ` +
        `${stats.totalTokens} tokens, ${stats.dbSizeMb.toFixed(2)} MB`
    );

    if (database.checkIntegrity()) {
      loggers.app.info('✓ Database integrity check passed');
    } else {
      loggers.error.error(`Database integrity check failed: ${database.getDatabasePath()}`);
      return 1;
    }

    loggers.app.info(`✓ Data initialized at ${config.paths.dataDir}`);
    return 0;
  } catch (error) {
    if (app) {
      logException(app.loggers, error);
    }
    console.error('💥 Fatal error in main():', error);
    return 1;
  } finally {
    app?.close();
  }
}

process.exitCode = main();

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import pino, { type Logger } from 'pino';
import type { DatabaseStatistics, TableColumnInfo } from '../../core/entities/Statistics.js';
import { SCHEMA_SQL } from './schema.js';

export interface DatabaseManagerOptions {
  dbPath: string;
  /** Created (recursively) before the database is opened */
  directories?: string[];
  /** How long a connection waits on a locked database, in milliseconds */
  busyTimeoutMs?: number;
  logger?: Logger;
}

const createDefaultLogger = (): Logger =>
  pino({
    name: 'database',
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
  });

/**
 * Owns the SQLite file: creates directories and schema, and hands out
 * short-lived scoped connections.
 */
export class DatabaseManager {
  private readonly dbPath: string;
  private readonly busyTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: DatabaseManagerOptions) {
    this.dbPath = path.resolve(options.dbPath);
    this.busyTimeoutMs = options.busyTimeoutMs ?? 10000;
    this.logger = options.logger ?? createDefaultLogger();

    this.ensureDirectories(options.directories ?? []);
    this.initializeDatabase();
  }

  private ensureDirectories(directories: string[]): void {
    for (const dir of [...directories, path.dirname(this.dbPath)]) {
      fs.mkdirSync(dir, { recursive: true });
    }
    this.logger.debug({ directories }, 'Data directories ensured');
  }

  /**
   * Create tables, indexes and the trigger if they are absent
   */
  initializeDatabase(): void {
    if (!fs.existsSync(this.dbPath)) {
      this.logger.info({ dbPath: this.dbPath }, 'Creating new database');
    }

    this.withConnection((db) => {
      db.exec(SCHEMA_SQL);
    });
    this.logger.info({ dbPath: this.dbPath }, 'Database initialized successfully');
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  /**
   * Run `work` on a fresh connection inside a transaction.
   * Commits when `work` returns; rolls back, logs and rethrows when it throws.
   * The connection is closed either way.
   */
  withConnection<T>(work: (db: Database.Database) => T): T {
    return this.scoped((db) => db.transaction(() => work(db))());
  }

  /**
   * Run a single statement. Rows for statements that return data, [] otherwise.
   */
  executeQuery<T = unknown>(sql: string, params: unknown[] = []): T[] {
    return this.withConnection((db) => {
      const stmt = db.prepare<unknown[], T>(sql);
      if (stmt.reader) {
        return stmt.all(...params);
      }
      stmt.run(...params);
      return [];
    });
  }

  /**
   * Run a statement once per parameter set, all in one transaction.
   * Returns the number of rows changed.
   */
  executeMany(sql: string, paramsList: unknown[][]): number {
    return this.withConnection((db) => {
      const stmt = db.prepare<unknown[]>(sql);
      let changes = 0;
      for (const params of paramsList) {
        changes += stmt.run(...params).changes;
      }
      return changes;
    });
  }

  getTableInfo(tableName: string): TableColumnInfo[] {
    return this.withConnection((db) =>
      db.prepare<[string], TableColumnInfo>('SELECT * FROM pragma_table_info(?)').all(tableName)
    );
  }

  /**
   * Rebuild the file to reclaim free pages. Runs outside a transaction.
   */
  vacuum(): void {
    this.logger.info('Running VACUUM on database');
    this.scoped((db) => db.exec('VACUUM'));
    this.logger.info('VACUUM completed');
  }

  checkIntegrity(): boolean {
    return this.withConnection((db) => db.pragma('integrity_check', { simple: true }) === 'ok');
  }

  getStatistics(): DatabaseStatistics {
    return this.withConnection((db) => {
      const count = (sql: string): number =>
        db.prepare<[], { value: number | null }>(sql).get()?.value ?? 0;

      const dbSizeBytes = count(
        'SELECT page_count * page_size AS value FROM pragma_page_count(), pragma_page_size()'
      );

      return {
        totalConversations: count('SELECT COUNT(*) AS value FROM conversations'),
        totalMessages: count('SELECT COUNT(*) AS value FROM messages'),
        totalTokens: count('SELECT COALESCE(SUM(token_count), 0) AS value FROM messages'),
        dbSizeBytes,
        dbSizeMb: dbSizeBytes / (1024 * 1024),
      };
    });
  }

  private openConnection(): Database.Database {
    const db = new Database(this.dbPath, { timeout: this.busyTimeoutMs });
    try {
      db.pragma('foreign_keys = ON');
    } catch (error) {
      db.close();
      throw error;
    }
    return db;
  }

  private scoped<T>(work: (db: Database.Database) => T): T {
    let db: Database.Database | null = null;
    try {
      db = this.openConnection();
      return work(db);
    } catch (error) {
      this.logger.error({ err: error, dbPath: this.dbPath }, 'Database error');
      throw error;
    } finally {
      db?.close();
    }
  }
}

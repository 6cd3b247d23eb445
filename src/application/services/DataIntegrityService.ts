import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type { Logger } from 'pino';
import type { ModelUsageSummary } from '../../core/entities/ModelUsage.js';
import { INDEX_NAMES, REQUIRED_TABLES } from '../../infrastructure/database/schema.js';
import { LOG_FILES } from '../../infrastructure/logging/loggers.js';

const MB = 1024 * 1024;

export const THRESHOLDS = {
  /** Log files above this are reported as large */
  logWarnBytes: 10 * MB,
  /** Log files above this are flagged for archiving */
  logArchiveBytes: 100 * MB,
  /** Any *.log above this gets a maintenance suggestion */
  logSuggestBytes: 50 * MB,
  /** Database above this gets a VACUUM suggestion */
  databaseSuggestBytes: 100 * MB,
} as const;

export interface IntegrityPaths {
  dataDir: string;
  conversationsDir: string;
  logsDir: string;
  databaseFile: string;
}

export interface DirectoryEntry {
  name: string;
  path: string;
  exists: boolean;
}

export interface DirectoryCheck {
  passed: boolean;
  entries: DirectoryEntry[];
}

export interface TableEntry {
  name: string;
  present: boolean;
  rowCount: number | null;
}

export interface DatabaseCheck {
  passed: boolean;
  path: string;
  exists: boolean;
  sizeBytes: number | null;
  tables: TableEntry[];
  indexes: string[];
  /** Helper indexes the schema defines that the file lacks. Reported, not fatal */
  missingIndexes: string[];
  error?: string;
}

export interface IntegrityCheck {
  passed: boolean;
  /** True when there was no database to check */
  skipped: boolean;
  result: string | null;
  error?: string;
}

export type LogFileStatus = 'missing' | 'ok' | 'large' | 'archive';

export interface LogFileEntry {
  name: string;
  path: string;
  sizeBytes: number | null;
  status: LogFileStatus;
}

export interface StatisticsReport {
  available: boolean;
  totalConversations: number;
  totalMessages: number;
  messagesByRole: Array<{ role: string; count: number }>;
  totalTokens: number;
  conversationsByModel: Array<{ modelName: string; count: number }>;
  firstConversationAt: string | null;
  lastConversationAt: string | null;
  modelUsage: ModelUsageSummary[];
  error?: string;
}

export interface MaintenanceSuggestion {
  message: string;
  actions: string[];
}

export interface IntegrityReport {
  startedAt: Date;
  directories: DirectoryCheck;
  database: DatabaseCheck;
  integrity: IntegrityCheck;
  logs: LogFileEntry[];
  statistics: StatisticsReport;
  suggestions: MaintenanceSuggestion[];
  /** Directories, database structure and integrity all passed */
  passed: boolean;
}

export function classifyLogSize(sizeBytes: number): Exclude<LogFileStatus, 'missing'> {
  if (sizeBytes > THRESHOLDS.logArchiveBytes) return 'archive';
  if (sizeBytes > THRESHOLDS.logWarnBytes) return 'large';
  return 'ok';
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const emptyStatistics = (): StatisticsReport => ({
  available: false,
  totalConversations: 0,
  totalMessages: 0,
  messagesByRole: [],
  totalTokens: 0,
  conversationsByModel: [],
  firstConversationAt: null,
  lastConversationAt: null,
  modelUsage: [],
});

/**
 * Read-only health checks over the data directory, database file and logs.
 * Every check reports its own failure and never throws.
 */
export class DataIntegrityService {
  constructor(
    private paths: IntegrityPaths,
    private logger?: Logger
  ) {}

  run(): IntegrityReport {
    const startedAt = new Date();
    const directories = this.checkDirectories();
    const database = this.checkDatabase();
    const integrity = this.checkIntegrity();
    const logs = this.checkLogs();
    const statistics = this.collectStatistics();
    const suggestions = this.suggestMaintenance();

    return {
      startedAt,
      directories,
      database,
      integrity,
      logs,
      statistics,
      suggestions,
      passed: directories.passed && database.passed && integrity.passed,
    };
  }

  checkDirectories(): DirectoryCheck {
    const entries: DirectoryEntry[] = [
      { name: 'Data directory', path: this.paths.dataDir },
      { name: 'Conversations directory', path: this.paths.conversationsDir },
      { name: 'Logs directory', path: this.paths.logsDir },
    ].map((entry) => ({ ...entry, exists: isDirectory(entry.path) }));

    return { passed: entries.every((entry) => entry.exists), entries };
  }

  checkDatabase(): DatabaseCheck {
    const check: DatabaseCheck = {
      passed: false,
      path: this.paths.databaseFile,
      exists: false,
      sizeBytes: null,
      tables: [],
      indexes: [],
      missingIndexes: [],
    };

    const size = fileSize(this.paths.databaseFile);
    if (size === null) {
      return check;
    }
    check.exists = true;
    check.sizeBytes = size;

    try {
      this.withReadOnlyDatabase((db) => {
        const tables = new Set(
          db
            .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table'")
            .all()
            .map((row) => row.name)
        );

        // Table names come from REQUIRED_TABLES, never from input
        check.tables = REQUIRED_TABLES.map((name) => ({
          name,
          present: tables.has(name),
          rowCount: tables.has(name)
            ? db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${name}`).get()
                ?.count ?? 0
            : null,
        }));

        check.indexes = db
          .prepare<[], { name: string }>(
            "SELECT name FROM sqlite_master WHERE type = 'index' AND name NOT LIKE 'sqlite_%' ORDER BY name"
          )
          .all()
          .map((row) => row.name);
        check.missingIndexes = INDEX_NAMES.filter((name) => !check.indexes.includes(name));
      });
    } catch (error) {
      check.error = errorMessage(error);
      this.logger?.warn({ err: error, check: 'database' }, 'Database check failed');
      return check;
    }

    check.passed = check.tables.every((table) => table.present);
    return check;
  }

  checkIntegrity(): IntegrityCheck {
    if (fileSize(this.paths.databaseFile) === null) {
      return { passed: false, skipped: true, result: null };
    }

    try {
      const result = this.withReadOnlyDatabase((db) =>
        String(db.pragma('integrity_check', { simple: true }))
      );
      return { passed: result === 'ok', skipped: false, result };
    } catch (error) {
      this.logger?.warn({ err: error, check: 'integrity' }, 'Integrity check failed');
      return { passed: false, skipped: false, result: null, error: errorMessage(error) };
    }
  }

  checkLogs(): LogFileEntry[] {
    return Object.values(LOG_FILES).map((name): LogFileEntry => {
      const filePath = path.join(this.paths.logsDir, name);
      const sizeBytes = fileSize(filePath);
      return {
        name,
        path: filePath,
        sizeBytes,
        status: sizeBytes === null ? 'missing' : classifyLogSize(sizeBytes),
      };
    });
  }

  collectStatistics(): StatisticsReport {
    const statistics = emptyStatistics();
    if (fileSize(this.paths.databaseFile) === null) {
      return statistics;
    }

    try {
      this.withReadOnlyDatabase((db) => {
        const value = (sql: string): number =>
          db.prepare<[], { value: number | null }>(sql).get()?.value ?? 0;

        statistics.totalConversations = value('SELECT COUNT(*) AS value FROM conversations');
        statistics.totalMessages = value('SELECT COUNT(*) AS value FROM messages');
        statistics.messagesByRole = db
          .prepare<[], { role: string; count: number }>(
            'SELECT role, COUNT(*) AS count FROM messages GROUP BY role ORDER BY count DESC, role'
          )
          .all();
        statistics.totalTokens = value(
          'SELECT COALESCE(SUM(token_count), 0) AS value FROM messages WHERE token_count IS NOT NULL'
        );
        statistics.conversationsByModel = db
          .prepare<[], { modelName: string; count: number }>(
            `SELECT model_name AS modelName, COUNT(*) AS count
             FROM conversations
             GROUP BY model_name
             ORDER BY count DESC, model_name`
          )
          .all();

        const range = db
          .prepare<[], { first: string | null; last: string | null }>(
            'SELECT MIN(created_at) AS first, MAX(created_at) AS last FROM conversations'
          )
          .get();
        statistics.firstConversationAt = range?.first ?? null;
        statistics.lastConversationAt = range?.last ?? null;

        statistics.modelUsage = db
          .prepare<[], ModelUsageSummary>(
            `SELECT
               model_name AS modelName,
               COUNT(*) AS calls,
               SUM(tokens_used) AS totalTokens,
               AVG(response_time) AS avgResponseTimeMs
             FROM model_usage
             GROUP BY model_name
             ORDER BY calls DESC, model_name`
          )
          .all();
      });
      statistics.available = true;
    } catch (error) {
      statistics.error = errorMessage(error);
      this.logger?.warn({ err: error, check: 'statistics' }, 'Collecting statistics failed');
    }

    return statistics;
  }

  suggestMaintenance(): MaintenanceSuggestion[] {
    const suggestions: MaintenanceSuggestion[] = [];

    const databaseSize = fileSize(this.paths.databaseFile);
    if (databaseSize !== null && databaseSize > THRESHOLDS.databaseSuggestBytes) {
      suggestions.push({
        message: 'Database is large (>100MB)',
        actions: [`Vacuum: sqlite3 ${this.paths.databaseFile} 'VACUUM;'`, 'Archive old conversations'],
      });
    }

    for (const name of listLogFiles(this.paths.logsDir)) {
      const size = fileSize(path.join(this.paths.logsDir, name));
      if (size !== null && size > THRESHOLDS.logSuggestBytes) {
        suggestions.push({
          message: `${name} is large (>50MB)`,
          actions: ['Archive or remove old log files', 'Lower LOG_MAX_BYTES so logs rotate sooner'],
        });
      }
    }

    return suggestions;
  }

  private withReadOnlyDatabase<T>(work: (db: Database.Database) => T): T {
    const db = new Database(this.paths.databaseFile, { readonly: true, fileMustExist: true });
    try {
      return work(db);
    } finally {
      db.close();
    }
  }
}

function isDirectory(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Size of a regular file, or null when there is none
 */
function fileSize(filePath: string): number | null {
  try {
    const stats = fs.statSync(filePath);
    return stats.isFile() ? stats.size : null;
  } catch {
    return null;
  }
}

function listLogFiles(logsDir: string): string[] {
  if (!isDirectory(logsDir)) {
    return [];
  }
  return fs
    .readdirSync(logsDir)
    .filter((name) => name.endsWith('.log'))
    .sort();
}

import { formatTimestamp } from '../infrastructure/logging/LineFormatter.js';
import type {
  IntegrityReport,
  LogFileEntry,
  StatisticsReport,
} from '../application/services/DataIntegrityService.js';

const COLORS = {
  green: '\x1b[92m',
  yellow: '\x1b[93m',
  red: '\x1b[91m',
  blue: '\x1b[94m',
  reset: '\x1b[0m',
} as const;

const RULE = '='.repeat(60);

export interface PrinterOptions {
  /** Receives one line at a time. Defaults to console.log */
  write?: (line: string) => void;
  color?: boolean;
  /** Command suggested when the database is missing */
  initCommand?: string;
}

const formatMb = (bytes: number): string => `${(bytes / (1024 * 1024)).toFixed(2)} MB`;

const formatKb = (bytes: number): string => `${(bytes / 1024).toFixed(1)} KB`;

/**
 * Human-readable, colorized rendering of an IntegrityReport
 */
export class IntegrityReportPrinter {
  private readonly write: (line: string) => void;
  private readonly color: boolean;
  private readonly initCommand: string;

  constructor(options: PrinterOptions = {}) {
    this.write = options.write ?? ((line) => console.log(line));
    this.color = options.color ?? true;
    this.initCommand = options.initCommand ?? 'npm start';
  }

  print(report: IntegrityReport): void {
    this.paint('blue', `\n${RULE}\nData Integrity Check\n${RULE}`);
    this.write(`Timestamp: ${formatTimestamp(report.startedAt)}`);

    this.printDirectories(report);
    this.printDatabase(report);
    this.printIntegrity(report);
    this.printLogs(report.logs);
    this.printStatistics(report.statistics);
    this.printSuggestions(report);
    this.printSummary(report);
  }

  private printDirectories(report: IntegrityReport): void {
    this.header('Checking Directories');
    for (const entry of report.directories.entries) {
      if (entry.exists) {
        this.success(`${entry.name} exists: ${entry.path}`);
      } else {
        this.error(`${entry.name} missing: ${entry.path}`);
      }
    }
  }

  private printDatabase(report: IntegrityReport): void {
    const { database } = report;
    this.header('Checking Database');

    if (!database.exists) {
      this.error(`Database file not found: ${database.path}`);
      this.warning(`Run: ${this.initCommand}`);
      return;
    }

    this.success(`Database file exists: ${database.path}`);
    if (database.sizeBytes !== null) {
      this.write(`  Size: ${formatMb(database.sizeBytes)} (${database.sizeBytes.toLocaleString('en-US')} bytes)`);
    }

    if (database.error) {
      this.error(`Database error: ${database.error}`);
      return;
    }

    this.write('\n  Tables:');
    for (const table of database.tables) {
      if (table.present) {
        this.success(`  ${table.name}`);
        this.write(`    Rows: ${table.rowCount ?? 0}`);
      } else {
        this.error(`  ${table.name} (missing)`);
      }
    }

    this.write(`\n  Indexes: ${database.indexes.length}`);
    for (const index of database.indexes) {
      this.write(`    - ${index}`);
    }
    for (const index of database.missingIndexes) {
      this.warning(`  Missing index: ${index}`);
    }

    if (database.passed) {
      this.success('Database structure is valid');
    } else {
      this.error('Database structure is incomplete');
    }
  }

  private printIntegrity(report: IntegrityReport): void {
    const { integrity } = report;
    this.header('Database Integrity Check');

    if (integrity.skipped) {
      this.warning("Database doesn't exist, skipping integrity check");
    } else if (integrity.error) {
      this.error(`Integrity check failed: ${integrity.error}`);
    } else if (integrity.passed) {
      this.success('Database integrity: OK');
    } else {
      this.error(`Database integrity issues: ${integrity.result}`);
    }
  }

  private printLogs(logs: LogFileEntry[]): void {
    this.header('Checking Log Files');

    for (const log of logs) {
      if (log.sizeBytes === null) {
        this.warning(`${log.name} not found (will be created on first use)`);
        continue;
      }

      switch (log.status) {
        case 'archive':
          this.warning(`${log.name} is large: ${formatMb(log.sizeBytes)}`);
          this.write('  Consider archiving old log files');
          break;
        case 'large':
          this.warning(`${log.name} exists (${formatMb(log.sizeBytes)})`);
          break;
        default:
          this.success(`${log.name} exists (${formatKb(log.sizeBytes)})`);
      }
    }
  }

  private printStatistics(statistics: StatisticsReport): void {
    this.header('Database Statistics');

    if (statistics.error) {
      this.error(`Error getting statistics: ${statistics.error}`);
      return;
    }
    if (!statistics.available) {
      this.warning("Database doesn't exist");
      return;
    }

    this.write(`Total Conversations: ${statistics.totalConversations}`);
    this.write(`Total Messages: ${statistics.totalMessages}`);

    this.write('\nMessages by Role:');
    for (const { role, count } of statistics.messagesByRole) {
      this.write(`  ${role}: ${count}`);
    }

    this.write(`\nTotal Tokens Used: ${statistics.totalTokens.toLocaleString('en-US')}`);

    this.write('\nModel Usage:');
    for (const { modelName, count } of statistics.conversationsByModel) {
      this.write(`  ${modelName}: ${count} conversations`);
    }
    for (const usage of statistics.modelUsage) {
      const avg =
        usage.avgResponseTimeMs === null ? '' : `, avg ${usage.avgResponseTimeMs.toFixed(2)}ms`;
      this.write(`  ${usage.modelName}: ${usage.calls} calls, ${usage.totalTokens} tokens${avg}`);
    }

    if (statistics.firstConversationAt && statistics.lastConversationAt) {
      this.write(`\nFirst Conversation: ${statistics.firstConversationAt}`);
      this.write(`Last Conversation: ${statistics.lastConversationAt}`);
    }
  }

  private printSuggestions(report: IntegrityReport): void {
    this.header('Maintenance Suggestions');

    if (report.suggestions.length === 0) {
      this.success('No maintenance needed at this time');
      return;
    }

    report.suggestions.forEach((suggestion, i) => {
      this.write(`\n${i + 1}. ${suggestion.message}. Consider:`);
      for (const action of suggestion.actions) {
        this.write(`  - ${action}`);
      }
    });
  }

  private printSummary(report: IntegrityReport): void {
    this.header('Summary');

    if (report.passed) {
      this.success('All checks passed!');
      this.write('\nYour data is healthy and ready to use.');
      return;
    }

    this.warning('Some checks failed');
    this.write('\nRecommended actions:');
    this.write('1. Review the errors above');
    this.write(`2. Run: ${this.initCommand}`);
    this.write('3. Check the README');
  }

  private header(text: string): void {
    this.paint('blue', `\n${RULE}\n${text}\n${RULE}\n`);
  }

  private success(text: string): void {
    this.paint('green', `✓ ${text}`);
  }

  private warning(text: string): void {
    this.paint('yellow', `⚠ ${text}`);
  }

  private error(text: string): void {
    this.paint('red', `✗ ${text}`);
  }

  private paint(color: Exclude<keyof typeof COLORS, 'reset'>, text: string): void {
    this.write(this.color ? `${COLORS[color]}${text}${COLORS.reset}` : text);
  }
}

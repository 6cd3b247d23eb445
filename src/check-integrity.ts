#!/usr/bin/env node

/**
 * Diagnose data-related issues: directories, database structure and
 * integrity, log sizes, statistics and maintenance suggestions.
 * Exits 0 when every check passed, 1 otherwise. Creates nothing on disk.
 */

import pino from 'pino';
import { getConfig, type Config } from './config.js';
import { DataIntegrityService } from './application/services/DataIntegrityService.js';
import { FormattedStream } from './infrastructure/logging/LineFormatter.js';
import {
  IntegrityReportPrinter,
  type PrinterOptions,
} from './presentation/IntegrityReportPrinter.js';

/**
 * Run every check, print the report and return the process exit code
 */
export function runIntegrityCheck(config: Config, printerOptions: PrinterOptions = {}): number {
  const logger = pino(
    { name: `${config.appName}.integrity`, level: config.debug ? 'debug' : 'warn' },
    new FormattedStream(process.stderr)
  );

  const report = new DataIntegrityService(config.paths, logger).run();
  new IntegrityReportPrinter(printerOptions).print(report);

  return report.passed ? 0 : 1;
}

function main(): number {
  try {
    return runIntegrityCheck(getConfig(), { color: !process.env.NO_COLOR });
  } catch (error) {
    console.error('💥 Fatal error in main():', error);
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = main();
}

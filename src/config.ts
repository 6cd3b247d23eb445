import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Config {
  appName: string;
  debug: boolean;
  paths: {
    dataDir: string;
    conversationsDir: string;
    logsDir: string;
    databaseFile: string;
  };
  database: {
    busyTimeoutMs: number;
  };
  logging: {
    level: LogLevel;
    maxBytes: number;
    backupCount: number;
    console: boolean;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  appName: z
    .string()
    .min(1, 'App name must not be empty')
    .regex(/^[\w.-]+$/, 'App name may only contain letters, digits, ".", "_" and "-"'),
  debug: z.boolean(),
  paths: z.object({
    dataDir: z.string().min(1),
    conversationsDir: z.string().min(1),
    logsDir: z.string().min(1),
    databaseFile: z.string().min(1, 'Database file path must not be empty'),
  }),
  database: z.object({
    busyTimeoutMs: z.number().int().min(0).max(600000),
  }),
  logging: z.object({
    level: z.enum(LOG_LEVELS),
    maxBytes: z.number().int().min(1024, 'Log files must be allowed at least 1024 bytes'),
    backupCount: z.number().int().min(0).max(100),
    console: z.boolean(),
  }),
});

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --data-dir ./data --log-level debug --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');

      if (eq >= 0) {
        args[body.slice(0, eq)] = body.slice(eq + 1);
      } else if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[body] = argv[++i];
      } else {
        args[body] = true;
      }
    }
  }

  return args;
}

/**
 * Build configuration from CLI arguments, environment and defaults (in that order).
 * Relative paths resolve against `cwd`.
 */
export function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string | null, envKey: string, defaultValue: string): string => {
    const cliValue = cliKey ? cliArgs[cliKey] : undefined;
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string | null, envKey: string, defaultValue: boolean): boolean => {
    const cliValue = cliKey ? cliArgs[cliKey] : undefined;
    if (cliValue !== undefined) return cliValue === true || cliValue === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  // NaN fails schema validation with a message naming the key
  const getNumber = (cliKey: string | null, envKey: string, defaultValue: number): number => {
    const cliValue = cliKey ? cliArgs[cliKey] : undefined;
    if (typeof cliValue === 'string') return Number(cliValue);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const debug = getBoolean('debug', 'DEBUG', false);

  const dataDir = path.resolve(cwd, getString('data-dir', 'DATA_DIR', 'data'));
  const conversationsDir = path.join(dataDir, 'conversations');
  const logsDir = path.join(dataDir, 'logs');
  const databaseFile = path.resolve(
    cwd,
    getString('db-file', 'DATABASE_FILE', path.join(conversationsDir, 'conversations.db'))
  );

  const rawConfig = {
    appName: getString('app-name', 'APP_NAME', 'chat-store'),
    debug,
    paths: {
      dataDir,
      conversationsDir,
      logsDir,
      databaseFile,
    },
    database: {
      busyTimeoutMs: getNumber('busy-timeout', 'DB_BUSY_TIMEOUT_MS', 10000),
    },
    logging: {
      level: getString('log-level', 'LOG_LEVEL', debug ? 'debug' : 'info'),
      maxBytes: getNumber(null, 'LOG_MAX_BYTES', 10 * 1024 * 1024),
      backupCount: getNumber(null, 'LOG_BACKUP_COUNT', 5),
      console: getBoolean(null, 'LOG_CONSOLE', true),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
    );
  }
  return result.data;
}

/**
 * Load `.env`, then build and validate the configuration.
 * Prints every validation issue and exits when the configuration is invalid.
 */
export function getConfig(): Config {
  dotenv.config();

  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.issues.forEach((issue) => console.error(`  • ${issue}`));
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error(`  - LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print the effective configuration
 */
export function printConfigInfo(config: Config): void {
  console.error(`\n📊 ${config.appName}${config.debug ? ' (Debug Mode)' : ''}`);
  console.error(`🗄️  Database: ${config.paths.databaseFile}`);
  console.error(`   Busy timeout: ${config.database.busyTimeoutMs}ms`);
  console.error(`📝 Logs: ${config.paths.logsDir}`);
  console.error(
    `   Level: ${config.logging.level} | Rotation: ${(config.logging.maxBytes / (1024 * 1024)).toFixed(1)} MB x ${config.logging.backupCount} backups`
  );
  console.error('\n' + '─'.repeat(68));
}

import pino from 'pino';
import { z } from 'zod';

/**
 * Fields of a pino JSON line that end up in the text format
 */
const LogRecordSchema = z
  .object({
    level: z.number(),
    time: z.number(),
    name: z.string().optional(),
    module: z.string().optional(),
    caller: z.string().optional(),
    msg: z.string().optional(),
    err: z
      .object({
        message: z.string().optional(),
        stack: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export interface LineFormatOptions {
  /** Insert the `file:line` recorded by the logger between level and message */
  withCaller?: boolean;
}

export interface TextSink {
  write(chunk: string): unknown;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * `YYYY-MM-DD HH:MM:SS` in local time
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function levelLabel(level: number): string {
  return (pino.levels.labels[level] ?? `LEVEL${level}`).toUpperCase();
}

/**
 * Turn one pino JSON line into `timestamp - name - LEVEL - message`.
 * Lines that are not pino records pass through unchanged.
 */
export function formatLogLine(line: string, options: LineFormatOptions = {}): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return line.endsWith('\n') ? line : `${line}\n`;
  }

  const result = LogRecordSchema.safeParse(parsed);
  if (!result.success) {
    return line.endsWith('\n') ? line : `${line}\n`;
  }

  const record = result.data;
  const name = [record.name, record.module].filter(Boolean).join('.');
  const parts = [formatTimestamp(new Date(record.time)), name, levelLabel(record.level)];
  if (options.withCaller) {
    parts.push(record.caller ?? '<unknown>');
  }
  parts.push(record.msg ?? record.err?.message ?? '');

  let text = parts.join(' - ');
  if (record.err?.stack) {
    text += `\n${record.err.stack}`;
  }
  return `${text}\n`;
}

/**
 * pino destination that writes formatted text lines to another sink
 */
export class FormattedStream {
  constructor(
    private readonly sink: TextSink,
    private readonly options: LineFormatOptions = {}
  ) {}

  write(line: string): void {
    this.sink.write(formatLogLine(line, this.options));
  }
}

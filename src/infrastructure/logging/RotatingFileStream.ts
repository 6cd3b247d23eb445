import fs from 'fs';
import path from 'path';

export interface RotationOptions {
  /** Size at which the file is rolled over */
  maxBytes: number;
  /** Number of rolled files kept as `<file>.1` ... `<file>.N`; 0 truncates instead */
  backupCount: number;
}

/**
 * Size-bounded, synchronously written log file.
 *
 * Usable as a pino destination: pino calls `write` once per serialized line.
 * A write that would bring the file to `maxBytes` first shifts `<file>.i` to
 * `<file>.i+1`, moves the live file to `<file>.1` and drops anything beyond
 * `backupCount`.
 */
export class RotatingFileStream {
  private fd: number | null = null;
  private size = 0;

  constructor(
    private readonly filePath: string,
    private readonly options: RotationOptions
  ) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.open('a');
  }

  getFilePath(): string {
    return this.filePath;
  }

  write(chunk: string): void {
    const bytes = Buffer.byteLength(chunk);
    let fd = this.fd ?? this.open('a');

    if (this.size > 0 && this.size + bytes >= this.options.maxBytes) {
      fd = this.rollover();
    }

    fs.writeSync(fd, chunk);
    this.size += bytes;
  }

  close(): void {
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
    }
  }

  private open(flags: 'a' | 'w'): number {
    const fd = fs.openSync(this.filePath, flags);
    this.fd = fd;
    this.size = fs.fstatSync(fd).size;
    return fd;
  }

  private rollover(): number {
    this.close();

    if (this.options.backupCount <= 0) {
      return this.open('w');
    }

    for (let i = this.options.backupCount - 1; i >= 1; i--) {
      const source = `${this.filePath}.${i}`;
      if (fs.existsSync(source)) {
        fs.renameSync(source, `${this.filePath}.${i + 1}`);
      }
    }
    fs.renameSync(this.filePath, `${this.filePath}.1`);

    return this.open('a');
  }
}

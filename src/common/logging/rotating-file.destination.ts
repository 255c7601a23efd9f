import fs from 'fs';
import path from 'path';
import type { DestinationStream } from 'pino';
import { hasErrorCode } from '../errors/wallet.errors';

export interface RotationOptions {
  file: string;
  maxBytes: number;
  /** Rotated files kept beside `file` as file.1 (newest) .. file.N; 0 never rotates */
  backupCount: number;
}

/**
 * Append-only pino destination that rolls the file over by size.
 * Writes are synchronous so a line is on disk when the log call returns.
 */
export class RotatingFileDestination implements DestinationStream {
  private size: number;

  constructor(private readonly options: RotationOptions) {
    fs.mkdirSync(path.dirname(options.file), { recursive: true });
    this.size = sizeOf(options.file);
  }

  write(line: string): void {
    const bytes = Buffer.byteLength(line);
    if (this.shouldRotate(bytes)) {
      this.rotate();
    }
    fs.appendFileSync(this.options.file, line, 'utf-8');
    this.size += bytes;
  }

  private shouldRotate(bytes: number): boolean {
    const { maxBytes, backupCount } = this.options;
    return backupCount > 0 && this.size > 0 && this.size + bytes > maxBytes;
  }

  private rotate(): void {
    const { file, backupCount } = this.options;
    fs.rmSync(`${file}.${backupCount}`, { force: true });
    for (let i = backupCount - 1; i >= 1; i--) {
      if (fs.existsSync(`${file}.${i}`)) {
        fs.renameSync(`${file}.${i}`, `${file}.${i + 1}`);
      }
    }
    fs.renameSync(file, `${file}.1`);
    this.size = 0;
  }
}

function sizeOf(file: string): number {
  try {
    return fs.statSync(file).size;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return 0;
    }
    throw error;
  }
}

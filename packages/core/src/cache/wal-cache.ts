/**
 * Write-ahead cache
 *
 * Stamped records are staged in memory by push() and appended to a JSON-lines
 * log by flush(). One directory per connector origin:
 *
 *   <dir>/items.jsonl           durable append log
 *   <dir>/backup/items.jsonl    snapshot taken by backup()
 *
 * A log entry is one line. A line without its terminating newline is a write
 * that never completed and is not part of the log.
 */

import {
  accessSync,
  appendFileSync,
  closeSync,
  constants,
  copyFileSync,
  existsSync,
  mkdirSync,
  openSync,
  readFileSync,
  readSync,
  rmSync,
  statSync,
  truncateSync,
  writeFileSync
} from 'fs';
import { join } from 'path';
import { CacheBackupError, CacheError, CacheRecoveryError, errorMessage } from '../errors';
import { makeNoopLogger, type Logger } from '../logging';
import { CacheOptionsSchema, StampedRecordSchema, type CacheOptions, type StampedRecord } from '../schemas';

const LOG_FILE = 'items.jsonl';
const BACKUP_DIR = 'backup';

export class WriteAheadCache {
  readonly dir: string;
  readonly flushThreshold: number;
  private queue: StampedRecord[] = [];
  private logger: Logger;

  constructor(options: CacheOptions, logger: Logger = makeNoopLogger()) {
    const { dir, flushThreshold } = CacheOptionsSchema.parse(options);
    this.dir = dir;
    this.flushThreshold = flushThreshold;
    this.logger = logger.child({ cache: dir });

    try {
      mkdirSync(dir, { recursive: true });
      accessSync(dir, constants.W_OK);
    } catch (error) {
      throw new CacheError(`cache directory '${dir}' is not usable: ${errorMessage(error)}`, { cause: error });
    }
  }

  get logPath(): string {
    return join(this.dir, LOG_FILE);
  }

  get backupPath(): string {
    return join(this.dir, BACKUP_DIR, LOG_FILE);
  }

  /** Number of staged entries not yet written. */
  get pending(): number {
    return this.queue.length;
  }

  push(record: StampedRecord): void {
    this.queue.push(record);
  }

  /**
   * Append staged entries to the log once the threshold is reached, or
   * unconditionally when forced. On a failed write the log is cut back to the
   * last complete entry and the unwritten entries stay staged.
   */
  flush(force = false): void {
    if (this.queue.length === 0) return;
    if (!force && this.queue.length < this.flushThreshold) return;

    let committed = this.committedSize();
    let written = 0;

    try {
      for (const record of this.queue) {
        const line = JSON.stringify(record) + '\n';
        appendFileSync(this.logPath, line, 'utf8');
        committed += Buffer.byteLength(line, 'utf8');
        written++;
      }
    } catch (error) {
      this.queue = this.queue.slice(written);
      this.truncateTo(committed);
      throw new CacheError(`failed to flush cache queue: ${errorMessage(error)}`, { cause: error });
    }

    this.logger.debug({ written }, 'cache queue flushed');
    this.queue = [];
  }

  /** Drop staged entries without writing them. */
  purgeQueue(): void {
    this.queue = [];
  }

  backup(): void {
    try {
      mkdirSync(join(this.dir, BACKUP_DIR), { recursive: true });
      if (existsSync(this.logPath)) {
        copyFileSync(this.logPath, this.backupPath);
      } else {
        writeFileSync(this.backupPath, '');
      }
    } catch (error) {
      throw new CacheBackupError(`failed to back up cache '${this.dir}': ${errorMessage(error)}`, { cause: error });
    }
    this.logger.debug('cache backed up');
  }

  clean(): void {
    this.queue = [];
    rmSync(this.logPath, { force: true });
    rmSync(join(this.dir, BACKUP_DIR), { recursive: true, force: true });
    this.logger.debug('cache cleaned');
  }

  /**
   * Roll the log back to the last backup. Anything written or staged since
   * is lost.
   */
  recover(): void {
    if (!existsSync(this.backupPath)) {
      throw new CacheRecoveryError(`no backup to recover cache '${this.dir}' from`);
    }

    this.queue = [];
    try {
      copyFileSync(this.backupPath, this.logPath);
    } catch (error) {
      throw new CacheRecoveryError(`failed to recover cache '${this.dir}': ${errorMessage(error)}`, { cause: error });
    }
    this.logger.info('cache recovered from backup');
  }

  /**
   * Durable entries in append order. Each call starts again from the
   * beginning of the log.
   */
  async *retrieve(): AsyncGenerator<StampedRecord, void, undefined> {
    if (!existsSync(this.logPath)) return;

    const content = readFileSync(this.logPath, 'utf8');
    const lines = content.split('\n');
    const partial = lines.pop();
    if (partial) {
      this.logger.warn({ bytes: Buffer.byteLength(partial, 'utf8') }, 'ignoring incomplete cache entry');
    }

    for (const [index, line] of lines.entries()) {
      yield this.parseEntry(line, index + 1);
    }
  }

  private parseEntry(line: string, lineNumber: number): StampedRecord {
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      throw new CacheError(`corrupted cache entry at line ${lineNumber}: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = StampedRecordSchema.safeParse(value);
    if (!parsed.success) {
      throw new CacheError(`invalid cache entry at line ${lineNumber}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  // Byte length of the complete entries; a torn trailing line is cut off first
  private committedSize(): number {
    if (!existsSync(this.logPath)) return 0;

    const { size } = statSync(this.logPath);
    if (size === 0) return 0;

    const last = Buffer.alloc(1);
    const fd = openSync(this.logPath, 'r');
    try {
      readSync(fd, last, 0, 1, size - 1);
    } finally {
      closeSync(fd);
    }
    if (last[0] === 0x0a) return size;

    const boundary = readFileSync(this.logPath).lastIndexOf(0x0a) + 1;
    this.logger.warn({ bytes: size - boundary }, 'discarding incomplete cache entry');
    truncateSync(this.logPath, boundary);
    return boundary;
  }

  private truncateTo(size: number): void {
    try {
      truncateSync(this.logPath, size);
    } catch (error) {
      this.logger.error({ err: error, size }, 'failed to truncate cache log after a partial flush');
    }
  }
}

/**
 * JsonStore — durable single-document JSON persistence.
 *
 * Writes go to a temp file that is renamed over the target, so a crash
 * mid-write leaves the previous document intact. A document that cannot
 * be parsed is copied aside as a timestamped backup and replaced by the
 * empty value; load never throws on bad content.
 */

import * as fs from 'fs';
import * as path from 'path';
import pino from 'pino';

import { GuardErrorCode, errorMessage } from '../shared/types.js';

const logger = pino({ name: 'guard:storage', level: process.env['LOG_LEVEL'] ?? 'info' });

export interface JsonStoreOptions<T> {
  filePath: string;
  /** Value used when the file is missing or corrupt. */
  empty: () => T;
  /** Narrows parsed JSON. Returning null marks the document as corrupt. */
  decode: (raw: unknown) => T | null;
}

export interface LoadResult<T> {
  data: T;
  /** True when a corrupt document was backed up and replaced. */
  recovered: boolean;
  backupPath: string | null;
}

export class JsonStore<T> {
  private readonly options: JsonStoreOptions<T>;
  private writeChain: Promise<void> = Promise.resolve();
  private writeSeq = 0;

  constructor(options: JsonStoreOptions<T>) {
    this.options = options;
  }

  get filePath(): string {
    return this.options.filePath;
  }

  load(): T {
    return this.loadWithInfo().data;
  }

  loadWithInfo(): LoadResult<T> {
    const { filePath } = this.options;

    if (!fs.existsSync(filePath)) {
      return { data: this.options.empty(), recovered: false, backupPath: null };
    }

    let text: string;
    try {
      text = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      logger.error({ filePath, error: errorMessage(error) }, 'Failed to read document, starting empty');
      return { data: this.options.empty(), recovered: false, backupPath: null };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      return this.recover(error);
    }

    const decoded = this.options.decode(raw);
    if (decoded === null) {
      return this.recover(new Error('Document has an unexpected shape'));
    }

    return { data: decoded, recovered: false, backupPath: null };
  }

  /**
   * Atomically replaces the document. Concurrent calls are serialized in
   * call order; a failed write rejects its own caller only.
   */
  save(data: T): Promise<void> {
    const payload = JSON.stringify(data, null, 2) + '\n';
    const write = this.writeChain.then(() => this.writeAtomic(payload));
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  // ─── Private ─────────────────────────────────────────────────

  private async writeAtomic(payload: string): Promise<void> {
    const { filePath } = this.options;
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });

    const tmpPath = `${filePath}.${process.pid}.${++this.writeSeq}.tmp`;
    try {
      await fs.promises.writeFile(tmpPath, payload, 'utf-8');
      await fs.promises.rename(tmpPath, filePath);
    } catch (error) {
      await fs.promises.rm(tmpPath, { force: true });
      throw error;
    }
  }

  private recover(cause: unknown): LoadResult<T> {
    const { filePath } = this.options;
    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    let backupPath: string | null = `${filePath}.corrupt-${stamp}.bak`;

    try {
      fs.copyFileSync(filePath, backupPath);
    } catch (error) {
      logger.error({ filePath, error: errorMessage(error) }, 'Failed to back up corrupt document');
      backupPath = null;
    }

    logger.error(
      { filePath, backupPath, code: GuardErrorCode.PERSISTENCE_CORRUPTION, error: errorMessage(cause) },
      'Corrupt document detected, continuing with an empty one'
    );

    return { data: this.options.empty(), recovered: true, backupPath };
  }
}

export default JsonStore;

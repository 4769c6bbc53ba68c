import fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import path from 'path';
import crypto from 'crypto';
import { DocxError, DocxErrorCode, errorMessage } from './docx/errors.js';
import { logger } from '../utils/logger.js';

export interface BackupRecord {
  id: string;
  filePath: string;
  backupPath: string;
  timestamp: string;
  hash: string;
  size: number;
}

function backupFileName(filePath: string, date: Date, id: string): string {
  const ext = path.extname(filePath) || '.docx';
  const stem = path.basename(filePath, ext);
  const stamp = date.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  return `${stem}_${stamp}_${id.slice(0, 8)}${ext}`;
}

/**
 * Pre-mutation backups for one session. Each file is copied at most once
 * per session; later mutations reuse the first copy, which is never
 * overwritten. Backups are left on disk when the session ends.
 */
export class BackupStore {
  // Pending copies are stored before any await, so concurrent callers share one copy.
  private pending = new Map<string, Promise<BackupRecord>>();

  constructor(private readonly resolveDirectory: () => Promise<string>) {}

  /** Start a new session: the next mutation of every file backs it up again. */
  beginSession(): void {
    this.pending = new Map();
  }

  ensureBackup(filePath: string): Promise<BackupRecord> {
    const key = path.resolve(filePath);
    const existing = this.pending.get(key);
    if (existing) return existing;

    const pending = this.pending;
    const created = this.createBackup(key).catch((error: unknown) => {
      pending.delete(key);
      throw error;
    });
    pending.set(key, created);
    return created;
  }

  private async createBackup(filePath: string): Promise<BackupRecord> {
    const date = new Date();
    const id = crypto.randomUUID();
    try {
      const directory = await this.resolveDirectory();
      await fs.mkdir(directory, { recursive: true });

      const backupPath = path.join(directory, backupFileName(filePath, date, id));
      await fs.copyFile(filePath, backupPath, fsConstants.COPYFILE_EXCL);
      // Hash the copy itself.
      const content = await fs.readFile(backupPath);

      const record: BackupRecord = {
        id,
        filePath,
        backupPath,
        timestamp: date.toISOString(),
        hash: crypto.createHash('sha256').update(content).digest('hex'),
        size: content.length,
      };
      logger.info(`Created backup: ${backupPath}`, { filePath, sha256: record.hash, size: record.size });
      return record;
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Failed to create backup of ${filePath}: ${message}`);
      throw new DocxError(`Failed to create backup: ${message}`, DocxErrorCode.IO_ERROR, { filePath });
    }
  }
}

import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { BackupStore } from '../tools/backup.js';
import { DocxErrorCode } from '../tools/docx/errors.js';
import { makeTempDir, paragraph, removeDir, run, writeDocx } from './fixtures.js';

let dir: string;
let backupDir: string;
let file: string;

beforeEach(async () => {
  dir = await makeTempDir();
  backupDir = path.join(dir, 'backups');
  file = await writeDocx(dir, 'report.docx', paragraph(run('original')));
});

afterEach(async () => {
  await removeDir(dir);
});

describe('BackupStore', () => {
  it('copies a file once per session, even for concurrent callers', async () => {
    const store = new BackupStore(async () => backupDir);

    const [first, second] = await Promise.all([store.ensureBackup(file), store.ensureBackup(file)]);

    expect(second).toBe(first);
    expect(await fs.readdir(backupDir)).toEqual([path.basename(first.backupPath)]);
    expect(path.basename(first.backupPath)).toMatch(/^report_\d{8}_\d{6}_[0-9a-f]{8}\.docx$/);
    expect(await fs.readFile(first.backupPath)).toEqual(await fs.readFile(file));
    expect(first.size).toBe((await fs.stat(file)).size);
    const copied = await fs.readFile(first.backupPath);
    expect(first.hash).toBe(crypto.createHash('sha256').update(copied).digest('hex'));
  });

  it('never overwrites the first copy within a session', async () => {
    const store = new BackupStore(async () => backupDir);
    const record = await store.ensureBackup(file);
    const original = await fs.readFile(record.backupPath);

    await writeDocx(dir, 'report.docx', paragraph(run('changed')));
    const again = await store.ensureBackup(file);

    expect(again.backupPath).toBe(record.backupPath);
    expect(await fs.readFile(record.backupPath)).toEqual(original);
  });

  it('backs up again in a new session', async () => {
    const store = new BackupStore(async () => backupDir);
    const first = await store.ensureBackup(file);
    store.beginSession();

    const second = await store.ensureBackup(file);
    expect(await fs.readdir(backupDir)).toHaveLength(2);
    expect(second.backupPath).not.toBe(first.backupPath);
  });

  it('fails with IO_ERROR and allows a retry', async () => {
    const store = new BackupStore(async () => backupDir);
    const missing = path.join(dir, 'missing.docx');

    await expect(store.ensureBackup(missing)).rejects.toMatchObject({ code: DocxErrorCode.IO_ERROR });

    await writeDocx(dir, 'missing.docx', paragraph(run('now here')));
    await expect(store.ensureBackup(missing)).resolves.toMatchObject({ filePath: missing });
  });
});

import fs from 'fs/promises';
import path from 'path';
import pLimit from 'p-limit';
import { ConfigManager, configManager, type ServerConfig } from './config-manager.js';
import { SearchSession, SearchSessionStore, type SearchSessionSnapshot, type StoredOccurrence } from './search-session.js';
import { BackupStore } from './tools/backup.js';
import {
  listWordFiles,
  resolveRequestedPath,
  validateDirectory,
  type DirectoryValidation,
  type ScanOptions,
} from './tools/scanner.js';
import { docxContainer, type DocumentContainer, type DocxDocument, type OpenedDocument } from './tools/docx/container.js';
import { DocxError, DocxErrorCode, errorMessage, isDocxError, withErrorContext } from './tools/docx/errors.js';
import { locateOccurrences } from './tools/docx/locate.js';
import { replaceOccurrence } from './tools/docx/replace.js';
import type { AppliedSpan, FragmentDocument, Occurrence } from './tools/docx/types.js';
import { PathLock } from './utils/path-lock.js';
import { logger } from './utils/logger.js';

export interface SearchOptions {
  contextChars?: number;
  caseSensitive?: boolean;
}

export interface FileError {
  filePath: string;
  code: DocxErrorCode;
  reason: string;
}

export interface SearchSummary {
  searchTerm: string;
  directory: string;
  caseSensitive: boolean;
  contextChars: number;
  filesScanned: number;
  filesWithMatches: number;
  totalOccurrences: number;
  occurrences: Occurrence[];
  errors: FileError[];
}

export interface ReplaceRequest {
  occurrenceId: string;
  newText: string;
}

export interface ReplaceFailure {
  occurrenceId: string;
  code: DocxErrorCode;
  reason: string;
}

export interface ReplaceOneResult {
  success: boolean;
  occurrenceId: string;
  error?: string;
  code?: DocxErrorCode;
  backupPath?: string;
}

export interface ReplaceManyResult {
  successfulReplacements: number;
  totalProcessed: number;
  failures: ReplaceFailure[];
  filesModified: number;
  cancelled: boolean;
}

export interface ReplaceManyOptions {
  /** Checked between files; a file already in progress always completes. */
  signal?: AbortSignal;
}

interface PendingReplacement {
  request: ReplaceRequest;
  entry: StoredOccurrence;
}

interface FileOutcome {
  applied: string[];
  failures: ReplaceFailure[];
  backupPath?: string;
}

export interface ReplaceManagerOptions<D extends OpenedDocument> {
  container: DocumentContainer<D>;
  config?: ConfigManager;
  store?: SearchSessionStore;
  backups?: BackupStore;
  locks?: PathLock;
}

function failure(occurrenceId: string, code: DocxErrorCode, reason: string): ReplaceFailure {
  return { occurrenceId, code, reason };
}

function codeOf(error: unknown, fallback: DocxErrorCode): DocxErrorCode {
  return isDocxError(error) ? error.code : fallback;
}

/**
 * Sequences multi-file search and replace: owns the search session, the
 * per-session backup set and the per-path locks.
 */
export class ReplaceManager<D extends OpenedDocument = DocxDocument> {
  private readonly container: DocumentContainer<D>;
  private readonly config: ConfigManager;
  readonly store: SearchSessionStore;
  readonly backups: BackupStore;
  private readonly locks: PathLock;

  constructor(options: ReplaceManagerOptions<D>) {
    this.container = options.container;
    this.config = options.config ?? configManager;
    this.store = options.store ?? new SearchSessionStore();
    this.locks = options.locks ?? new PathLock();
    this.backups = options.backups ?? new BackupStore(async () => (await this.config.getConfig()).backupDirectory);
  }

  private scanOptions(config: ServerConfig): ScanOptions {
    return {
      extensions: config.supportedExtensions,
      allowedDirectories: config.allowedDirectories,
      excludeDirectories: [config.backupDirectory],
    };
  }

  // ─── Search ──────────────────────────────────────────────────────────

  async searchAll(rootDirectory: string, searchTerm: string, options: SearchOptions = {}): Promise<SearchSummary> {
    const config = await this.config.getConfig();
    const caseSensitive = options.caseSensitive ?? config.caseSensitiveByDefault;
    const contextChars = Math.max(0, Math.floor(options.contextChars ?? config.defaultContextChars));

    const files = await listWordFiles(rootDirectory, this.scanOptions(config));
    const session = this.store.begin({ rootDirectory, searchTerm, caseSensitive, contextChars });
    this.backups.beginSession();

    const summary: SearchSummary = {
      searchTerm,
      directory: path.resolve(rootDirectory),
      caseSensitive,
      contextChars,
      filesScanned: 0,
      filesWithMatches: 0,
      totalOccurrences: 0,
      occurrences: [],
      errors: [],
    };
    if (searchTerm.length === 0) return summary;

    logger.info(`Scanning ${files.length} Word files in ${rootDirectory}`);

    // Files are read concurrently; identities are handed out afterwards in
    // traversal order so they are reproducible for the same tree.
    const limit = pLimit(config.searchConcurrency);
    const loaded = await Promise.all(
      files.map((filePath) => limit(() => this.loadModel(filePath))),
    );

    for (const result of loaded) {
      summary.filesScanned++;
      if ('error' in result) {
        summary.errors.push(result.error);
        continue;
      }
      const found = locateOccurrences(result.model, searchTerm, {
        filePath: result.filePath,
        caseSensitive,
        contextChars,
        nextId: () => session.nextId(),
      });
      for (const occurrence of found) {
        session.add(occurrence);
        summary.occurrences.push(occurrence);
      }
      if (found.length > 0) summary.filesWithMatches++;
      logger.debug(`Found ${found.length} occurrences in ${result.filePath}`);
    }

    summary.totalOccurrences = summary.occurrences.length;
    logger.info(`Search for "${searchTerm}" found ${summary.totalOccurrences} occurrences in ${summary.filesWithMatches} files`);
    return summary;
  }

  private async loadModel(
    filePath: string,
  ): Promise<{ filePath: string; model: FragmentDocument } | { filePath: string; error: FileError }> {
    try {
      const document = await this.locks.run(filePath, () => this.container.open(filePath));
      return { filePath, model: document.model };
    } catch (error) {
      const reason = errorMessage(error);
      logger.warning(`Skipping ${filePath}: ${reason}`);
      return { filePath, error: { filePath, code: codeOf(error, DocxErrorCode.FORMAT_ERROR), reason } };
    }
  }

  currentResults(): SearchSessionSnapshot | null {
    return this.store.session?.snapshot() ?? null;
  }

  async validateDirectory(directory: string): Promise<DirectoryValidation> {
    const config = await this.config.getConfig();
    return validateDirectory(directory, this.scanOptions(config));
  }

  /** Write the whole current session as JSON; returns the absolute path written. */
  async exportResults(outputFile: string): Promise<string> {
    const snapshot = this.currentResults();
    if (!snapshot) {
      throw new DocxError('No search results available to export', DocxErrorCode.NOT_FOUND);
    }
    const config = await this.config.getConfig();
    const target = resolveRequestedPath(outputFile, config.allowedDirectories);
    await withErrorContext(
      async () => {
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, JSON.stringify(snapshot, null, 2), 'utf8');
      },
      DocxErrorCode.IO_ERROR,
      { outputFile: target },
    );
    logger.info(`Results exported to ${target}`);
    return target;
  }

  // ─── Replace ─────────────────────────────────────────────────────────

  async replaceOne(occurrenceId: string, newText: string): Promise<ReplaceOneResult> {
    const session = this.store.session;
    const config = await this.config.getConfig();
    const rejected = this.precheck(session, { occurrenceId, newText }, config);
    if (rejected || !session) {
      const reason = rejected ?? failure(occurrenceId, DocxErrorCode.NOT_FOUND, 'No search results available');
      return { success: false, occurrenceId, error: reason.reason, code: reason.code };
    }

    const entry = session.get(occurrenceId);
    if (!entry) {
      return { success: false, occurrenceId, error: `Occurrence ${occurrenceId} not found`, code: DocxErrorCode.NOT_FOUND };
    }

    const outcome = await this.applyToFile(session, entry.occurrence.filePath, [{ request: { occurrenceId, newText }, entry }]);
    const failed = outcome.failures[0];
    if (failed) {
      return { success: false, occurrenceId, error: failed.reason, code: failed.code, backupPath: outcome.backupPath };
    }
    return { success: true, occurrenceId, backupPath: outcome.backupPath };
  }

  async replaceMany(requests: ReplaceRequest[], options: ReplaceManyOptions = {}): Promise<ReplaceManyResult> {
    const session = this.store.session;
    const config = await this.config.getConfig();
    const result: ReplaceManyResult = {
      successfulReplacements: 0,
      totalProcessed: requests.length,
      failures: [],
      filesModified: 0,
      cancelled: false,
    };

    // Group per file in first-seen order.
    const byFile = new Map<string, PendingReplacement[]>();
    const seen = new Set<string>();
    for (const request of requests) {
      if (seen.has(request.occurrenceId)) {
        result.failures.push(failure(request.occurrenceId, DocxErrorCode.INVALID_REQUEST, 'Occurrence listed more than once in this request'));
        continue;
      }
      seen.add(request.occurrenceId);

      const rejected = this.precheck(session, request, config);
      if (rejected) {
        result.failures.push(rejected);
        continue;
      }
      const entry = session?.get(request.occurrenceId);
      if (!entry) {
        result.failures.push(failure(request.occurrenceId, DocxErrorCode.NOT_FOUND, `Occurrence ${request.occurrenceId} not found`));
        continue;
      }
      const group = byFile.get(entry.occurrence.filePath) ?? [];
      group.push({ request, entry });
      byFile.set(entry.occurrence.filePath, group);
    }

    if (!session) return result;

    for (const [filePath, items] of byFile) {
      if (options.signal?.aborted) {
        result.cancelled = true;
        for (const item of items) {
          result.failures.push(failure(item.request.occurrenceId, DocxErrorCode.CANCELLED, 'Operation cancelled before this file was processed'));
        }
        continue;
      }
      const outcome = await this.applyToFile(session, filePath, items);
      result.successfulReplacements += outcome.applied.length;
      result.failures.push(...outcome.failures);
      if (outcome.applied.length > 0) result.filesModified++;
    }

    logger.info(`Bulk replace: ${result.successfulReplacements}/${result.totalProcessed} applied in ${result.filesModified} files`);
    return result;
  }

  /** Request-level checks that need no file access. */
  private precheck(session: SearchSession | null, request: ReplaceRequest, config: ServerConfig): ReplaceFailure | null {
    const { occurrenceId, newText } = request;
    if (!session) {
      return failure(occurrenceId, DocxErrorCode.NOT_FOUND, 'No search results available; run a search first');
    }
    const entry = session.get(occurrenceId);
    if (entry?.state === 'consumed') {
      return failure(occurrenceId, DocxErrorCode.STALE_OCCURRENCE, `Occurrence ${occurrenceId} was already replaced`);
    }
    if (newText.length === 0 && !config.allowEmptyReplacement) {
      return failure(occurrenceId, DocxErrorCode.INVALID_REQUEST, 'Empty replacement text is not allowed');
    }
    return null;
  }

  /**
   * Backup, open, apply and save one file under its lock. Replacements
   * run paragraph by paragraph, later matches first, so offsets of the
   * matches still waiting stay valid.
   */
  private async applyToFile(session: SearchSession, filePath: string, items: PendingReplacement[]): Promise<FileOutcome> {
    return this.locks.run(filePath, async () => {
      const failAll = (code: DocxErrorCode, reason: string): ReplaceFailure[] =>
        items.map((item) => failure(item.request.occurrenceId, code, reason));

      let backupPath: string;
      try {
        backupPath = (await this.backups.ensureBackup(filePath)).backupPath;
      } catch (error) {
        return { applied: [], failures: failAll(DocxErrorCode.IO_ERROR, `Backup failed, file left unmodified: ${errorMessage(error)}`) };
      }

      let document: D;
      try {
        document = await this.container.open(filePath);
      } catch (error) {
        return { applied: [], failures: failAll(codeOf(error, DocxErrorCode.IO_ERROR), errorMessage(error)), backupPath };
      }

      const ordered = [...items].sort((a, b) => {
        const pa = a.entry.occurrence.paragraphIndex;
        const pb = b.entry.occurrence.paragraphIndex;
        return pa !== pb ? pa - pb : b.entry.occurrence.start - a.entry.occurrence.start;
      });

      const applied: Array<{ id: string; span: AppliedSpan }> = [];
      const failures: ReplaceFailure[] = [];
      for (const item of ordered) {
        const outcome = replaceOccurrence(document.model, session.targetFor(item.entry), item.request.newText);
        if (outcome.status === 'applied') {
          applied.push({ id: item.request.occurrenceId, span: outcome.span });
        } else {
          failures.push(failure(item.request.occurrenceId, DocxErrorCode[outcome.code], outcome.reason));
        }
      }

      if (applied.length === 0) {
        return { applied: [], failures, backupPath };
      }

      try {
        await this.container.save(document);
      } catch (error) {
        const reason = `Save failed: ${errorMessage(error)}`;
        logger.error(`${reason} (${filePath})`);
        const code = codeOf(error, DocxErrorCode.IO_ERROR);
        return {
          applied: [],
          failures: [...failures, ...applied.map((a) => failure(a.id, code, reason))],
          backupPath,
        };
      }

      for (const a of applied) {
        session.markConsumed(a.id, a.span);
      }
      logger.info(`Applied ${applied.length} replacements in ${filePath}`);
      return { applied: applied.map((a) => a.id), failures, backupPath };
    });
  }
}

export function createReplaceManager(config: ConfigManager = configManager): ReplaceManager<DocxDocument> {
  return new ReplaceManager({ container: docxContainer, config });
}

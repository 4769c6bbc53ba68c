import fs from 'fs/promises';
import path from 'path';
import { expandHome } from '../config.js';
import { DocxError, DocxErrorCode } from './docx/errors.js';

export interface ScanOptions {
    extensions: string[];
    allowedDirectories: string[];
    /** Directories never descended into, e.g. the backup folder. */
    excludeDirectories?: string[];
}

export interface DirectoryValidation {
    valid: boolean;
    error?: string;
    wordFilesCount: number;
    wordFiles: string[];
}

const PREVIEW_FILE_COUNT = 10;

function normalizePath(p: string): string {
    const normalized = path.normalize(p);
    const trimmed = normalized.length > 1 && normalized.endsWith(path.sep) ? normalized.slice(0, -1) : normalized;
    return process.platform === 'win32' ? trimmed.toLowerCase() : trimmed;
}

function isWithin(child: string, parent: string): boolean {
    const c = normalizePath(child);
    const p = normalizePath(parent);
    // Separator check keeps /home/user from matching /home/username
    return c === p || c.startsWith(p.endsWith(path.sep) ? p : p + path.sep);
}

/**
 * Checks if a path is within any allowed directory.
 * An empty list allows everything.
 */
export function isPathAllowed(pathToCheck: string, allowedDirectories: string[]): boolean {
    if (allowedDirectories.length === 0) return true;
    return allowedDirectories.some((dir) => isWithin(pathToCheck, dir));
}

/**
 * Expand ~, resolve to an absolute path and enforce the allow-list.
 * Does not check existence.
 */
export function resolveRequestedPath(requestedPath: string, allowedDirectories: string[]): string {
    const absolute = path.resolve(expandHome(requestedPath));
    if (!isPathAllowed(absolute, allowedDirectories)) {
        throw new DocxError(
            `Path not allowed: ${requestedPath}. Must be within one of these directories: ${allowedDirectories.join(', ')}`,
            DocxErrorCode.INVALID_REQUEST,
            { requestedPath },
        );
    }
    return absolute;
}

export function hasSupportedExtension(filePath: string, extensions: string[]): boolean {
    return extensions.includes(path.extname(filePath).toLowerCase());
}

/**
 * Recursively list candidate documents under `root`, name-sorted at every
 * level so the traversal order is reproducible. Word lock files (~$…),
 * hidden directories and excluded directories are skipped.
 */
export async function listWordFiles(root: string, options: ScanOptions): Promise<string[]> {
    const directory = resolveRequestedPath(root, options.allowedDirectories);
    const stats = await fs.stat(directory).catch(() => null);
    if (!stats || !stats.isDirectory()) {
        throw new DocxError(`Directory ${root} does not exist`, DocxErrorCode.NOT_FOUND, { directory: root });
    }

    const excluded = (options.excludeDirectories ?? []).map((dir) => path.resolve(dir));
    const results: string[] = [];

    async function walk(current: string): Promise<void> {
        const entries = await fs.readdir(current, { withFileTypes: true });
        entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

        for (const entry of entries) {
            const fullPath = path.join(current, entry.name);
            if (entry.isDirectory()) {
                if (entry.name.startsWith('.')) continue;
                if (excluded.some((dir) => isWithin(fullPath, dir))) continue;
                await walk(fullPath);
            } else if (entry.isFile()) {
                if (entry.name.startsWith('~$')) continue;
                if (hasSupportedExtension(entry.name, options.extensions)) {
                    results.push(fullPath);
                }
            }
        }
    }

    await walk(directory);
    return results;
}

export async function validateDirectory(directory: string, options: ScanOptions): Promise<DirectoryValidation> {
    if (!directory) {
        return { valid: false, error: 'Directory path is required', wordFilesCount: 0, wordFiles: [] };
    }
    try {
        const absolute = resolveRequestedPath(directory, options.allowedDirectories);
        const stats = await fs.stat(absolute).catch(() => null);
        if (!stats) {
            return { valid: false, error: `Directory ${directory} does not exist`, wordFilesCount: 0, wordFiles: [] };
        }
        if (!stats.isDirectory()) {
            return { valid: false, error: `${directory} is not a directory`, wordFilesCount: 0, wordFiles: [] };
        }
        const files = await listWordFiles(absolute, options);
        return { valid: true, wordFilesCount: files.length, wordFiles: files.slice(0, PREVIEW_FILE_COUNT) };
    } catch (error) {
        return {
            valid: false,
            error: error instanceof Error ? error.message : String(error),
            wordFilesCount: 0,
            wordFiles: [],
        };
    }
}

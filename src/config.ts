import path from 'path';
import process from 'process';
import os from 'os';

export const APP_NAME = 'docx-global-replace';

export const CONFIG_DIR = path.join(os.homedir(), `.${APP_NAME}`);
export const CONFIG_FILE = process.env.DOCX_REPLACE_CONFIG || path.join(CONFIG_DIR, 'config.json');

export const DEFAULT_BACKUP_DIR = path.join(CONFIG_DIR, 'backups');
export const DEFAULT_CONTEXT_CHARS = 150;
export const DEFAULT_SEARCH_CONCURRENCY = 4;
export const SUPPORTED_EXTENSIONS = ['.docx'];

// Host and port can be overridden from the environment
export const DEFAULT_HTTP_HOST = process.env.DOCX_REPLACE_HOST || '127.0.0.1';
export const DEFAULT_HTTP_PORT = parsePort(process.env.DOCX_REPLACE_PORT, 5130);

function parsePort(raw: string | undefined, fallback: number): number {
    const port = Number(raw);
    return Number.isInteger(port) && port > 0 && port < 65536 ? port : fallback;
}

/** Expand a leading ~ to the home directory. */
export function expandHome(filepath: string): string {
    if (filepath === '~' || filepath.startsWith('~/') || filepath.startsWith('~\\')) {
        return path.join(os.homedir(), filepath.slice(1));
    }
    return filepath;
}

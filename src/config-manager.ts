import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import {
    CONFIG_FILE,
    DEFAULT_BACKUP_DIR,
    DEFAULT_CONTEXT_CHARS,
    DEFAULT_HTTP_HOST,
    DEFAULT_HTTP_PORT,
    DEFAULT_SEARCH_CONCURRENCY,
    SUPPORTED_EXTENSIONS,
    expandHome,
} from './config.js';
import type { ConfigFieldKey } from './config-field-definitions.js';
import { DocxError, DocxErrorCode, errorMessage } from './tools/docx/errors.js';

export const LOG_LEVELS = ['debug', 'info', 'warning', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const ServerConfigSchema = z.object({
    defaultContextChars: z.number().int().min(0).max(10_000),
    caseSensitiveByDefault: z.boolean(),
    backupDirectory: z.string().min(1),
    supportedExtensions: z.array(z.string().regex(/^\.[A-Za-z0-9]+$/)).min(1),
    allowedDirectories: z.array(z.string()),
    searchConcurrency: z.number().int().min(1).max(64),
    allowEmptyReplacement: z.boolean(),
    logLevel: z.enum(LOG_LEVELS),
    httpHost: z.string().min(1),
    httpPort: z.number().int().min(1).max(65535),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export function defaultConfig(): ServerConfig {
    return {
        defaultContextChars: DEFAULT_CONTEXT_CHARS,
        caseSensitiveByDefault: false,
        backupDirectory: DEFAULT_BACKUP_DIR,
        supportedExtensions: [...SUPPORTED_EXTENSIONS],
        allowedDirectories: [],
        searchConcurrency: DEFAULT_SEARCH_CONCURRENCY,
        allowEmptyReplacement: true,
        logLevel: 'info',
        httpHost: DEFAULT_HTTP_HOST,
        httpPort: DEFAULT_HTTP_PORT,
    };
}

function normalize(config: ServerConfig): ServerConfig {
    return {
        ...config,
        backupDirectory: path.resolve(expandHome(config.backupDirectory)),
        allowedDirectories: config.allowedDirectories.map((dir) => path.resolve(expandHome(dir))),
        supportedExtensions: config.supportedExtensions.map((ext) => ext.toLowerCase()),
    };
}

/**
 * Loads, validates and persists the JSON config file. Unknown keys are
 * dropped; a key with an invalid value falls back to its default.
 */
export class ConfigManager {
    private config: ServerConfig | null = null;

    constructor(private readonly configPath: string = CONFIG_FILE) {}

    get filePath(): string {
        return this.configPath;
    }

    async loadConfig(): Promise<ServerConfig> {
        const defaults = defaultConfig();
        let stored: Record<string, unknown> = {};

        try {
            const raw: unknown = JSON.parse(await fs.readFile(this.configPath, 'utf8'));
            if (raw && typeof raw === 'object' && !Array.isArray(raw)) {
                stored = Object.fromEntries(Object.entries(raw));
            }
        } catch (error) {
            if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
                process.stderr.write(`[config] Ignoring unreadable config ${this.configPath}: ${errorMessage(error)}\n`);
            }
        }

        const merged: ServerConfig = { ...defaults };
        for (const key of Object.keys(ServerConfigSchema.shape) as ConfigFieldKey[]) {
            if (!(key in stored)) continue;
            const field = ServerConfigSchema.shape[key].safeParse(stored[key]);
            if (field.success) {
                Object.assign(merged, { [key]: field.data });
            } else {
                process.stderr.write(`[config] Invalid value for ${key}, using default\n`);
            }
        }

        this.config = normalize(merged);
        return this.config;
    }

    async getConfig(): Promise<ServerConfig> {
        return this.config ?? this.loadConfig();
    }

    /** Validate one value against its field schema, apply and persist it. */
    async setValue(key: ConfigFieldKey, value: unknown): Promise<ServerConfig> {
        const current = await this.getConfig();
        const parsed = ServerConfigSchema.safeParse({ ...current, [key]: value });
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new DocxError(
                `Invalid value for ${key}: ${issue ? issue.message : 'rejected'}`,
                DocxErrorCode.INVALID_REQUEST,
                { key },
            );
        }
        this.config = normalize(parsed.data);
        await this.saveConfig();
        return this.config;
    }

    private async saveConfig(): Promise<void> {
        if (!this.config) return;
        await fs.mkdir(path.dirname(this.configPath), { recursive: true });
        await fs.writeFile(this.configPath, JSON.stringify(this.config, null, 2), 'utf8');
    }
}

export const configManager = new ConfigManager();

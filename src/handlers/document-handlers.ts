import { ZodError } from 'zod';
import {
    SearchDocumentsArgsSchema,
    ReplaceOccurrenceArgsSchema,
    ReplaceOccurrencesArgsSchema,
    GetSearchResultsArgsSchema,
    ValidateDirectoryArgsSchema,
} from '../tools/schemas.js';
import type { ReplaceManager, SearchSummary, ReplaceManyResult } from '../replace-manager.js';
import type { OpenedDocument } from '../tools/docx/container.js';
import type { Occurrence } from '../tools/docx/types.js';
import { errorMessage, isDocxError } from '../tools/docx/errors.js';
import { errorResult, textResult, type ServerResult } from '../types.js';

export interface DocumentHandlers {
    handleSearchDocuments(args: unknown): Promise<ServerResult>;
    handleReplaceOccurrence(args: unknown): Promise<ServerResult>;
    handleReplaceOccurrences(args: unknown, signal?: AbortSignal): Promise<ServerResult>;
    handleGetSearchResults(args: unknown): Promise<ServerResult>;
    handleValidateDirectory(args: unknown): Promise<ServerResult>;
}

/**
 * Turn anything a handler throws into a tool error result.
 */
export function formatToolError(toolName: string, error: unknown): ServerResult {
    if (error instanceof ZodError) {
        const issues = error.issues.map((issue) => `${issue.path.join('.') || 'args'}: ${issue.message}`);
        return errorResult(`Invalid arguments for ${toolName}: ${issues.join('; ')}`);
    }
    if (isDocxError(error)) {
        return errorResult(`Error [${error.code}]: ${error.message}`);
    }
    return errorResult(`Error: ${errorMessage(error)}`);
}

export function formatOccurrence(occurrence: Occurrence): string {
    const where = occurrence.locationType === 'table'
        ? `paragraph ${occurrence.paragraphIndex}, table`
        : `paragraph ${occurrence.paragraphIndex}`;
    return `  ${occurrence.id} (${where}): ${occurrence.contextBefore}<<${occurrence.matchText}>>${occurrence.contextAfter}`;
}

export function formatSearchSummary(summary: SearchSummary): string {
    const mode = summary.caseSensitive ? 'case-sensitive' : 'case-insensitive';
    const lines: string[] = [];

    if (summary.totalOccurrences === 0) {
        lines.push(`No occurrences of "${summary.searchTerm}" found in ${summary.filesScanned} files (${mode}).`);
    } else {
        lines.push(
            `Found ${summary.totalOccurrences} occurrences of "${summary.searchTerm}" in ${summary.filesWithMatches} of ${summary.filesScanned} files (${mode}).`,
        );
        let currentFile = '';
        for (const occurrence of summary.occurrences) {
            if (occurrence.filePath !== currentFile) {
                currentFile = occurrence.filePath;
                lines.push('', currentFile);
            }
            lines.push(formatOccurrence(occurrence));
        }
    }

    if (summary.errors.length > 0) {
        lines.push('', `Skipped ${summary.errors.length} files:`);
        for (const fileError of summary.errors) {
            lines.push(`  ${fileError.filePath} [${fileError.code}]: ${fileError.reason}`);
        }
    }
    return lines.join('\n');
}

export function formatReplaceMany(result: ReplaceManyResult): string {
    const lines = [
        `Replaced ${result.successfulReplacements} of ${result.totalProcessed} occurrences in ${result.filesModified} files.`,
    ];
    if (result.cancelled) {
        lines.push('Operation was cancelled; files not yet reached were left unmodified.');
    }
    if (result.failures.length > 0) {
        lines.push('', 'Failures:');
        for (const f of result.failures) {
            lines.push(`  ${f.occurrenceId} [${f.code}]: ${f.reason}`);
        }
    }
    return lines.join('\n');
}

/**
 * MCP tool handlers over one ReplaceManager. Arguments are validated here;
 * whatever a handler throws is reported by the server through formatToolError.
 */
export function createDocumentHandlers<D extends OpenedDocument>(manager: ReplaceManager<D>): DocumentHandlers {
    return {
        async handleSearchDocuments(args) {
            const parsed = SearchDocumentsArgsSchema.parse(args);
            const summary = await manager.searchAll(parsed.directory, parsed.searchTerm, {
                contextChars: parsed.contextChars,
                caseSensitive: parsed.caseSensitive,
            });
            return {
                content: [{ type: 'text', text: formatSearchSummary(summary) }],
                structuredContent: { ...summary },
            };
        },

        async handleReplaceOccurrence(args) {
            const parsed = ReplaceOccurrenceArgsSchema.parse(args);
            const result = await manager.replaceOne(parsed.occurrenceId, parsed.newText);
            if (!result.success) {
                return {
                    content: [{ type: 'text', text: `Failed to replace ${result.occurrenceId} [${result.code}]: ${result.error}` }],
                    structuredContent: { ...result },
                    isError: true,
                };
            }
            const backup = result.backupPath ? ` Backup: ${result.backupPath}` : '';
            return {
                content: [{ type: 'text', text: `Replaced ${result.occurrenceId}.${backup}` }],
                structuredContent: { ...result },
            };
        },

        async handleReplaceOccurrences(args, signal) {
            const parsed = ReplaceOccurrencesArgsSchema.parse(args);
            const result = await manager.replaceMany(parsed.replacements, { signal });
            return {
                content: [{ type: 'text', text: formatReplaceMany(result) }],
                structuredContent: { ...result },
                isError: result.successfulReplacements === 0,
            };
        },

        async handleGetSearchResults(args) {
            const parsed = GetSearchResultsArgsSchema.parse(args);
            const snapshot = manager.currentResults();
            if (!snapshot) {
                return textResult('No search results available. Run search_documents first.');
            }
            const matching = parsed.state === 'all'
                ? snapshot.occurrences
                : snapshot.occurrences.filter((o) => o.state === parsed.state);
            const page = matching.slice(parsed.offset, parsed.offset + parsed.length);
            const exportedTo = parsed.outputFile ? await manager.exportResults(parsed.outputFile) : undefined;
            const response = {
                ...snapshot,
                occurrences: page,
                offset: parsed.offset,
                returned: page.length,
                matchingState: matching.length,
                ...(exportedTo ? { exportedTo } : {}),
            };
            return {
                content: [{ type: 'text', text: JSON.stringify(response, null, 2) }],
                structuredContent: response,
            };
        },

        async handleValidateDirectory(args) {
            const parsed = ValidateDirectoryArgsSchema.parse(args);
            const validation = await manager.validateDirectory(parsed.directory);
            return {
                content: [{ type: 'text', text: JSON.stringify(validation, null, 2) }],
                structuredContent: { ...validation },
                isError: !validation.valid,
            };
        },
    };
}

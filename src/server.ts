import {Server} from "@modelcontextprotocol/sdk/server/index.js";
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    ListResourcesRequestSchema,
    ListPromptsRequestSchema,
    SetLevelRequestSchema,
    type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import type {ZodTypeAny} from "zod";
import {zodToJsonSchema} from "zod-to-json-schema";

import {
    GetConfigArgsSchema,
    SetConfigValueArgsSchema,
    SearchDocumentsArgsSchema,
    ReplaceOccurrenceArgsSchema,
    ReplaceOccurrencesArgsSchema,
    GetSearchResultsArgsSchema,
    ValidateDirectoryArgsSchema,
} from './tools/schemas.js';
import {getConfig, setConfigValue} from './tools/config.js';
import {createDocumentHandlers, formatToolError} from './handlers/index.js';
import type {ReplaceManager} from './replace-manager.js';
import type {OpenedDocument} from './tools/docx/container.js';
import {ConfigManager, configManager as defaultConfigManager, type LogLevel} from './config-manager.js';
import {APP_NAME} from './config.js';
import {VERSION} from './version.js';
import {ServerResult} from './types.js';
import {logToStderr, logger, setLogLevel} from './utils/logger.js';

export interface CreateServerOptions<D extends OpenedDocument> {
    manager: ReplaceManager<D>;
    config?: ConfigManager;
}

/** MCP tool input schemas are plain JSON Schema objects. */
function toInputSchema(schema: ZodTypeAny): Tool['inputSchema'] {
    const json = zodToJsonSchema(schema);
    const properties = 'properties' in json && json.properties ? {...json.properties} : {};
    const required = 'required' in json && Array.isArray(json.required)
        ? json.required.filter((key): key is string => typeof key === 'string')
        : [];
    return required.length > 0
        ? {type: 'object', properties, required}
        : {type: 'object', properties};
}

function toLogLevel(level: string): LogLevel {
    switch (level) {
        case 'debug':
            return 'debug';
        case 'info':
        case 'notice':
            return 'info';
        case 'warning':
            return 'warning';
        default:
            return 'error';
    }
}

export function listTools(): Tool[] {
    return [
        // Configuration tools
        {
            name: "get_config",
            description: `
                Get the complete server configuration as JSON. Config includes fields for:
                - defaultContextChars (characters of context around each match, default 150)
                - caseSensitiveByDefault (boolean)
                - backupDirectory (where pre-change copies are stored)
                - supportedExtensions (file types picked up when scanning)
                - allowedDirectories (folders that may be searched; empty means any)
                - searchConcurrency (files read in parallel during a search)
                - allowEmptyReplacement (whether a replacement may delete the match)
                - logLevel, httpHost, httpPort`,
            inputSchema: toInputSchema(GetConfigArgsSchema),
            annotations: {
                title: "Get Configuration",
                readOnlyHint: true,
            },
        },
        {
            name: "set_config_value",
            description: `
                Set a specific configuration value by key.

                Arrays may be passed as JSON strings. Setting allowedDirectories
                to an empty array ([]) allows searching any folder.`,
            inputSchema: toInputSchema(SetConfigValueArgsSchema),
            annotations: {
                title: "Set Configuration Value",
                readOnlyHint: false,
                destructiveHint: false,
            },
        },

        // Search
        {
            name: "search_documents",
            description: `
                Search every Word document (.docx) under a folder for a literal phrase.

                Matches are found in the paragraph text the reader sees, even when
                Word split the phrase across differently formatted runs. Body and
                table paragraphs are searched; headers, footers and notes are not.

                Each match gets an identity (e.g. occ_1_4) valid until the next
                search. Pass identities to replace_occurrence or replace_occurrences.
                Starting a new search discards the previous results.

                contextChars sets how much surrounding text to show (default from config).
                caseSensitive defaults to the caseSensitiveByDefault setting.`,
            inputSchema: toInputSchema(SearchDocumentsArgsSchema),
            annotations: {
                title: "Search Documents",
                readOnlyHint: true,
            },
        },
        {
            name: "get_search_results",
            description: `
                Return the occurrences of the current search session with their state:
                active, consumed (already replaced) or possibly-stale (an earlier
                replacement in the same paragraph may have moved it).

                Filter with state and page with offset/length. Pass outputFile to
                also write the whole session, unfiltered, to a JSON file.`,
            inputSchema: toInputSchema(GetSearchResultsArgsSchema),
            annotations: {
                title: "Get Search Results",
                readOnlyHint: true,
            },
        },
        {
            name: "validate_directory",
            description: `
                Check that a folder exists, is allowed, and count the Word documents in it.
                Lists up to the first 10 documents found.`,
            inputSchema: toInputSchema(ValidateDirectoryArgsSchema),
            annotations: {
                title: "Validate Directory",
                readOnlyHint: true,
            },
        },

        // Replace
        {
            name: "replace_occurrence",
            description: `
                Replace one occurrence from the current search with new text.

                The document is backed up before its first change in the session.
                Formatting of the first run of the match is kept; the rest of the
                matched text is removed. If the paragraph no longer holds the
                matched text at that position the request fails with
                STALE_OCCURRENCE and nothing is written.`,
            inputSchema: toInputSchema(ReplaceOccurrenceArgsSchema),
            annotations: {
                title: "Replace Occurrence",
                readOnlyHint: false,
                destructiveHint: true,
            },
        },
        {
            name: "replace_occurrences",
            description: `
                Replace several occurrences in one call. Each document is backed up,
                opened and saved once. One failing item never stops the others;
                every failure is reported with its code and reason.`,
            inputSchema: toInputSchema(ReplaceOccurrencesArgsSchema),
            annotations: {
                title: "Replace Occurrences",
                readOnlyHint: false,
                destructiveHint: true,
            },
        },
    ];
}

/**
 * Build the MCP server around one ReplaceManager.
 */
export function createServer<D extends OpenedDocument>(options: CreateServerOptions<D>): Server {
    const config = options.config ?? defaultConfigManager;
    const handlers = createDocumentHandlers(options.manager);

    const server = new Server(
        {
            name: APP_NAME,
            version: VERSION,
        },
        {
            capabilities: {
                tools: {},
                resources: {},
                prompts: {},
                logging: {},
            },
        },
    );

    server.setRequestHandler(ListResourcesRequestSchema, async () => ({ resources: [] }));
    server.setRequestHandler(ListPromptsRequestSchema, async () => ({ prompts: [] }));

    server.setRequestHandler(SetLevelRequestSchema, async (request) => {
        setLogLevel(toLogLevel(request.params.level));
        return {};
    });

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        logToStderr('debug', 'Generating tools list...');
        return { tools: listTools() };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request, extra): Promise<ServerResult> => {
        const {name, arguments: args} = request.params;
        const startTime = Date.now();

        try {
            let result: ServerResult;
            switch (name) {
                case "get_config":
                    result = await getConfig(config);
                    break;
                case "set_config_value":
                    result = await setConfigValue(args, config);
                    break;
                case "search_documents":
                    result = await handlers.handleSearchDocuments(args);
                    break;
                case "get_search_results":
                    result = await handlers.handleGetSearchResults(args ?? {});
                    break;
                case "validate_directory":
                    result = await handlers.handleValidateDirectory(args);
                    break;
                case "replace_occurrence":
                    result = await handlers.handleReplaceOccurrence(args);
                    break;
                case "replace_occurrences":
                    result = await handlers.handleReplaceOccurrences(args, extra.signal);
                    break;
                default:
                    result = {
                        content: [{type: "text", text: `Error: Unknown tool: ${name}`}],
                        isError: true,
                    };
            }
            logger.debug(`Tool ${name} finished in ${Date.now() - startTime}ms`);
            return result;
        } catch (error) {
            logger.error(`Tool ${name} failed after ${Date.now() - startTime}ms`, { error: error instanceof Error ? error.message : String(error) });
            return formatToolError(name, error);
        }
    });

    return server;
}

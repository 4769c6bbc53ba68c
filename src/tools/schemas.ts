import { z } from "zod";

// Config tools schemas
export const GetConfigArgsSchema = z.object({});

export const SetConfigValueArgsSchema = z.object({
  key: z.string(),
  value: z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.array(z.string()),
    z.null(),
  ]),
});

// Search schemas
export const SearchDocumentsArgsSchema = z.object({
  directory: z.string().min(1, "directory is required"),
  searchTerm: z.string(),
  contextChars: z.number().int().min(0).optional(),
  caseSensitive: z.boolean().optional(),
});

export const GetSearchResultsArgsSchema = z.object({
  state: z.enum(["all", "active", "consumed", "possibly-stale"]).optional().default("all"),
  offset: z.number().int().min(0).optional().default(0),
  length: z.number().int().min(1).optional().default(100),
  outputFile: z.string().min(1).optional(),
});

export const ValidateDirectoryArgsSchema = z.object({
  directory: z.string(),
});

// Replace schemas
export const ReplaceOccurrenceArgsSchema = z.object({
  occurrenceId: z.string().min(1, "occurrenceId is required"),
  newText: z.string(),
});

export const ReplaceOccurrencesArgsSchema = z.object({
  replacements: z.array(ReplaceOccurrenceArgsSchema).min(1, "replacements must not be empty"),
});

export type SearchDocumentsArgs = z.infer<typeof SearchDocumentsArgsSchema>;
export type ReplaceOccurrenceArgs = z.infer<typeof ReplaceOccurrenceArgsSchema>;
export type ReplaceOccurrencesArgs = z.infer<typeof ReplaceOccurrencesArgsSchema>;

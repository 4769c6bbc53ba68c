export type ConfigFieldValueType = 'string' | 'number' | 'boolean' | 'array';

export type ConfigFieldDefinition = {
  label: string;
  description: string;
  valueType: ConfigFieldValueType;
};

// Single source of truth for user-editable configuration fields.
export const CONFIG_FIELD_DEFINITIONS = {
  defaultContextChars: {
    label: 'Context Length',
    description: 'How many characters of surrounding text are shown before and after each match when a search does not ask for a specific amount. Context never reaches into the neighbouring paragraph.',
    valueType: 'number',
  },
  caseSensitiveByDefault: {
    label: 'Case Sensitive Search',
    description: 'When on, searches match letter case exactly unless a request says otherwise. When off, "Report" also finds "report" and "REPORT".',
    valueType: 'boolean',
  },
  backupDirectory: {
    label: 'Backup Folder',
    description: 'Where a copy of each document is stored before its first change in a search session. Backups are never overwritten or deleted automatically.',
    valueType: 'string',
  },
  supportedExtensions: {
    label: 'File Types',
    description: 'File extensions picked up when scanning a folder.',
    valueType: 'array',
  },
  allowedDirectories: {
    label: 'Allowed Folders',
    description: 'Folders that may be searched and edited. If this list is empty, any folder can be used.',
    valueType: 'array',
  },
  searchConcurrency: {
    label: 'Parallel Reads',
    description: 'How many documents are opened at the same time while searching.',
    valueType: 'number',
  },
  allowEmptyReplacement: {
    label: 'Allow Deletions',
    description: 'When on, an empty replacement deletes the matched text. When off, empty replacements are refused.',
    valueType: 'boolean',
  },
  logLevel: {
    label: 'Log Level',
    description: 'Lowest level of log message that is written: debug, info, warning or error.',
    valueType: 'string',
  },
  httpHost: {
    label: 'HTTP Host',
    description: 'Interface the HTTP API listens on.',
    valueType: 'string',
  },
  httpPort: {
    label: 'HTTP Port',
    description: 'Port the HTTP API listens on.',
    valueType: 'number',
  },
} as const satisfies Record<string, ConfigFieldDefinition>;

export type ConfigFieldKey = keyof typeof CONFIG_FIELD_DEFINITIONS;

export const CONFIG_FIELD_KEYS = Object.keys(CONFIG_FIELD_DEFINITIONS) as ConfigFieldKey[];

export function isConfigFieldKey(value: string): value is ConfigFieldKey {
  return Object.prototype.hasOwnProperty.call(CONFIG_FIELD_DEFINITIONS, value);
}

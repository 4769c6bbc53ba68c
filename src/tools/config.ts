import { ConfigManager, configManager, type ServerConfig } from '../config-manager.js';
import { SetConfigValueArgsSchema } from './schemas.js';
import { VERSION } from '../version.js';
import { errorMessage } from './docx/errors.js';
import { setLogLevel, logger } from '../utils/logger.js';
import { errorResult, textResult, type ServerResult } from '../types.js';
import {
  CONFIG_FIELD_DEFINITIONS,
  CONFIG_FIELD_KEYS,
  isConfigFieldKey,
  type ConfigFieldValueType,
} from '../config-field-definitions.js';

type RawValue = string | number | boolean | string[] | null;

/**
 * Clients often send arrays as JSON strings or a bare single value, and
 * numbers as strings. Bring the value into the shape its field expects;
 * the config schema still has the final say.
 */
export function coerceConfigValue(valueType: ConfigFieldValueType, value: RawValue): unknown {
  let coerced: unknown = value;

  if (typeof coerced === 'string' && (coerced.startsWith('[') || coerced.startsWith('{'))) {
    try {
      coerced = JSON.parse(coerced);
    } catch {
      logger.debug(`Value is not JSON, using as-is: ${value}`);
    }
  }

  if (valueType === 'array' && !Array.isArray(coerced) && coerced !== null) {
    coerced = [String(coerced)];
  }
  if (valueType === 'number' && typeof coerced === 'string' && coerced.trim() !== '') {
    const n = Number(coerced);
    if (!Number.isNaN(n)) coerced = n;
  }
  if (valueType === 'boolean' && (coerced === 'true' || coerced === 'false')) {
    coerced = coerced === 'true';
  }
  return coerced;
}

/**
 * Get the entire config plus the editable field list
 */
export async function getConfig(manager: ConfigManager = configManager): Promise<ServerResult> {
  try {
    const config = await manager.getConfig();
    const response = { ...config, version: VERSION, configFile: manager.filePath };
    return {
      content: [{
        type: 'text',
        text: `Current configuration:\n${JSON.stringify(response, null, 2)}`,
      }],
      structuredContent: {
        config: response,
        entries: CONFIG_FIELD_KEYS.map((key) => ({
          key,
          value: config[key],
          label: CONFIG_FIELD_DEFINITIONS[key].label,
          valueType: CONFIG_FIELD_DEFINITIONS[key].valueType,
          editable: true,
        })),
      },
    };
  } catch (error) {
    logger.error(`Error in getConfig: ${errorMessage(error)}`);
    return errorResult(`Error getting configuration: ${errorMessage(error)}`);
  }
}

/**
 * Set a specific config value
 */
export async function setConfigValue(args: unknown, manager: ConfigManager = configManager): Promise<ServerResult> {
  const parsed = SetConfigValueArgsSchema.safeParse(args);
  if (!parsed.success) {
    return errorResult(`Invalid arguments: ${parsed.error.issues.map((i) => `${i.path.join('.') || 'args'}: ${i.message}`).join('; ')}`);
  }

  const { key, value } = parsed.data;
  if (!isConfigFieldKey(key)) {
    return errorResult(`Key "${key}" is not configurable. Allowed keys: ${CONFIG_FIELD_KEYS.join(', ')}`);
  }

  try {
    const valueToStore = coerceConfigValue(CONFIG_FIELD_DEFINITIONS[key].valueType, value);
    const updated: ServerConfig = await manager.setValue(key, valueToStore);
    if (key === 'logLevel') {
      setLogLevel(updated.logLevel);
    }
    logger.info(`Config ${key} updated`, { key });
    return textResult(
      `Successfully set ${key} to ${JSON.stringify(updated[key], null, 2)}\n\nUpdated configuration:\n${JSON.stringify(updated, null, 2)}`,
    );
  } catch (error) {
    return errorResult(`Error setting value: ${errorMessage(error)}`);
  }
}

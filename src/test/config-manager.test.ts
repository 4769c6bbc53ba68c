import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigManager, defaultConfig } from '../config-manager.js';
import { coerceConfigValue, getConfig, setConfigValue } from '../tools/config.js';
import { DocxErrorCode } from '../tools/docx/errors.js';
import { makeTempDir, removeDir } from './fixtures.js';

let dir: string;
let configPath: string;

beforeEach(async () => {
  dir = await makeTempDir();
  configPath = path.join(dir, 'config.json');
});

afterEach(async () => {
  await removeDir(dir);
});

function textOf(result: { content: Array<{ type: string; text?: unknown }> }): string {
  const first = result.content[0];
  return first && typeof first.text === 'string' ? first.text : '';
}

describe('ConfigManager', () => {
  it('uses defaults when no file exists', async () => {
    const config = await new ConfigManager(configPath).loadConfig();
    const defaults = defaultConfig();
    expect(config.defaultContextChars).toBe(150);
    expect(config.caseSensitiveByDefault).toBe(false);
    expect(config.supportedExtensions).toEqual(['.docx']);
    expect(config.allowEmptyReplacement).toBe(true);
    expect(config.searchConcurrency).toBe(4);
    expect(config.backupDirectory).toBe(path.resolve(defaults.backupDirectory));
  });

  it('keeps valid fields and falls back for invalid ones', async () => {
    await fs.writeFile(configPath, JSON.stringify({
      defaultContextChars: -5,
      caseSensitiveByDefault: true,
      supportedExtensions: ['.DOCX', '.DOCM'],
      allowedDirectories: ['~/docs'],
      bogus: 1,
    }));

    const config = await new ConfigManager(configPath).loadConfig();
    expect(config.defaultContextChars).toBe(150);
    expect(config.caseSensitiveByDefault).toBe(true);
    expect(config.supportedExtensions).toEqual(['.docx', '.docm']);
    expect(config.allowedDirectories).toEqual([path.join(os.homedir(), 'docs')]);
    expect('bogus' in config).toBe(false);
  });

  it('treats an unreadable file as empty', async () => {
    await fs.writeFile(configPath, '{ not json');
    const config = await new ConfigManager(configPath).loadConfig();
    expect(config.defaultContextChars).toBe(150);
  });

  it('validates and persists a single value', async () => {
    const manager = new ConfigManager(configPath);
    await manager.setValue('searchConcurrency', 8);
    expect((await manager.getConfig()).searchConcurrency).toBe(8);
    expect((await new ConfigManager(configPath).loadConfig()).searchConcurrency).toBe(8);

    await expect(manager.setValue('searchConcurrency', 0)).rejects.toMatchObject({
      code: DocxErrorCode.INVALID_REQUEST,
    });
    expect((await manager.getConfig()).searchConcurrency).toBe(8);
  });
});

describe('config tools', () => {
  it('coerces loosely typed values', () => {
    expect(coerceConfigValue('array', '[".docx",".docm"]')).toEqual(['.docx', '.docm']);
    expect(coerceConfigValue('array', '/tmp/docs')).toEqual(['/tmp/docs']);
    expect(coerceConfigValue('number', '12')).toBe(12);
    expect(coerceConfigValue('number', 'twelve')).toBe('twelve');
    expect(coerceConfigValue('boolean', 'true')).toBe(true);
    expect(coerceConfigValue('string', 'abc')).toBe('abc');
  });

  it('sets a value passed as a string', async () => {
    const manager = new ConfigManager(configPath);
    const result = await setConfigValue({ key: 'defaultContextChars', value: '40' }, manager);
    expect(result.isError).toBeUndefined();
    expect(textOf(result).startsWith('Successfully set defaultContextChars to 40')).toBe(true);
    expect((await manager.getConfig()).defaultContextChars).toBe(40);
  });

  it('rejects unknown keys and bad values', async () => {
    const manager = new ConfigManager(configPath);

    const unknown = await setConfigValue({ key: 'bogus', value: 1 }, manager);
    expect(unknown.isError).toBe(true);
    expect(textOf(unknown).startsWith('Key "bogus" is not configurable.')).toBe(true);

    const bad = await setConfigValue({ key: 'searchConcurrency', value: -1 }, manager);
    expect(bad.isError).toBe(true);
    expect(textOf(bad).startsWith('Error setting value: Invalid value for searchConcurrency')).toBe(true);

    const malformed = await setConfigValue({ value: 1 }, manager);
    expect(textOf(malformed)).toBe('Invalid arguments: key: Required');
  });

  it('lists every editable field', async () => {
    const result = await getConfig(new ConfigManager(configPath));
    expect(textOf(result).startsWith('Current configuration:\n')).toBe(true);
    const entries = result.structuredContent?.entries;
    expect(Array.isArray(entries) ? entries.length : 0).toBe(10);
  });
});

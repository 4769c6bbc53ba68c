import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import PizZip from 'pizzip';
import { ConfigManager } from '../config-manager.js';
import type { FragmentDocument } from '../tools/docx/types.js';

const W_NS = 'http://schemas.openxmlformats.org/wordprocessingml/2006/main';

const CONTENT_TYPES =
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
  '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
  '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
  '<Default Extension="xml" ContentType="application/xml"/>' +
  '<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>' +
  '</Types>';

const ROOT_RELS =
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
  '<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
  '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>' +
  '</Relationships>';

export interface RunOptions {
  bold?: boolean;
  italic?: boolean;
}

function escapeXml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** One <w:r> holding one <w:t>. */
export function run(text: string, options: RunOptions = {}): string {
  const props = (options.bold ? '<w:b/>' : '') + (options.italic ? '<w:i/>' : '');
  const rPr = props ? `<w:rPr>${props}</w:rPr>` : '';
  const space = text !== text.trim() ? ' xml:space="preserve"' : '';
  return `<w:r>${rPr}<w:t${space}>${escapeXml(text)}</w:t></w:r>`;
}

export function paragraph(...runs: string[]): string {
  return `<w:p>${runs.join('')}</w:p>`;
}

/** Table whose cells each hold the given paragraph XML. */
export function table(...rows: string[][]): string {
  const body = rows
    .map((cells) => `<w:tr>${cells.map((cell) => `<w:tc>${cell}</w:tc>`).join('')}</w:tr>`)
    .join('');
  return `<w:tbl>${body}</w:tbl>`;
}

export function documentXml(...bodyParts: string[]): string {
  return (
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
    `<w:document xmlns:w="${W_NS}"><w:body>${bodyParts.join('')}<w:sectPr/></w:body></w:document>`
  );
}

export function buildDocx(xml: string): Buffer {
  const zip = new PizZip();
  zip.file('[Content_Types].xml', CONTENT_TYPES);
  zip.file('_rels/.rels', ROOT_RELS);
  zip.file('word/document.xml', xml);
  return zip.generate({ type: 'nodebuffer' });
}

export async function makeTempDir(prefix = 'docx-replace-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Write a .docx whose body is the given paragraphs and tables. */
export async function writeDocx(dir: string, name: string, ...bodyParts: string[]): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, buildDocx(documentXml(...bodyParts)));
  return filePath;
}

export async function readDocumentXml(filePath: string): Promise<string> {
  const zip = new PizZip(await fs.readFile(filePath));
  const entry = zip.file('word/document.xml');
  if (!entry) throw new Error(`${filePath} has no word/document.xml`);
  return entry.asText();
}

/**
 * In-memory model: one paragraph per array, one fragment per string.
 * Styles are labels such as "p0f1" so tests can check which fragment a
 * piece came from.
 */
export function modelOf(...paragraphs: string[][]): FragmentDocument<string> {
  return {
    paragraphs: paragraphs.map((texts, p) => ({
      fragments: texts.map((text, f) => ({ text, style: `p${p}f${f}` })),
    })),
  };
}

/** ConfigManager backed by a file in `dir`, backups under `dir/backups`. */
export async function testConfig(dir: string, overrides: Record<string, unknown> = {}): Promise<ConfigManager> {
  const configPath = path.join(dir, 'config.json');
  await fs.writeFile(
    configPath,
    JSON.stringify({ backupDirectory: path.join(dir, 'backups'), ...overrides }),
    'utf8',
  );
  const manager = new ConfigManager(configPath);
  await manager.loadConfig();
  return manager;
}

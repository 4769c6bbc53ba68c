import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import PizZip from 'pizzip';
import {
  openDocx,
  saveDocx,
  documentTexts,
  fragmentTexts,
  locateOccurrences,
  replaceOccurrence,
} from '../tools/docx/index.js';
import { DocxErrorCode } from '../tools/docx/errors.js';
import { validateInvariants } from '../tools/docx/validate.js';
import { makeTempDir, paragraph, readDocumentXml, removeDir, run, table, writeDocx } from './fixtures.js';

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await removeDir(dir);
});

describe('openDocx', () => {
  it('exposes body and table paragraphs as fragments, one per w:t', async () => {
    const file = await writeDocx(
      dir,
      'doc.docx',
      paragraph(run('Hello '), run('Wor', { bold: true }), run('ld!')),
      table([paragraph(run('Cell text'))]),
    );

    const document = await openDocx(file);

    expect(document.filePath).toBe(file);
    expect(documentTexts(document.model)).toEqual(['Hello World!', 'Cell text']);
    expect(fragmentTexts(document.model.paragraphs[0])).toEqual(['Hello ', 'Wor', 'ld!']);
    expect(document.model.paragraphs.map((p) => p.location)).toEqual(['body', 'table']);

    const styles = document.model.paragraphs[0].fragments.map((f) => f.style);
    expect(styles.map((s) => s.origin)).toEqual([0, 1, 2]);
    expect(styles[0].properties).toBeNull();
    expect(styles[1].properties).toContain('<w:b/>');
  });

  it('keeps empty paragraphs so indices follow document order', async () => {
    const file = await writeDocx(dir, 'doc.docx', paragraph(run('first')), paragraph(), paragraph(run('third')));
    const document = await openDocx(file);
    expect(documentTexts(document.model)).toEqual(['first', '', 'third']);
  });

  it('fails with IO_ERROR for a missing file', async () => {
    await expect(openDocx(path.join(dir, 'missing.docx'))).rejects.toMatchObject({ code: DocxErrorCode.IO_ERROR });
  });

  it('fails with FORMAT_ERROR for a file that is not a zip', async () => {
    const file = path.join(dir, 'fake.docx');
    await fs.writeFile(file, 'plain text, not an archive');
    await expect(openDocx(file)).rejects.toMatchObject({ code: DocxErrorCode.FORMAT_ERROR });
  });

  it('fails with FORMAT_ERROR when word/document.xml is missing', async () => {
    const zip = new PizZip();
    zip.file('other.xml', '<x/>');
    const file = path.join(dir, 'empty.docx');
    await fs.writeFile(file, zip.generate({ type: 'nodebuffer' }));
    await expect(openDocx(file)).rejects.toMatchObject({
      code: DocxErrorCode.FORMAT_ERROR,
      message: 'Invalid DOCX: missing word/document.xml',
    });
  });
});

describe('saveDocx', () => {
  it('writes replaced text back into the original runs', async () => {
    const file = await writeDocx(dir, 'doc.docx', paragraph(run('Hello '), run('Wor', { bold: true }), run('ld!')));
    const document = await openDocx(file);

    const result = replaceOccurrence(document.model, { paragraphIndex: 0, start: 6, end: 11, matchText: 'World' }, 'Earth');
    expect(result.status).toBe('applied');
    expect(await saveDocx(document)).toBe(2);

    const reopened = await openDocx(file);
    expect(fragmentTexts(reopened.model.paragraphs[0])).toEqual(['Hello ', 'Earth', '!']);
    expect(reopened.model.paragraphs[0].fragments[1].style.properties).toContain('<w:b/>');
  });

  it('removes a run emptied by the replacement', async () => {
    const file = await writeDocx(dir, 'doc.docx', paragraph(run('Keep '), run('drop', { bold: true }), run(' end')));
    const document = await openDocx(file);

    replaceOccurrence(document.model, { paragraphIndex: 0, start: 5, end: 9, matchText: 'drop' }, '');
    expect(await saveDocx(document)).toBe(1);

    const xml = await readDocumentXml(file);
    expect(xml).not.toContain('<w:b/>');
    const reopened = await openDocx(file);
    expect(fragmentTexts(reopened.model.paragraphs[0])).toEqual(['Keep ', ' end']);
  });

  it('keeps the only run of a paragraph even when emptied', async () => {
    const file = await writeDocx(dir, 'doc.docx', paragraph(run('gone')), paragraph(run('stays')));
    const document = await openDocx(file);

    replaceOccurrence(document.model, { paragraphIndex: 0, start: 0, end: 4, matchText: 'gone' }, '');
    await saveDocx(document);

    const reopened = await openDocx(file);
    expect(documentTexts(reopened.model)).toEqual(['', 'stays']);
    expect(reopened.model.paragraphs[0].fragments).toHaveLength(1);
  });

  it('marks text with edge whitespace as preserved', async () => {
    const file = await writeDocx(dir, 'doc.docx', paragraph(run('Hello world')));
    const document = await openDocx(file);

    replaceOccurrence(document.model, { paragraphIndex: 0, start: 6, end: 11, matchText: 'world' }, 'there ');
    await saveDocx(document);

    expect(await readDocumentXml(file)).toContain('<w:t xml:space="preserve">Hello there </w:t>');
  });

  it('round-trips an unmodified document to the same text', async () => {
    const file = await writeDocx(
      dir,
      'doc.docx',
      paragraph(run('One '), run('two', { italic: true })),
      table([paragraph(run('A')), paragraph(run('B'))], [paragraph(run('C')), paragraph(run('D'))]),
    );
    const document = await openDocx(file);
    const output = path.join(dir, 'copy.docx');

    expect(await saveDocx(document, output)).toBe(0);
    const copy = await openDocx(output);
    expect(documentTexts(copy.model)).toEqual(['One two', 'A', 'B', 'C', 'D']);
  });
});

describe('tabs and line breaks', () => {
  const tabbed = '<w:p><w:r><w:t>Name:</w:t><w:tab/><w:t>Smith</w:t></w:r></w:p>';
  const broken = '<w:p><w:r><w:t>one</w:t><w:br/><w:t>two</w:t></w:r></w:p>';
  const locate = (document: Awaited<ReturnType<typeof openDocx>>, term: string) =>
    locateOccurrences(document.model, term, {
      filePath: document.filePath,
      caseSensitive: true,
      contextChars: 0,
      nextId: () => 'id',
    });

  it('reads separators as fixed fragments', async () => {
    const file = await writeDocx(dir, 'doc.docx', tabbed, broken);
    const document = await openDocx(file);

    expect(documentTexts(document.model)).toEqual(['Name:\tSmith', 'one\ntwo']);
    expect(document.model.paragraphs[0].fragments.map((f) => f.fixed === true)).toEqual([false, true, false]);
  });

  it('does not match text across a tab or a break', async () => {
    const file = await writeDocx(dir, 'doc.docx', tabbed, broken);
    const document = await openDocx(file);

    expect(locate(document, 'Name:Smith')).toEqual([]);
    expect(locate(document, 'onetwo')).toEqual([]);
    expect(locate(document, 'Name:\tSmith').map((o) => [o.start, o.end])).toEqual([[0, 11]]);
  });

  it('ignores tab stops declared in paragraph properties', async () => {
    const file = await writeDocx(
      dir,
      'doc.docx',
      '<w:p><w:pPr><w:tabs><w:tab w:val="left" w:pos="720"/></w:tabs></w:pPr><w:r><w:t>x</w:t></w:r></w:p>',
    );
    const document = await openDocx(file);
    expect(fragmentTexts(document.model.paragraphs[0])).toEqual(['x']);
  });

  it('refuses a replacement spanning a tab', async () => {
    const file = await writeDocx(dir, 'doc.docx', tabbed);
    const document = await openDocx(file);

    const result = replaceOccurrence(document.model, { paragraphIndex: 0, start: 0, end: 11, matchText: 'Name:\tSmith' }, 'X');
    expect(result).toMatchObject({ status: 'failed', code: 'INVALID_REQUEST' });
    expect(fragmentTexts(document.model.paragraphs[0])).toEqual(['Name:', '\t', 'Smith']);
  });

  it('keeps the tab when the text beside it is replaced', async () => {
    const file = await writeDocx(dir, 'doc.docx', tabbed);
    const document = await openDocx(file);

    replaceOccurrence(document.model, { paragraphIndex: 0, start: 6, end: 11, matchText: 'Smith' }, 'Jones');
    expect(await saveDocx(document)).toBe(1);

    expect(await readDocumentXml(file)).toContain('<w:r><w:t>Name:</w:t><w:tab/><w:t>Jones</w:t></w:r>');
  });

  it('refuses to save a model whose separator text changed', async () => {
    const file = await writeDocx(dir, 'doc.docx', tabbed);
    const document = await openDocx(file);
    document.model.paragraphs[0].fragments[1].text = ' ';

    await expect(saveDocx(document)).rejects.toMatchObject({ code: DocxErrorCode.FORMAT_ERROR });
    expect(await readDocumentXml(file)).toContain('<w:tab/>');
  });
});

describe('validateInvariants', () => {
  const snapshot = { bodyChildCount: 3, tableCount: 1, paragraphCount: 2, signature: 'p,tbl,sectPr' };

  it('accepts an identical structure', () => {
    expect(() => validateInvariants(snapshot, { ...snapshot })).not.toThrow();
  });

  it('rejects a changed paragraph count', () => {
    expect(() => validateInvariants(snapshot, { ...snapshot, paragraphCount: 3 })).toThrowError(
      'DOCX structural validation failed, output NOT written.\nParagraph count changed: 2 -> 3',
    );
  });
});

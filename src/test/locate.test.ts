import { describe, it, expect } from 'vitest';
import { findMatches, foldCase, locateOccurrences } from '../tools/docx/index.js';
import type { FragmentDocument } from '../tools/docx/types.js';
import { modelOf } from './fixtures.js';

function counter(): () => string {
  let n = 0;
  return () => `id${++n}`;
}

describe('foldCase', () => {
  it('lower-cases ASCII', () => {
    expect(foldCase('ABC def')).toBe('abc def');
  });

  it('keeps characters whose lower-case form changes length', () => {
    // U+0130 lower-cases to two code units
    expect(foldCase('İX')).toBe('İx');
    expect(foldCase('İX').length).toBe(2);
  });
});

describe('findMatches', () => {
  it('does not report overlapping matches', () => {
    expect(findMatches('abcabc', 'abc', true)).toEqual([[0, 3], [3, 6]]);
    expect(findMatches('aaaa', 'aa', true)).toEqual([[0, 2], [2, 4]]);
  });

  it('honours case sensitivity', () => {
    expect(findMatches('Hello hello HELLO', 'hello', false)).toEqual([[0, 5], [6, 11], [12, 17]]);
    expect(findMatches('Hello hello HELLO', 'hello', true)).toEqual([[6, 11]]);
  });

  it('finds nothing for an empty term or text', () => {
    expect(findMatches('abc', '', true)).toEqual([]);
    expect(findMatches('', 'a', false)).toEqual([]);
  });
});

describe('locateOccurrences', () => {
  const doc = modelOf(['Say hel', 'lo there'], ['nothing'], ['hello, HELLO']);

  it('matches across fragment boundaries with paragraph-local context', () => {
    const found = locateOccurrences(doc, 'hello', {
      filePath: '/docs/a.docx',
      caseSensitive: false,
      contextChars: 4,
      nextId: counter(),
    });

    expect(found).toEqual([
      {
        id: 'id1', filePath: '/docs/a.docx', paragraphIndex: 0, start: 4, end: 9,
        matchText: 'hello', contextBefore: 'Say ', contextAfter: ' the', locationType: 'body',
      },
      {
        id: 'id2', filePath: '/docs/a.docx', paragraphIndex: 2, start: 0, end: 5,
        matchText: 'hello', contextBefore: '', contextAfter: ', HE', locationType: 'body',
      },
      {
        id: 'id3', filePath: '/docs/a.docx', paragraphIndex: 2, start: 7, end: 12,
        matchText: 'HELLO', contextBefore: 'lo, ', contextAfter: '', locationType: 'body',
      },
    ]);
  });

  it('is repeatable on an unchanged document', () => {
    const options = { filePath: 'f', caseSensitive: false, contextChars: 10 };
    const first = locateOccurrences(doc, 'hello', { ...options, nextId: counter() });
    const second = locateOccurrences(doc, 'hello', { ...options, nextId: counter() });
    expect(second).toEqual(first);
  });

  it('floors and clamps the context length', () => {
    const [fractional] = locateOccurrences(doc, 'there', {
      filePath: 'f', caseSensitive: true, contextChars: 2.7, nextId: counter(),
    });
    expect(fractional.contextBefore).toBe('o ');

    const [negative] = locateOccurrences(doc, 'there', {
      filePath: 'f', caseSensitive: true, contextChars: -3, nextId: counter(),
    });
    expect(negative.contextBefore).toBe('');
    expect(negative.contextAfter).toBe('');
  });

  it('reports table paragraphs', () => {
    const inTable: FragmentDocument<string> = {
      paragraphs: [{ fragments: [{ text: 'cell value', style: 's' }], location: 'table' }],
    };
    const [occurrence] = locateOccurrences(inTable, 'value', {
      filePath: 'f', caseSensitive: true, contextChars: 0, nextId: counter(),
    });
    expect(occurrence.locationType).toBe('table');
  });

  it('returns nothing for an empty term', () => {
    expect(locateOccurrences(doc, '', { filePath: 'f', caseSensitive: true, contextChars: 5, nextId: counter() })).toEqual([]);
  });
});

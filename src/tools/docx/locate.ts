/**
 * Occurrence locator.
 *
 * Scans each paragraph's flattened text for a plain substring and turns
 * every hit into an Occurrence with a caller-supplied identity. Context
 * windows stay inside the paragraph that holds the match.
 */

import { buildTextIndex } from './text-index.js';
import type { FragmentDocument, LocateOptions, Occurrence } from './types.js';

/**
 * Lower-case text one code point at a time, keeping a code point as is
 * when its lower-case form has a different length. Offsets in the folded
 * string therefore equal offsets in the original.
 */
export function foldCase(text: string): string {
    let out = '';
    for (const ch of text) {
        const lower = ch.toLowerCase();
        out += lower.length === ch.length ? lower : ch;
    }
    return out;
}

/**
 * Left-to-right, non-overlapping scan. Returns [start, end) pairs.
 */
export function findMatches(text: string, term: string, caseSensitive: boolean): Array<[number, number]> {
    if (term.length === 0) return [];

    const haystack = caseSensitive ? text : foldCase(text);
    const needle = caseSensitive ? term : foldCase(term);
    const matches: Array<[number, number]> = [];

    let from = 0;
    while (from <= haystack.length - needle.length) {
        const start = haystack.indexOf(needle, from);
        if (start < 0) break;
        const end = start + needle.length;
        matches.push([start, end]);
        from = end;
    }
    return matches;
}

export function locateOccurrences<S>(
    document: FragmentDocument<S>,
    term: string,
    options: LocateOptions,
): Occurrence[] {
    if (term.length === 0) return [];

    const contextChars = Math.max(0, Math.floor(options.contextChars));
    const index = buildTextIndex(document);
    const occurrences: Occurrence[] = [];

    for (const entry of index.paragraphs) {
        const text = entry.text;
        for (const [start, end] of findMatches(text, term, options.caseSensitive)) {
            occurrences.push({
                id: options.nextId(),
                filePath: options.filePath,
                paragraphIndex: entry.paragraphIndex,
                start,
                end,
                matchText: text.slice(start, end),
                contextBefore: text.slice(Math.max(0, start - contextChars), start),
                contextAfter: text.slice(end, end + contextChars),
                locationType: document.paragraphs[entry.paragraphIndex]?.location ?? 'body',
            });
        }
    }
    return occurrences;
}

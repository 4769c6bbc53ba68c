/**
 * Text index builder.
 *
 * Flattens each paragraph's fragments into one string and records, for
 * every character offset, which fragment (and which offset inside it)
 * produced it. Pure and deterministic: the same model always yields the
 * same index, and any mutation of the model invalidates it.
 */

import type {
    CharPosition,
    FragmentDocument,
    Paragraph,
    ParagraphTextIndex,
    TextIndex,
} from './types.js';

export function buildParagraphIndex<S>(paragraph: Paragraph<S>, paragraphIndex: number): ParagraphTextIndex {
    const fragmentStarts: number[] = [];
    const positions: CharPosition[] = [];
    let text = '';

    paragraph.fragments.forEach((fragment, fragmentIndex) => {
        fragmentStarts.push(text.length);
        // Empty fragments keep a start offset but add no positions.
        for (let offset = 0; offset < fragment.text.length; offset++) {
            positions.push({ paragraphIndex, fragmentIndex, offset });
        }
        text += fragment.text;
    });

    return { paragraphIndex, text, fragmentStarts, positions };
}

export function buildTextIndex<S>(document: FragmentDocument<S>): TextIndex {
    return {
        paragraphs: document.paragraphs.map((p, i) => buildParagraphIndex(p, i)),
    };
}

/** Position of one character of a paragraph's flattened text, if in range. */
export function resolveOffset(
    index: TextIndex,
    paragraphIndex: number,
    offset: number,
): CharPosition | undefined {
    const paragraph = index.paragraphs[paragraphIndex];
    if (!paragraph) return undefined;
    return paragraph.positions[offset];
}

/**
 * Rebuild every paragraph's text by reading each mapped position back out
 * of the fragment model.
 */
export function reconstructText<S>(document: FragmentDocument<S>, index: TextIndex): string[] {
    return index.paragraphs.map((entry) => {
        const paragraph = document.paragraphs[entry.paragraphIndex];
        let out = '';
        for (const pos of entry.positions) {
            out += paragraph?.fragments[pos.fragmentIndex]?.text.charAt(pos.offset) ?? '';
        }
        return out;
    });
}

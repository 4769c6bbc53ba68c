/**
 * Fragment model helpers.
 *
 * The model is plain data: paragraphs own ordered fragment arrays and
 * fragments are addressed by position. Nothing here mutates a document.
 */

import { DocxError, DocxErrorCode } from './errors.js';
import type { FragmentDocument, Paragraph } from './types.js';

/** Logical text of a paragraph: its fragment texts in order. */
export function paragraphText<S>(paragraph: Paragraph<S>): string {
    let out = '';
    for (const fragment of paragraph.fragments) {
        out += fragment.text;
    }
    return out;
}

export function documentTexts<S>(document: FragmentDocument<S>): string[] {
    return document.paragraphs.map((p) => paragraphText(p));
}

export function fragmentTexts<S>(paragraph: Paragraph<S>): string[] {
    return paragraph.fragments.map((f) => f.text);
}

/**
 * Reject a model the container layer should never have produced.
 * Throws FORMAT_ERROR naming the first offending paragraph.
 */
export function assertWellFormed<S>(document: FragmentDocument<S>): void {
    if (!Array.isArray(document.paragraphs)) {
        throw new DocxError('Malformed document: paragraphs is not a list', DocxErrorCode.FORMAT_ERROR);
    }
    document.paragraphs.forEach((paragraph, paragraphIndex) => {
        if (!Array.isArray(paragraph.fragments)) {
            throw new DocxError(
                `Malformed paragraph ${paragraphIndex}: fragments is not a list`,
                DocxErrorCode.FORMAT_ERROR,
                { paragraphIndex },
            );
        }
        paragraph.fragments.forEach((fragment, fragmentIndex) => {
            if (typeof fragment.text !== 'string') {
                throw new DocxError(
                    `Malformed fragment ${fragmentIndex} in paragraph ${paragraphIndex}`,
                    DocxErrorCode.FORMAT_ERROR,
                    { paragraphIndex, fragmentIndex },
                );
            }
        });
    });
}

/**
 * Replacement engine: fragment-splitting replace.
 *
 * Rewrites the smallest run of fragments covering [start, end) of one
 * paragraph. Fragments outside that span keep their text and their style
 * object; fragments split at the span edges hand the same style to both
 * pieces. The engine never removes a fragment, so a paragraph can't end
 * up with zero fragments. A span touching a fixed fragment is refused.
 */

import { paragraphText } from './model.js';
import type { Fragment, FragmentDocument, ReplaceResult, ReplaceTarget } from './types.js';

/**
 * Make sure a fragment boundary sits at `offset` and return the index of
 * the fragment that starts there (fragments.length when offset is the end).
 *
 * With `skipEmpty`, empty fragments sitting exactly at `offset` are passed
 * over so the returned fragment is the one holding the next character.
 */
export function splitAt<S>(fragments: Fragment<S>[], offset: number, skipEmpty: boolean): number {
    let acc = 0;
    for (let i = 0; i < fragments.length; i++) {
        const fragment = fragments[i];
        const len = fragment.text.length;

        if (offset === acc && !(skipEmpty && len === 0)) {
            return i;
        }
        if (offset > acc && offset < acc + len) {
            const cut = offset - acc;
            fragments.splice(
                i,
                1,
                { ...fragment, text: fragment.text.slice(0, cut) },
                { ...fragment, text: fragment.text.slice(cut) },
            );
            return i + 1;
        }
        acc += len;
    }
    return fragments.length;
}

/** First fixed fragment overlapping [start, end), if any. */
function fixedFragmentIn<S>(fragments: Fragment<S>[], start: number, end: number): Fragment<S> | undefined {
    let acc = 0;
    for (const fragment of fragments) {
        const len = fragment.text.length;
        if (fragment.fixed && len > 0 && acc < end && acc + len > start) {
            return fragment;
        }
        acc += len;
    }
    return undefined;
}

export function replaceOccurrence<S>(
    document: FragmentDocument<S>,
    target: ReplaceTarget,
    newText: string,
): ReplaceResult {
    const { paragraphIndex, start, end, matchText } = target;
    const paragraph = document.paragraphs[paragraphIndex];

    if (!paragraph || paragraphIndex < 0) {
        return {
            status: 'failed',
            code: 'OUT_OF_RANGE',
            reason: `Paragraph ${paragraphIndex} does not exist (document has ${document.paragraphs.length})`,
        };
    }

    const text = paragraphText(paragraph);
    if (start < 0 || end > text.length || start >= end) {
        return {
            status: 'failed',
            code: 'OUT_OF_RANGE',
            reason: `Span [${start}, ${end}) is outside paragraph ${paragraphIndex} (length ${text.length})`,
        };
    }

    const live = text.slice(start, end);
    if (live !== matchText) {
        return {
            status: 'failed',
            code: 'STALE_OCCURRENCE',
            reason: `Text at [${start}, ${end}) is now "${live}", expected "${matchText}"`,
        };
    }

    const fragments = paragraph.fragments;
    const fixed = fixedFragmentIn(fragments, start, end);
    if (fixed) {
        return {
            status: 'failed',
            code: 'INVALID_REQUEST',
            reason: `Span [${start}, ${end}) crosses a ${JSON.stringify(fixed.text)} separator that cannot be replaced`,
        };
    }

    const first = splitAt(fragments, start, true);
    const last = splitAt(fragments, end, false);

    fragments[first].text = newText;
    for (let i = first + 1; i < last; i++) {
        fragments[i].text = '';
    }

    return {
        status: 'applied',
        span: {
            paragraphIndex,
            start,
            length: newText.length,
            delta: newText.length - (end - start),
        },
    };
}

/**
 * Type definitions for the fragment model and the reconciliation engine.
 * Single source of truth for every type used across the DOCX module.
 */

// ═══════════════════════════════════════════════════════════════════════
// Fragment model
// ═══════════════════════════════════════════════════════════════════════

/**
 * A contiguous run of characters sharing one style.
 * Identified by its position inside the owning paragraph only.
 */
export interface Fragment<S = unknown> {
    text: string;
    style: S;
    /** Fixed fragments (tabs, line breaks) are matched but never rewritten. */
    fixed?: boolean;
}

export type ParagraphLocation = 'body' | 'table';

export interface Paragraph<S = unknown> {
    fragments: Fragment<S>[];
    location?: ParagraphLocation;
}

export interface FragmentDocument<S = unknown> {
    paragraphs: Paragraph<S>[];
}

// ═══════════════════════════════════════════════════════════════════════
// Text index
// ═══════════════════════════════════════════════════════════════════════

export interface CharPosition {
    paragraphIndex: number;
    fragmentIndex: number;
    offset: number;
}

export interface ParagraphTextIndex {
    paragraphIndex: number;
    text: string;
    /** Start offset of every fragment, empty ones included. */
    fragmentStarts: number[];
    /** One entry per character of `text`. */
    positions: CharPosition[];
}

export interface TextIndex {
    paragraphs: ParagraphTextIndex[];
}

// ═══════════════════════════════════════════════════════════════════════
// Occurrences
// ═══════════════════════════════════════════════════════════════════════

export interface Occurrence {
    id: string;
    filePath: string;
    paragraphIndex: number;
    start: number;
    end: number;
    matchText: string;
    contextBefore: string;
    contextAfter: string;
    locationType: ParagraphLocation;
}

export interface LocateOptions {
    filePath: string;
    caseSensitive: boolean;
    contextChars: number;
    nextId: () => string;
}

// ═══════════════════════════════════════════════════════════════════════
// Replacement
// ═══════════════════════════════════════════════════════════════════════

export interface ReplaceTarget {
    paragraphIndex: number;
    start: number;
    end: number;
    matchText: string;
}

export interface AppliedSpan {
    paragraphIndex: number;
    start: number;
    length: number;
    /** Change in paragraph length caused by the replacement. */
    delta: number;
}

export type ReplaceFailureCode = 'STALE_OCCURRENCE' | 'OUT_OF_RANGE' | 'INVALID_REQUEST';

export type ReplaceResult =
    | { status: 'applied'; span: AppliedSpan }
    | { status: 'failed'; code: ReplaceFailureCode; reason: string };

// ═══════════════════════════════════════════════════════════════════════
// DOCX container
// ═══════════════════════════════════════════════════════════════════════

/**
 * Style payload of a fragment read from word/document.xml.
 * `origin` indexes the <w:t> node the text came from; split pieces share it.
 */
export interface DocxRunStyle {
    readonly origin: number;
    readonly properties: string | null;
}

// ═══════════════════════════════════════════════════════════════════════
// Validation snapshot
// ═══════════════════════════════════════════════════════════════════════

export interface BodySnapshot {
    bodyChildCount: number;
    tableCount: number;
    paragraphCount: number;
    signature: string;
}

/**
 * Invariant validation for DOCX save.
 *
 * Captures a structural snapshot of w:body and compares it before save.
 * Text replacement never adds or removes body children, tables or
 * paragraphs, so every count must match exactly.
 */

import { getBodyChildren, bodySignature, countTables, getAllParagraphs } from './dom.js';
import { DocxError, DocxErrorCode } from './errors.js';
import type { BodySnapshot } from './types.js';

// ─── Capture ─────────────────────────────────────────────────────────

/** Take a snapshot of the body's structural invariants. */
export function captureSnapshot(body: Element): BodySnapshot {
    const children = getBodyChildren(body);
    return {
        bodyChildCount: children.length,
        tableCount: countTables(children),
        paragraphCount: getAllParagraphs(body).length,
        signature: bodySignature(children),
    };
}

// ─── Validate ────────────────────────────────────────────────────────

/**
 * Compare before / after snapshots.
 * Throws a descriptive error if any invariant has been violated,
 * preventing the output file from being written.
 */
export function validateInvariants(before: BodySnapshot, after: BodySnapshot): void {
    const errors: string[] = [];

    if (before.bodyChildCount !== after.bodyChildCount) {
        errors.push(`Body child count changed: ${before.bodyChildCount} -> ${after.bodyChildCount}`);
    }

    if (before.tableCount !== after.tableCount) {
        errors.push(`Table count changed: ${before.tableCount} -> ${after.tableCount}`);
    }

    if (before.paragraphCount !== after.paragraphCount) {
        errors.push(`Paragraph count changed: ${before.paragraphCount} -> ${after.paragraphCount}`);
    }

    if (before.signature !== after.signature) {
        errors.push(`Body signature changed:\n  before: ${before.signature}\n  after:  ${after.signature}`);
    }

    if (errors.length > 0) {
        throw new DocxError(
            'DOCX structural validation failed, output NOT written.\n' + errors.join('\n'),
            DocxErrorCode.FORMAT_ERROR,
        );
    }
}

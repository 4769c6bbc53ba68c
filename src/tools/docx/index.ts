/**
 * Document reconciliation library, public API
 *
 * Re-exports only the symbols that external consumers need.
 * Internal modules (dom, zip, validate) are consumed by sibling files
 * and are NOT part of the public surface.
 *
 * @module docx
 */

// ── Fragment model / text index ─────────────────────────────────────────────
export { paragraphText, documentTexts, fragmentTexts, assertWellFormed } from './model.js';
export { buildTextIndex, buildParagraphIndex, resolveOffset, reconstructText } from './text-index.js';

// ── Search / replace ────────────────────────────────────────────────────────
export { findMatches, foldCase, locateOccurrences } from './locate.js';
export { replaceOccurrence } from './replace.js';

// ── Container ───────────────────────────────────────────────────────────────
export { openDocx, saveDocx, docxContainer } from './container.js';
export type { DocumentContainer, OpenedDocument, DocxDocument } from './container.js';

// ── Types ───────────────────────────────────────────────────────────────────
export type {
  Fragment,
  Paragraph,
  FragmentDocument,
  TextIndex,
  Occurrence,
  ReplaceTarget,
  ReplaceResult,
  AppliedSpan,
  DocxRunStyle,
} from './types.js';

// ── Errors ──────────────────────────────────────────────────────────────────
export { DocxError, DocxErrorCode, isDocxError, errorMessage } from './errors.js';

/**
 * DOM utilities for DOCX XML manipulation.
 *
 * Parsing, navigation and the few element mutations a text replacement
 * needs. No file I/O here; everything works on in-memory DOM nodes
 * parsed with @xmldom/xmldom.
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { DocxError, DocxErrorCode } from './errors.js';

// ═══════════════════════════════════════════════════════════════════════
// XML parse / serialize
// ═══════════════════════════════════════════════════════════════════════

export function parseXml(xmlStr: string): Document {
    const problems: string[] = [];
    const record = (msg: unknown): void => {
        problems.push(String(msg));
    };
    const doc = new DOMParser({
        errorHandler: { error: record, fatalError: record },
    }).parseFromString(xmlStr, 'application/xml');

    if (problems.length > 0 || !doc.documentElement) {
        throw new DocxError(
            `Invalid XML: ${problems[0] ?? 'no document element'}`,
            DocxErrorCode.FORMAT_ERROR,
        );
    }
    return doc;
}

export function serializeXml(node: Node): string {
    return new XMLSerializer().serializeToString(node);
}

// ═══════════════════════════════════════════════════════════════════════
// Generic DOM helpers
// ═══════════════════════════════════════════════════════════════════════

/**
 * Convert any NodeList / HTMLCollection-like object into a real array.
 */
export function nodeListToArray<T extends Node = Node>(
    nl: { length: number; item(index: number): T | null },
): T[] {
    const arr: T[] = [];
    for (let i = 0; i < nl.length; i++) {
        const n = nl.item(i);
        if (n) arr.push(n);
    }
    return arr;
}

function isElement(node: Node): node is Element {
    return node.nodeType === 1;
}

/** Nearest ancestor (excluding the node itself) with the given nodeName. */
export function closestAncestor(node: Node, nodeName: string, stopAt?: Node): Element | null {
    let current = node.parentNode;
    while (current && current !== stopAt) {
        if (isElement(current) && current.nodeName === nodeName) return current;
        current = current.parentNode;
    }
    return null;
}

/** Find the first direct child element with the given nodeName. */
export function findDirectChild(parent: Element, nodeName: string): Element | null {
    for (const child of nodeListToArray(parent.childNodes)) {
        if (isElement(child) && child.nodeName === nodeName) {
            return child;
        }
    }
    return null;
}

// ═══════════════════════════════════════════════════════════════════════
// Body access
// ═══════════════════════════════════════════════════════════════════════

/** Return the single <w:body> element from a parsed document.xml DOM. */
export function getBody(doc: Document): Element {
    const body = doc.getElementsByTagName('w:body').item(0);
    if (!body) {
        throw new DocxError('Invalid DOCX DOM: missing <w:body>', DocxErrorCode.FORMAT_ERROR);
    }
    return body;
}

/**
 * Return ALL direct element children of w:body **in document order**.
 * Includes w:p, w:tbl, w:sdt, w:sectPr, etc.
 */
export function getBodyChildren(body: Element): Element[] {
    return nodeListToArray(body.childNodes).filter(isElement);
}

/**
 * Build a compact signature string from the body children array.
 * Maps each node's qualified name to a short local name:
 *   w:p -> p, w:tbl -> tbl, w:sdt -> sdt, w:sectPr -> sectPr
 * Returns e.g. "p,tbl,p,p,sectPr".
 */
export function bodySignature(children: Element[]): string {
    return children
        .map((ch) => {
            const name = ch.nodeName;
            const idx = name.indexOf(':');
            return idx >= 0 ? name.substring(idx + 1) : name;
        })
        .join(',');
}

/** Count direct w:tbl children of body. */
export function countTables(children: Element[]): number {
    return children.filter((ch) => ch.nodeName === 'w:tbl').length;
}

// ═══════════════════════════════════════════════════════════════════════
// Paragraphs and text nodes
// ═══════════════════════════════════════════════════════════════════════

/**
 * Every <w:p> under the body in document order, including paragraphs in
 * table cells, content controls and text boxes.
 */
export function getAllParagraphs(body: Element): Element[] {
    return nodeListToArray(body.getElementsByTagName('w:p'));
}

/** Run-level elements that read as a character without holding a <w:t>. */
const SEPARATOR_TEXT: Record<string, string> = {
    'w:tab': '\t',
    'w:br': '\n',
    'w:cr': '\n',
};

/** Text a separator element stands for, or null for anything else. */
export function separatorText(el: Element): string | null {
    return SEPARATOR_TEXT[el.nodeName] ?? null;
}

/**
 * The <w:t> nodes and run separators (tab, line break) that belong to this
 * paragraph, in document order. A text box nested in one of its runs holds
 * its own paragraphs, so nested <w:p> subtrees are skipped. Tab stops under
 * <w:pPr> are not run content and are left out too.
 */
export function getParagraphContentNodes(p: Element): Element[] {
    const out: Element[] = [];
    const walk = (parent: Element): void => {
        for (const child of nodeListToArray(parent.childNodes)) {
            if (!isElement(child) || child.nodeName === 'w:p') continue;
            if (child.nodeName === 'w:t') {
                out.push(child);
            } else if (separatorText(child) !== null) {
                if (child.parentNode?.nodeName === 'w:r') out.push(child);
            } else {
                walk(child);
            }
        }
    };
    walk(p);
    return out;
}

export function isInTableCell(p: Element, body: Element): boolean {
    return closestAncestor(p, 'w:tc', body) !== null;
}

/** Serialised w:rPr of the run that owns a <w:t>, or null when unstyled. */
export function getRunProperties(t: Element): string | null {
    const run = closestAncestor(t, 'w:r');
    if (!run) return null;
    const rPr = findDirectChild(run, 'w:rPr');
    return rPr ? serializeXml(rPr) : null;
}

// ═══════════════════════════════════════════════════════════════════════
// Minimal text replacement
// ═══════════════════════════════════════════════════════════════════════

/**
 * Set the text of one <w:t>, keeping the element and its run.
 * Sets xml:space="preserve" so leading/trailing spaces survive.
 */
export function setTextNodeContent(t: Element, text: string): void {
    t.textContent = text;
    if (text !== text.trim()) {
        t.setAttribute('xml:space', 'preserve');
    }
}

/**
 * Remove the run holding an emptied <w:t> when the run carries nothing
 * else (only w:rPr) and the paragraph keeps at least one other run.
 * Returns true when the run was removed.
 */
export function removeEmptiedRun(t: Element, p: Element): boolean {
    const run = closestAncestor(t, 'w:r', p);
    if (!run || !run.parentNode) return false;

    const content = nodeListToArray(run.childNodes)
        .filter(isElement)
        .filter((child) => child.nodeName !== 'w:rPr');
    if (content.length !== 1 || content[0] !== t) return false;

    const otherRuns = nodeListToArray(p.getElementsByTagName('w:r')).filter((r) => r !== run);
    if (otherRuns.length === 0) return false;

    run.parentNode.removeChild(run);
    return true;
}

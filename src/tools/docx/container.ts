/**
 * DOCX container: word/document.xml to and from the fragment model.
 *
 * open:  zip, DOM, then one model paragraph per <w:p>, one fragment per
 *        <w:t>, <w:tab/>, <w:br/> or <w:cr/>
 * save:  model texts into <w:t> nodes, validated DOM, zip on disk
 *
 * Fragments remember the node they came from (`style.origin`). Pieces
 * split off one node share its style, so on save their texts are simply
 * joined back into that node and the run keeps its formatting. Tabs and
 * breaks become fixed fragments holding "\t" or "\n": searches see them,
 * replacements can't touch them.
 */

import type PizZip from 'pizzip';
import { loadDocxZip, getDocumentXml, saveDocxZip } from './zip.js';
import {
    parseXml,
    serializeXml,
    getBody,
    getAllParagraphs,
    getParagraphContentNodes,
    getRunProperties,
    separatorText,
    isInTableCell,
    setTextNodeContent,
    removeEmptiedRun,
} from './dom.js';
import { captureSnapshot, validateInvariants } from './validate.js';
import { assertWellFormed } from './model.js';
import { DocxError, DocxErrorCode, withErrorContext } from './errors.js';
import type { BodySnapshot, DocxRunStyle, Fragment, FragmentDocument, Paragraph } from './types.js';

// ═══════════════════════════════════════════════════════════════════════
// Container contract
// ═══════════════════════════════════════════════════════════════════════

export interface OpenedDocument<S = unknown> {
    readonly filePath: string;
    readonly model: FragmentDocument<S>;
}

export interface DocumentContainer<D extends OpenedDocument = OpenedDocument> {
    open(filePath: string): Promise<D>;
    save(document: D, outputPath?: string): Promise<void>;
}

// ═══════════════════════════════════════════════════════════════════════
// DOCX implementation
// ═══════════════════════════════════════════════════════════════════════

export interface TextOrigin {
    node: Element;
    paragraph: Element;
    text: string;
    /** Tab or break element; its text is fixed. */
    separator: boolean;
}

export interface DocxDocument extends OpenedDocument<DocxRunStyle> {
    readonly zip: PizZip;
    readonly dom: Document;
    readonly body: Element;
    readonly origins: TextOrigin[];
    readonly snapshot: BodySnapshot;
}

export async function openDocx(filePath: string): Promise<DocxDocument> {
    const zip = await loadDocxZip(filePath);
    return withErrorContext(
        async () => {
            const dom = parseXml(getDocumentXml(zip));
            const body = getBody(dom);
            const origins: TextOrigin[] = [];
            const paragraphs: Paragraph<DocxRunStyle>[] = [];

            for (const p of getAllParagraphs(body)) {
                const fragments = getParagraphContentNodes(p).map((node): Fragment<DocxRunStyle> => {
                    const fixedText = separatorText(node);
                    const text = fixedText ?? node.textContent ?? '';
                    const style: DocxRunStyle = { origin: origins.length, properties: getRunProperties(node) };
                    origins.push({ node, paragraph: p, text, separator: fixedText !== null });
                    return fixedText === null ? { text, style } : { text, style, fixed: true };
                });
                paragraphs.push({ fragments, location: isInTableCell(p, body) ? 'table' : 'body' });
            }

            const model: FragmentDocument<DocxRunStyle> = { paragraphs };
            assertWellFormed(model);
            return {
                filePath,
                model,
                zip,
                dom,
                body,
                origins,
                snapshot: captureSnapshot(body),
            };
        },
        DocxErrorCode.FORMAT_ERROR,
        { filePath },
    );
}

/**
 * Write the model back into its <w:t> nodes and save the archive.
 * Returns the number of text nodes whose content changed. A model whose
 * tab or break text changed is refused with FORMAT_ERROR before anything
 * is touched.
 */
export async function saveDocx(document: DocxDocument, outputPath: string = document.filePath): Promise<number> {
    const merged = new Map<number, string>();
    for (const paragraph of document.model.paragraphs) {
        for (const fragment of paragraph.fragments) {
            const origin = fragment.style.origin;
            merged.set(origin, (merged.get(origin) ?? '') + fragment.text);
        }
    }

    merged.forEach((text, index) => {
        const origin = document.origins[index];
        if (origin?.separator && origin.text !== text) {
            throw new DocxError(
                `Refusing to save ${document.filePath}: a ${origin.node.nodeName} separator was rewritten`,
                DocxErrorCode.FORMAT_ERROR,
                { filePath: document.filePath, origin: index },
            );
        }
    });

    let changed = 0;
    merged.forEach((text, index) => {
        const origin = document.origins[index];
        if (!origin || origin.separator || origin.text === text) return;
        setTextNodeContent(origin.node, text);
        if (text === '') {
            removeEmptiedRun(origin.node, origin.paragraph);
        }
        origin.text = text;
        changed++;
    });

    validateInvariants(document.snapshot, captureSnapshot(document.body));
    await saveDocxZip(document.zip, serializeXml(document.dom), outputPath);
    return changed;
}

export const docxContainer: DocumentContainer<DocxDocument> = {
    open: openDocx,
    save: async (document, outputPath) => {
        await saveDocx(document, outputPath);
    },
};

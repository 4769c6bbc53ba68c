/**
 * DOCX ZIP I/O: file to zip to document.xml and back.
 */

import fs from 'fs/promises';
import PizZip from 'pizzip';
import { DocxError, DocxErrorCode, errorMessage, withErrorContext } from './errors.js';

/**
 * Read a .docx file from disk and return a PizZip instance.
 * IO_ERROR when the file can't be read, FORMAT_ERROR when it isn't a zip.
 */
export async function loadDocxZip(filePath: string): Promise<PizZip> {
    const buf = await withErrorContext(() => fs.readFile(filePath), DocxErrorCode.IO_ERROR, { filePath });
    try {
        return new PizZip(buf);
    } catch (error) {
        throw new DocxError(`Not a DOCX archive: ${errorMessage(error)}`, DocxErrorCode.FORMAT_ERROR, { filePath });
    }
}

/**
 * Extract the raw XML string from word/document.xml inside the zip.
 * Throws if the entry is missing.
 */
export function getDocumentXml(zip: PizZip): string {
    const entry = zip.file('word/document.xml');
    if (!entry) {
        throw new DocxError('Invalid DOCX: missing word/document.xml', DocxErrorCode.FORMAT_ERROR);
    }
    return entry.asText();
}

/**
 * Replace word/document.xml in the zip with new XML,
 * then write the whole archive to outputPath.
 */
export async function saveDocxZip(
    zip: PizZip,
    newDocumentXml: string,
    outputPath: string,
): Promise<void> {
    zip.file('word/document.xml', newDocumentXml);
    const buf = zip.generate({ type: 'nodebuffer', compression: 'DEFLATE' });
    await withErrorContext(() => fs.writeFile(outputPath, buf), DocxErrorCode.IO_ERROR, { outputPath });
}

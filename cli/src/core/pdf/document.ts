/**
 * PDF page store backed by pdf-lib (pure JS, no system dependencies).
 *
 * Sources are loaded once and only read from; each chapter is a fresh
 * document holding copies of the source pages.
 */

import { readFileSync } from 'node:fs';
import { basename } from 'node:path';
import { EncryptedPDFError, PDFDocument } from 'pdf-lib';
import { CorruptDocumentError } from './errors.js';

/**
 * Open a PDF for reading.
 *
 * Read errors (missing file, permissions) propagate as-is; anything pdf-lib
 * rejects becomes a CorruptDocumentError.
 */
export async function openPdf(filePath: string): Promise<PDFDocument> {
  const bytes = readFileSync(filePath);

  try {
    const doc = await PDFDocument.load(new Uint8Array(bytes), { updateMetadata: false });
    // load() accepts a file with no catalog; walking the page tree does not.
    doc.getPageCount();
    return doc;
  } catch (err) {
    if (err instanceof EncryptedPDFError) {
      throw new CorruptDocumentError(`"${basename(filePath)}" is encrypted — decrypt it first`, { cause: err });
    }
    const msg = err instanceof Error ? err.message : String(err);
    throw new CorruptDocumentError(`Failed to parse "${basename(filePath)}" as PDF: ${msg}`, { cause: err });
  }
}

/** Page count of a PDF file. */
export async function getPageCount(filePath: string): Promise<number> {
  const doc = await openPdf(filePath);
  return doc.getPageCount();
}

/** 0-based indices for 1-based inclusive pages; empty when `end < start`. */
export function pageIndices(start: number, end: number): number[] {
  const indices: number[] = [];
  for (let page = start; page <= end; page++) {
    indices.push(page - 1);
  }
  return indices;
}

/**
 * Copy pages `start`..`end` (1-based, inclusive) of `source` into a new PDF.
 *
 * Metadata dates are not stamped, so the same input always saves to the same bytes.
 */
export async function extractPages(source: PDFDocument, start: number, end: number): Promise<Uint8Array> {
  const output = await PDFDocument.create({ updateMetadata: false });
  const copiedPages = await output.copyPages(source, pageIndices(start, end));
  copiedPages.forEach((page) => output.addPage(page));
  return output.save();
}

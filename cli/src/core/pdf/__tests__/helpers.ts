import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PDFDocument } from 'pdf-lib';

/** Base page width; page N of a fixture is `PAGE_WIDTH + N` points wide. */
export const PAGE_WIDTH = 100;

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'chapterize-test-'));
}

/** Write a PDF whose page widths identify each page by its 1-based number. */
export async function writeFixturePdf(filePath: string, pageCount: number): Promise<void> {
  const doc = await PDFDocument.create();
  for (let page = 1; page <= pageCount; page++) {
    doc.addPage([PAGE_WIDTH + page, 200]);
  }
  writeFileSync(filePath, await doc.save());
}

/** Source page numbers held by a written PDF, recovered from page widths. */
export async function readPageNumbers(filePath: string): Promise<number[]> {
  const doc = await PDFDocument.load(new Uint8Array(readFileSync(filePath)));
  return doc.getPages().map((page) => Math.round(page.getWidth()) - PAGE_WIDTH);
}

// src/core/extract/pdf-links.ts
import { readFile } from 'node:fs/promises';
import { PDFDict, PDFDocument, PDFHexString, PDFName, PDFString } from 'pdf-lib';
import { ArchiveError, ErrorCode } from '../errors.js';

const SUBTYPE = PDFName.of('Subtype');
const LINK = PDFName.of('Link');
const ACTION = PDFName.of('A');
const URI = PDFName.of('URI');

export async function openPdf(bytes: Uint8Array, source: string = '<buffer>'): Promise<PDFDocument> {
  try {
    return await PDFDocument.load(bytes, { ignoreEncryption: true, updateMetadata: false });
  } catch (error) {
    throw new ArchiveError(
      ErrorCode.PDF_LOAD_FAILED,
      `Error loading PDF file: ${source}: ${error instanceof Error ? error.message : String(error)}`,
      false,
      'Check that the file is a valid PDF',
      { source },
      error
    );
  }
}

function linkTarget(annotation: PDFDict): string | undefined {
  if (annotation.get(SUBTYPE) !== LINK) return undefined;

  const action = annotation.lookup(ACTION);
  if (!(action instanceof PDFDict)) return undefined;

  const uri = action.lookup(URI);
  if (uri instanceof PDFString || uri instanceof PDFHexString) {
    return uri.decodeText().trim();
  }
  return undefined;
}

/**
 * Yields the URI target of every link annotation, page by page.
 * Each distinct URI is yielded once.
 */
export function* iteratePdfLinks(doc: PDFDocument): Generator<string> {
  const seen = new Set<string>();

  for (const page of doc.getPages()) {
    const annotations = page.node.Annots();
    if (!annotations) continue;

    for (let i = 0; i < annotations.size(); i++) {
      const annotation = annotations.lookup(i);
      if (!(annotation instanceof PDFDict)) continue;

      const target = linkTarget(annotation);
      if (target && !seen.has(target)) {
        seen.add(target);
        yield target;
      }
    }
  }
}

export async function readPdfLinks(bytes: Uint8Array, source?: string): Promise<Generator<string>> {
  const doc = await openPdf(bytes, source);
  return iteratePdfLinks(doc);
}

export async function loadPdfLinks(filePath: string): Promise<Generator<string>> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(filePath);
  } catch (error) {
    throw new ArchiveError(
      ErrorCode.PDF_LOAD_FAILED,
      `Error loading PDF file: ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      false,
      'Check the file path',
      { source: filePath },
      error
    );
  }
  return readPdfLinks(bytes, filePath);
}

// src/core/extract/__tests__/pdf-links.test.ts
import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PDFDocument, PDFHexString, PDFName, PDFString, type PDFObject } from 'pdf-lib';
import { iteratePdfLinks, loadPdfLinks, readPdfLinks } from '../pdf-links.js';
import { ArchiveError, ErrorCode } from '../../errors.js';

type Annotation =
  | { kind: 'uri'; uri: string; hex?: boolean; inline?: boolean }
  | { kind: 'goto' }
  | { kind: 'text' };

async function buildPdf(pages: Annotation[][]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const { context } = doc;

  for (const annotations of pages) {
    const page = doc.addPage([200, 200]);
    for (const annotation of annotations) {
      let action: PDFObject | undefined;
      if (annotation.kind === 'uri') {
        const uri = annotation.hex ? PDFHexString.fromText(annotation.uri) : PDFString.of(annotation.uri);
        const uriAction = context.obj({ Type: 'Action', S: 'URI', URI: uri });
        action = annotation.inline ? uriAction : context.register(uriAction);
      } else if (annotation.kind === 'goto') {
        action = context.register(context.obj({ Type: 'Action', S: 'GoTo', D: [0, 'Fit'] }));
      }

      const dict = context.obj({
        Type: 'Annot',
        Subtype: annotation.kind === 'text' ? 'Text' : 'Link',
        Rect: [0, 0, 100, 20],
      });
      if (action) {
        dict.set(PDFName.of('A'), action);
      }
      page.node.addAnnot(context.register(dict));
    }
  }

  return doc.save();
}

async function linksOf(bytes: Uint8Array): Promise<string[]> {
  return [...(await readPdfLinks(bytes))];
}

describe('readPdfLinks', () => {
  it('returns the URI of each link annotation in page order', async () => {
    const bytes = await buildPdf([
      [{ kind: 'uri', uri: 'https://example.com/one' }, { kind: 'uri', uri: 'https://example.org/two' }],
      [{ kind: 'uri', uri: 'http://example.net/three' }],
    ]);

    expect(await linksOf(bytes)).toEqual([
      'https://example.com/one',
      'https://example.org/two',
      'http://example.net/three',
    ]);
  });

  it('yields a repeated URI once', async () => {
    const bytes = await buildPdf([
      [{ kind: 'uri', uri: 'https://example.com/one' }],
      [{ kind: 'uri', uri: 'https://example.com/one' }, { kind: 'uri', uri: 'https://example.com/two' }],
    ]);

    expect(await linksOf(bytes)).toEqual(['https://example.com/one', 'https://example.com/two']);
  });

  it('reads inline actions and hex-encoded URIs', async () => {
    const bytes = await buildPdf([
      [
        { kind: 'uri', uri: 'https://example.com/inline', inline: true },
        { kind: 'uri', uri: 'https://example.com/hex', hex: true },
      ],
    ]);

    expect(await linksOf(bytes)).toEqual(['https://example.com/inline', 'https://example.com/hex']);
  });

  it('ignores internal links and non-link annotations', async () => {
    const bytes = await buildPdf([
      [{ kind: 'goto' }, { kind: 'text' }, { kind: 'uri', uri: 'https://example.com/only' }],
    ]);

    expect(await linksOf(bytes)).toEqual(['https://example.com/only']);
  });

  it('returns nothing for a PDF without annotations', async () => {
    const bytes = await buildPdf([[], []]);

    expect(await linksOf(bytes)).toEqual([]);
  });

  it('produces links lazily', async () => {
    const doc = await PDFDocument.load(
      await buildPdf([[{ kind: 'uri', uri: 'https://example.com/1' }], [{ kind: 'uri', uri: 'https://example.com/2' }]])
    );
    const links = iteratePdfLinks(doc);

    expect(links.next()).toEqual({ value: 'https://example.com/1', done: false });
    expect(links.next()).toEqual({ value: 'https://example.com/2', done: false });
    expect(links.next().done).toBe(true);
  });

  it('rejects bytes that are not a PDF', async () => {
    const promise = readPdfLinks(new TextEncoder().encode('definitely not a pdf'), 'notes.txt');

    await expect(promise).rejects.toBeInstanceOf(ArchiveError);
    await expect(promise).rejects.toMatchObject({ code: ErrorCode.PDF_LOAD_FAILED });
  });
});

describe('loadPdfLinks', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pdf-links-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads links from a file on disk', async () => {
    const file = join(dir, 'paper.pdf');
    await writeFile(file, await buildPdf([[{ kind: 'uri', uri: 'https://example.com/cited' }]]));

    expect([...(await loadPdfLinks(file))]).toEqual(['https://example.com/cited']);
  });

  it('fails with PDF_LOAD_FAILED for a missing file', async () => {
    const file = join(dir, 'missing.pdf');

    await expect(loadPdfLinks(file)).rejects.toMatchObject({
      code: ErrorCode.PDF_LOAD_FAILED,
      context: { source: file },
    });
  });
});

/**
 * src/services/parser.ts
 * What: PDF parsing adapter producing per-page text blocks and embedded images.
 * How: Opens the buffer with mupdf (WASM, loaded lazily on first use), extracts each page's structured text and
 *      walks its image blocks, re-encoding every image as PNG. Pages are numbered from 1.
 *      Throws PdfParseError for buffers that are not PDFs or that mupdf cannot open.
 */

import type { DocumentParser, ParsedDocument, ParsedImage, TextBlock } from '../models/types.js';

const PDF_MAGIC = '%PDF-';

export class PdfParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PdfParseError';
  }
}

export interface MupdfParserOptions {
  /** Images smaller than this on either side (in pixels) are skipped as decoration. */
  minImageSide?: number;
}

export class MupdfDocumentParser implements DocumentParser {
  private readonly minImageSide: number;

  constructor(options: MupdfParserOptions = {}) {
    this.minImageSide = options.minImageSide ?? 32;
  }

  async parse(bytes: Buffer): Promise<ParsedDocument> {
    if (bytes.subarray(0, PDF_MAGIC.length).toString('latin1') !== PDF_MAGIC) {
      throw new PdfParseError('Not a PDF document');
    }

    // Dynamic import for ESM/WASM package
    const mupdf = await import('mupdf');

    let doc: InstanceType<typeof mupdf.Document>;
    try {
      doc = mupdf.Document.openDocument(bytes, 'application/pdf');
    } catch (err) {
      throw new PdfParseError('mupdf could not open the document', { cause: err });
    }

    const textBlocks: TextBlock[] = [];
    const images: ParsedImage[] = [];
    const minSide = this.minImageSide;
    // mupdf objects live in WASM memory; free each page's as soon as it is read.
    try {
      const pageCount = doc.countPages();
      for (let i = 0; i < pageCount; i++) {
        const pageNumber = i + 1;
        const page = doc.loadPage(i);
        try {
          const stext = page.toStructuredText('preserve-whitespace,preserve-images');
          try {
            const text = stext.asText();
            if (text.trim().length > 0) textBlocks.push({ page: pageNumber, text });

            let ordinal = 0;
            stext.walk({
              onImageBlock(_bbox, _transform, image) {
                if (image.getWidth() < minSide || image.getHeight() < minSide) return;
                const pixmap = image.toPixmap();
                try {
                  const png = pixmap.asPNG();
                  images.push({ page: pageNumber, ordinal: ordinal++, mimeType: 'image/png', data: Buffer.from(png) });
                } finally {
                  pixmap.destroy();
                }
              },
            });
          } finally {
            stext.destroy();
          }
        } finally {
          page.destroy();
        }
      }
    } finally {
      doc.destroy();
    }

    return { textBlocks, images };
  }
}

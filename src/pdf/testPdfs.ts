import { PDFDocument, PDFName, StandardFonts, type PDFFont, type PDFPage } from 'pdf-lib';

import { PageEditor } from './pageEditor.js';

export type TextDrawing = { text: string; x: number; y: number; size: number };

/** Builds a PDF with one page per entry, each holding the given Helvetica text lines. */
export async function buildTextPdf(pages: TextDrawing[][]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);

  for (const drawings of pages) {
    const page = doc.addPage([600, 800]);
    for (const drawing of drawings) {
      page.drawText(drawing.text, { x: drawing.x, y: drawing.y, size: drawing.size, font });
    }
  }

  return doc.save();
}

/** Builds a one-page PDF whose content stream is `content` verbatim, with Helvetica as /F1. */
export async function buildRawContentPdf(
  content: string,
  setup?: (doc: PDFDocument, page: PDFPage, helvetica: PDFFont) => void,
): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const page = doc.addPage([600, 800]);
  const helvetica = await doc.embedFont(StandardFonts.Helvetica);
  page.node.setFontDictionary(PDFName.of('F1'), helvetica.ref);
  setup?.(doc, page, helvetica);
  page.node.set(PDFName.of('Contents'), doc.context.register(doc.context.flateStream(content)));
  return doc.save();
}

export async function openFirstPage(bytes: Uint8Array): Promise<{ doc: PDFDocument; editor: PageEditor }> {
  const doc = await PDFDocument.load(bytes);
  return { doc, editor: PageEditor.open(doc, doc.getPage(0)) };
}

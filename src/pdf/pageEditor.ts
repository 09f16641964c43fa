import {
  PDFName,
  PDFRef,
  PDFStream,
  StandardFonts,
  type PDFDict,
  type PDFDocument,
  type PDFFont,
  type PDFObject,
  type PDFPage,
} from 'pdf-lib';

import {
  concatBytes,
  encodeAscii,
  formatNumber,
  parseContentStream,
  toHexString,
} from './contentStream.js';
import { IDENTITY, rectContains, type Matrix, type Point, type Rect } from './geometry.js';
import { createFontResolver } from './pageFonts.js';
import { arrayItems, arrayOf, decodeStreamBytes, dictOf, lookupKey, nameOf, numberOf } from './pdfObjects.js';
import {
  PAGE_SOURCE,
  glyphsOf,
  readTextRuns,
  type PlacedGlyph,
  type TextRun,
  type TextScope,
} from './pageText.js';
import { searchRuns, type Occurrence } from './textSearch.js';

export type Rgb = [number, number, number];

export type InsertTextOptions = {
  font: StandardFonts;
  fontSize: number;
  color: Rgb;
};

const WHITE: Rgb = [1, 1, 1];

type Splice = { start: number; end: number; bytes: Uint8Array };

/** Working copy of a form XObject's content. */
type FormStream = {
  ref: PDFRef;
  dict: PDFDict;
  matrix: Matrix;
  resources: PDFDict | undefined;
  content: Uint8Array;
  changed: boolean;
};

/** Pieces of one run to drop, gathered over every place its stream is drawn. */
type RunEdit = { run: TextRun; remove: Set<number> };

// Entries describing the old encoding; the rewritten stream gets its own.
const STREAM_ENCODING_KEYS = new Set(['Filter', 'DecodeParms', 'Length']);

const UNENCODABLE = '?';

function readPageContent(page: PDFPage): Uint8Array {
  const contents = lookupKey(page.node, 'Contents');
  if (contents === undefined) return new Uint8Array(0);

  const array = arrayOf(contents);
  if (!array) return decodeStreamBytes(contents);

  // Streams of one page are a single content stream split at token boundaries.
  const separator = encodeAscii('\n');
  return concatBytes(
    arrayItems(array).flatMap((stream, index) =>
      index === 0 ? [decodeStreamBytes(stream)] : [separator, decodeStreamBytes(stream)],
    ),
  );
}

function readFormMatrix(dict: PDFDict): Matrix {
  const values = arrayItems(arrayOf(lookupKey(dict, 'Matrix'))).map(numberOf);
  if (values.length !== 6 || !values.every((value): value is number => value !== undefined)) {
    return IDENTITY;
  }
  return [values[0], values[1], values[2], values[3], values[4], values[5]];
}

function colorOperator(color: Rgb): string {
  return `${color.map(formatNumber).join(' ')} rg`;
}

function rewriteRun({ run, remove }: RunEdit): string {
  const items: (string | number)[] = [];
  let pending: number[] = [];

  const flush = () => {
    if (pending.length === 0) return;
    items.push(toHexString(Uint8Array.from(pending)));
    pending = [];
  };
  const adjust = (amount: number) => {
    const last = items[items.length - 1];
    if (typeof last === 'number') {
      items[items.length - 1] = last + amount;
    } else {
      items.push(amount);
    }
  };

  run.pieces.forEach((piece, index) => {
    if (piece.kind === 'adjust') {
      flush();
      adjust(piece.amount);
      return;
    }
    if (piece.removal !== null && remove.has(index)) {
      flush();
      adjust(piece.removal);
      return;
    }
    pending.push(...piece.glyph.bytes);
  });
  flush();

  const array = items.map((item) => (typeof item === 'number' ? formatNumber(item) : item)).join(' ');
  const prefix = run.preamble ? `${run.preamble} ` : '';
  return `${prefix}[${array}] TJ`;
}

function applySplices(content: Uint8Array, splices: Splice[]): Uint8Array {
  const parts: Uint8Array[] = [];
  let cursor = 0;
  for (const splice of [...splices].sort((a, b) => a.start - b.start)) {
    parts.push(content.subarray(cursor, splice.start), splice.bytes);
    cursor = splice.end;
  }
  parts.push(content.subarray(cursor));
  return concatBytes(parts);
}

/**
 * Decoded content of one page plus the edits the substitution needs. Text drawn through
 * form XObjects is read and redacted in the form's own stream. Each read re-parses the
 * current content, so a search always sees earlier redactions and insertions.
 * Changes reach the document only through {@link PageEditor.commit}.
 */
export class PageEditor {
  private content: Uint8Array;
  private changed = false;
  private isolated = false;
  private readonly forms = new Map<string, FormStream | null>();
  private readonly fonts = new Map<StandardFonts, { font: PDFFont; key: PDFName }>();

  private constructor(
    private readonly doc: PDFDocument,
    private readonly page: PDFPage,
  ) {
    this.content = readPageContent(page);
  }

  static open(doc: PDFDocument, page: PDFPage): PageEditor {
    return new PageEditor(doc, page);
  }

  get contentBytes(): Uint8Array {
    return this.content;
  }

  textRuns(): TextRun[] {
    return readTextRuns(parseContentStream(this.content), this.scopeFor(this.page.node.Resources()));
  }

  glyphs(): PlacedGlyph[] {
    return glyphsOf(this.textRuns());
  }

  search(needle: string): Occurrence[] {
    return searchRuns(this.textRuns(), needle);
  }

  /**
   * Removes every glyph whose centre lies inside `rect`, leaving the remaining glyphs where
   * they were, then paints the rectangle. Returns the number of glyphs removed. A form drawn
   * more than once shares one stream, so a glyph removed from it disappears everywhere the
   * form is drawn.
   */
  redact(rect: Rect, fill: Rgb = WHITE): number {
    const edits = new Map<string, RunEdit>();
    let removed = 0;

    for (const run of this.textRuns()) {
      run.pieces.forEach((piece, index) => {
        if (piece.kind !== 'glyph' || piece.removal === null || !rectContains(rect, piece.glyph.center)) {
          return;
        }
        const key = `${run.source}:${run.operation.start}`;
        const edit = edits.get(key) ?? { run, remove: new Set<number>() };
        edits.set(key, edit);
        if (!edit.remove.has(index)) removed += 1;
        edit.remove.add(index);
      });
    }

    const splices = new Map<string, Splice[]>();
    for (const edit of edits.values()) {
      const list = splices.get(edit.run.source) ?? [];
      list.push({
        start: edit.run.operation.start,
        end: edit.run.operation.end,
        bytes: encodeAscii(rewriteRun(edit)),
      });
      splices.set(edit.run.source, list);
    }

    for (const [source, list] of splices) {
      if (source === PAGE_SOURCE) {
        this.content = applySplices(this.content, list);
        continue;
      }
      const form = this.forms.get(source);
      if (!form) continue;
      form.content = applySplices(form.content, list);
      form.changed = true;
    }

    this.append(
      [
        'q',
        colorOperator(fill),
        `${formatNumber(rect.x0)} ${formatNumber(rect.y0)} ${formatNumber(rect.x1 - rect.x0)} ${formatNumber(rect.y1 - rect.y0)} re`,
        'f',
        'Q',
      ].join('\n'),
    );
    return removed;
  }

  /**
   * Draws `text` with its baseline starting at `origin`. Characters the font cannot encode
   * are drawn as `?`. Returns the text actually drawn.
   */
  async insertText(text: string, origin: Point, options: InsertTextOptions): Promise<string> {
    const { font, key } = await this.standardFont(options.font);
    const supported = new Set(font.getCharacterSet());
    const drawable = Array.from(text, (char) =>
      supported.has(char.codePointAt(0) ?? -1) ? char : UNENCODABLE,
    ).join('');
    const encoded = font.encodeText(drawable).toString();

    this.append(
      [
        'q',
        'BT',
        colorOperator(options.color),
        `${key.toString()} ${formatNumber(options.fontSize)} Tf`,
        `1 0 0 1 ${formatNumber(origin.x)} ${formatNumber(origin.y)} Tm`,
        `${encoded} Tj`,
        'ET',
        'Q',
      ].join('\n'),
    );
    return drawable;
  }

  /**
   * Writes the edited content back: the page's as its only content stream, and each
   * edited form's in place of the original. Returns whether anything changed.
   */
  commit(): boolean {
    let committed = false;

    for (const form of this.forms.values()) {
      if (!form?.changed) continue;
      const dict: Record<string, PDFObject> = {};
      for (const [name, value] of form.dict.entries()) {
        const key = name.decodeText();
        if (!STREAM_ENCODING_KEYS.has(key)) dict[key] = value;
      }
      this.doc.context.assign(form.ref, this.doc.context.flateStream(form.content, dict));
      form.changed = false;
      committed = true;
    }

    if (this.changed) {
      const stream = this.doc.context.flateStream(this.content);
      this.page.node.set(PDFName.of('Contents'), this.doc.context.register(stream));
      committed = true;
    }
    return committed;
  }

  private scopeFor(resources: PDFDict | undefined): TextScope {
    const xobjects = dictOf(lookupKey(resources, 'XObject'));

    const scope: TextScope = {
      resolveFont: createFontResolver(resources),
      resolveForm: (name) => {
        const ref = xobjects?.get(PDFName.of(name));
        if (!(ref instanceof PDFRef)) return undefined;
        const form = this.formAt(ref);
        if (!form) return undefined;
        return {
          source: ref.toString(),
          operations: parseContentStream(form.content),
          matrix: form.matrix,
          // A form without its own resources uses the ones it is drawn with.
          scope: form.resources ? this.scopeFor(form.resources) : scope,
        };
      },
    };
    return scope;
  }

  private formAt(ref: PDFRef): FormStream | undefined {
    const source = ref.toString();
    const cached = this.forms.get(source);
    if (cached !== undefined) return cached ?? undefined;

    const stream = this.doc.context.lookup(ref);
    let form: FormStream | null = null;
    if (stream instanceof PDFStream && nameOf(lookupKey(stream.dict, 'Subtype')) === 'Form') {
      form = {
        ref,
        dict: stream.dict,
        matrix: readFormMatrix(stream.dict),
        resources: dictOf(lookupKey(stream.dict, 'Resources')),
        content: decodeStreamBytes(stream),
        changed: false,
      };
    }
    this.forms.set(source, form);
    return form ?? undefined;
  }

  private append(source: string): void {
    if (!this.isolated) {
      // Leave the original graphics state balanced before drawing on top of it.
      this.content = concatBytes([encodeAscii('q\n'), this.content, encodeAscii('\nQ')]);
      this.isolated = true;
    }
    this.content = concatBytes([this.content, encodeAscii(`\n${source}\n`)]);
    this.changed = true;
  }

  private async standardFont(name: StandardFonts): Promise<{ font: PDFFont; key: PDFName }> {
    const cached = this.fonts.get(name);
    if (cached) return cached;

    const font = await this.doc.embedFont(name);
    // Embed now so the font dictionary resolves when the page is read again.
    await font.embed();
    const key = this.page.node.newFontDictionary(font.name, font.ref);
    const entry = { font, key };
    this.fonts.set(name, entry);
    return entry;
  }
}

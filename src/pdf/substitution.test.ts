import { existsSync } from 'node:fs';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { PDFDocument, PDFName } from 'pdf-lib';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { ReplacementRule } from '../runtime/botConfig.js';
import { PageSelectionFailedError, SubstitutionRenderFailureError } from '../runtime/errors.js';
import type { RuntimeLogger } from '../utils/runtimeLogger.js';
import {
  buildOutputFileName,
  createSubstitutionEngine,
  randomSuffix,
  substitutePdf,
} from './substitution.js';
import { buildRawContentPdf, buildTextPdf, openFirstPage } from './testPdfs.js';

const invoicePdf = () => buildTextPdf([[{ text: 'Invoice #42', x: 50, y: 700, size: 12 }]]);

const makeLogger = () => {
  const messages: string[] = [];
  const warnings: string[] = [];
  const logger: RuntimeLogger = {
    debug: () => {},
    info: (message) => {
      messages.push(message);
    },
    warn: (message) => {
      warnings.push(message);
    },
    error: () => {},
    child: () => logger,
  };
  return { logger, messages, warnings };
};

describe('substitutePdf', () => {
  it('redacts each match and redraws the search text at 8pt', async () => {
    const result = await substitutePdf(await invoicePdf(), [{ find: 'Invoice', replacement: 'Receipt' }]);

    expect(result.rules).toEqual([{ find: 'Invoice', replacement: 'Receipt', occurrences: 1, skipped: false }]);

    const { editor } = await openFirstPage(result.bytes);
    const [hit, ...rest] = editor.search('Invoice');
    expect(rest).toEqual([]);
    expect(hit.x0).toBeCloseTo(50, 3);
    expect(hit.y0).toBeCloseTo(696, 3);
    expect(hit.x1).toBeCloseTo(75.344, 3);
    expect(hit.y1).toBeCloseTo(704, 3);
    expect(editor.search('Receipt')).toEqual([]);

    const original = editor.glyphs().filter((glyph) => Math.abs(glyph.size - 12) < 0.001);
    expect(original.map((glyph) => glyph.text).join('')).toBe(' #42');
  });

  it('logs the count and each replaced instance', async () => {
    const { logger, messages } = makeLogger();

    await substitutePdf(await invoicePdf(), [{ find: 'Invoice', replacement: 'Receipt' }], logger);

    expect(messages).toEqual(['Found 1 occurrences of Invoice', 'Replaced instance 1 of Invoice with Receipt.']);
  });

  it('keeps only the first page', async () => {
    const bytes = await buildTextPdf([
      [{ text: 'first page', x: 50, y: 700, size: 12 }],
      [{ text: 'second page', x: 50, y: 700, size: 12 }],
      [{ text: 'third page', x: 50, y: 700, size: 12 }],
    ]);

    const result = await substitutePdf(bytes, []);

    expect(result.pageCount).toBe(1);
    const { doc, editor } = await openFirstPage(result.bytes);
    expect(doc.getPageCount()).toBe(1);
    expect(editor.search('first page')).toHaveLength(1);
    expect(editor.search('second')).toEqual([]);
  });

  it('fails page selection on a document without pages', async () => {
    const empty = await (await PDFDocument.create()).save();

    await expect(substitutePdf(empty, [])).rejects.toBeInstanceOf(PageSelectionFailedError);
  });

  it('wraps unreadable input as a render failure', async () => {
    const garbage = new TextEncoder().encode('not a pdf at all');

    await expect(substitutePdf(garbage, [])).rejects.toBeInstanceOf(SubstitutionRenderFailureError);
  });

  it('skips rules with an empty side and leaves the content untouched', async () => {
    const input = await invoicePdf();
    const rules: ReplacementRule[] = [
      { find: '', replacement: 'Receipt' },
      { find: 'Invoice', replacement: '' },
    ];

    const result = await substitutePdf(input, rules);

    expect(result.rules.map((rule) => rule.skipped)).toEqual([true, true]);
    const before = (await openFirstPage(input)).editor.contentBytes;
    const after = (await openFirstPage(result.bytes)).editor.contentBytes;
    expect(Array.from(after)).toEqual(Array.from(before));
  });

  it('leaves the content untouched when the text is absent', async () => {
    const input = await invoicePdf();

    const result = await substitutePdf(input, [{ find: 'Refund', replacement: 'Credit' }]);

    expect(result.rules[0].occurrences).toBe(0);
    const before = (await openFirstPage(input)).editor.contentBytes;
    const after = (await openFirstPage(result.bytes)).editor.contentBytes;
    expect(Array.from(after)).toEqual(Array.from(before));
  });

  it('lets later rules see the edits of earlier ones', async () => {
    const result = await substitutePdf(await invoicePdf(), [
      { find: 'Invoice #42', replacement: 'Order' },
      { find: 'Invoice', replacement: 'Bill' },
    ]);

    expect(result.rules.map((rule) => rule.occurrences)).toEqual([1, 1]);

    const { editor } = await openFirstPage(result.bytes);
    const [invoice, ...others] = editor.search('Invoice');
    expect(others).toEqual([]);
    expect(invoice.y0).toBeCloseTo(694.4, 3);

    const [number] = editor.search('#42');
    expect(number.x0).toBeCloseTo(77.568, 3);
  });

  it('redraws text outside WinAnsi with placeholders instead of failing', async () => {
    const bytes = await buildRawContentPdf('BT /F2 12 Tf 1 0 0 1 50 700 Tm (AB) Tj ET', (doc, page) => {
      const cmap = doc.context.register(
        doc.context.stream(
          '1 begincodespacerange\n<00> <FF>\nendcodespacerange\n2 beginbfchar\n<41> <0141>\n<42> <00F3>\nendbfchar',
        ),
      );
      const font = doc.context.register(
        doc.context.obj({ Type: 'Font', Subtype: 'Type1', BaseFont: 'Helvetica', ToUnicode: cmap }),
      );
      page.node.setFontDictionary(PDFName.of('F2'), font);
    });
    const { logger, warnings } = makeLogger();

    const result = await substitutePdf(bytes, [{ find: 'Łó', replacement: 'Lo' }], logger);

    expect(result.rules[0].occurrences).toBe(1);
    expect(warnings).toEqual(['Drew ?ó for Łó; Helvetica cannot encode every character.']);
    const { editor } = await openFirstPage(result.bytes);
    expect(editor.search('Łó')).toEqual([]);
    const [hit] = editor.search('?ó');
    expect(hit.x0).toBeCloseTo(50, 3);
    expect(hit.y0).toBeCloseTo(696, 3);
  });

  it('substitutes text drawn through a form XObject', async () => {
    const bytes = await buildRawContentPdf('q /X1 Do Q', (doc, page, helvetica) => {
      const form = doc.context.register(
        doc.context.flateStream('BT /F1 12 Tf 50 700 Td (Invoice) Tj ET', {
          Type: 'XObject',
          Subtype: 'Form',
          BBox: [0, 0, 600, 800],
          Resources: { Font: { F1: helvetica.ref } },
        }),
      );
      page.node.setXObject(PDFName.of('X1'), form);
    });

    const result = await substitutePdf(bytes, [{ find: 'Invoice', replacement: 'Receipt' }]);

    expect(result.rules[0].occurrences).toBe(1);
    const { editor } = await openFirstPage(result.bytes);
    const [hit, ...rest] = editor.search('Invoice');
    expect(rest).toEqual([]);
    expect(hit.y0).toBeCloseTo(696, 3);
    expect(editor.glyphs().filter((glyph) => Math.abs(glyph.size - 12) < 0.001)).toEqual([]);
  });
});

describe('output naming', () => {
  it('appends the suffix before the extension', () => {
    expect(buildOutputFileName('/tmp/in/report.final.pdf', 'abc')).toBe('report.final-abc.pdf');
    expect(buildOutputFileName('/tmp/in/scan', 'abc')).toBe('scan-abc.pdf');
  });

  it('draws eight lowercase letters and digits', () => {
    expect(randomSuffix()).toMatch(/^[a-z0-9]{8}$/);
  });
});

describe('createSubstitutionEngine', () => {
  let workDir = '';
  let inputPath = '';

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(tmpdir(), 'redliner-engine-test-'));
    inputPath = path.join(workDir, 'invoice.pdf');
    await writeFile(inputPath, await invoicePdf());
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('hands over a suffixed copy and removes it afterwards', async () => {
    const engine = createSubstitutionEngine({ loadRules: async () => [] });
    let seen = '';

    const size = await engine.withSubstitutedDocument(inputPath, async (outputPath) => {
      seen = outputPath;
      return (await readFile(outputPath)).length;
    });

    expect(path.basename(seen)).toMatch(/^invoice-[a-z0-9]{8}\.pdf$/);
    expect(size).toBeGreaterThan(0);
    expect(existsSync(path.dirname(seen))).toBe(false);
  });

  it('uses the injected suffix', async () => {
    const engine = createSubstitutionEngine({ loadRules: async () => [], randomSuffix: () => 'abcd1234' });

    const name = await engine.withSubstitutedDocument(inputPath, async (outputPath) => path.basename(outputPath));

    expect(name).toBe('invoice-abcd1234.pdf');
  });

  it('removes the copy when the consumer throws', async () => {
    const engine = createSubstitutionEngine({ loadRules: async () => [] });
    let seen = '';

    await expect(
      engine.withSubstitutedDocument(inputPath, async (outputPath) => {
        seen = outputPath;
        throw new Error('upload failed');
      }),
    ).rejects.toThrow('upload failed');
    expect(existsSync(path.dirname(seen))).toBe(false);
  });

  it('reloads the rules for every document', async () => {
    const loadRules = vi
      .fn<() => Promise<ReplacementRule[]>>()
      .mockResolvedValueOnce([])
      .mockResolvedValueOnce([{ find: 'Invoice', replacement: 'Receipt' }]);
    const engine = createSubstitutionEngine({ loadRules });
    const inspect = async (outputPath: string) => {
      const { editor } = await openFirstPage(await readFile(outputPath));
      return editor.search('Invoice')[0]?.y0;
    };

    const first = await engine.withSubstitutedDocument(inputPath, inspect);
    const second = await engine.withSubstitutedDocument(inputPath, inspect);

    expect(loadRules).toHaveBeenCalledTimes(2);
    expect(first).toBeCloseTo(697.6, 3);
    expect(second).toBeCloseTo(696, 3);
  });
});

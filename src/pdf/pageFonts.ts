import { Encodings, Font, FontNames } from '@pdf-lib/standard-fonts';
import type { PDFDict, PDFObject } from 'pdf-lib';

import { latin1 } from './contentStream.js';
import {
  arrayItems,
  arrayOf,
  decodeStreamBytes,
  dictOf,
  lookupKey,
  nameOf,
  numberOf,
} from './pdfObjects.js';
import { parseToUnicodeCMap, type ToUnicodeMap } from './toUnicode.js';

/** Metrics are in glyph space: thousandths of the font size. */
export type PageFont = {
  resourceName: string;
  baseFont: string;
  codeLength: 1 | 2;
  ascent: number;
  descent: number;
  widthOf: (code: number) => number;
  toUnicode: (code: number) => string;
};

export type FontResolver = (resourceName: string) => PageFont;

type StandardEncoding = (typeof Encodings)['WinAnsi'];

type EncodingTables = {
  codeToName: Map<number, string>;
  nameToUnicode: Map<string, string>;
};

const DEFAULT_ASCENT = 800;
const DEFAULT_DESCENT = -200;
const DEFAULT_CID_WIDTH = 1000;
const STANDARD_GLYPH_FALLBACK_WIDTH = 250;
const UNKNOWN_FONT_WIDTH = 500;

function buildEncodingTables(encoding: StandardEncoding): EncodingTables {
  const codeToName = new Map<number, string>();
  const nameToUnicode = new Map<string, string>();

  for (const codePoint of encoding.supportedCodePoints) {
    const { code, name } = encoding.encodeUnicodeCodePoint(codePoint);
    if (!codeToName.has(code)) codeToName.set(code, name);
    if (!nameToUnicode.has(name)) nameToUnicode.set(name, String.fromCodePoint(codePoint));
  }

  return { codeToName, nameToUnicode };
}

const ENCODING_TABLES = {
  WinAnsi: buildEncodingTables(Encodings.WinAnsi),
  Symbol: buildEncodingTables(Encodings.Symbol),
  ZapfDingbats: buildEncodingTables(Encodings.ZapfDingbats),
};

function glyphNameToUnicode(name: string): string | undefined {
  for (const tables of Object.values(ENCODING_TABLES)) {
    const mapped = tables.nameToUnicode.get(name);
    if (mapped !== undefined) return mapped;
  }

  const uni = /^uni([0-9A-Fa-f]{4})$/.exec(name) ?? /^u([0-9A-Fa-f]{4,6})$/.exec(name);
  if (uni) return String.fromCodePoint(Number.parseInt(uni[1], 16));

  if (name.length === 1) return name;
  return undefined;
}

function stripSubsetTag(baseFont: string): string {
  return baseFont.replace(/^[A-Z]{6}\+/, '');
}

function findStandardFont(baseFont: string): FontNames | undefined {
  const stripped = stripSubsetTag(baseFont);
  return Object.values(FontNames).find((name) => name === stripped);
}

function builtInTables(standardFont: FontNames | undefined): EncodingTables {
  if (standardFont === FontNames.Symbol) return ENCODING_TABLES.Symbol;
  if (standardFont === FontNames.ZapfDingbats) return ENCODING_TABLES.ZapfDingbats;
  return ENCODING_TABLES.WinAnsi;
}

/**
 * code -> glyph name for a simple font. MacRoman and Standard base encodings are read as
 * WinAnsi; the three agree on printable ASCII.
 */
function resolveSimpleEncoding(
  fontDict: PDFDict,
  standardFont: FontNames | undefined,
): (code: number) => string | undefined {
  const base = builtInTables(standardFont);
  const encoding = lookupKey(fontDict, 'Encoding');
  const differences = new Map<number, string>();

  const encodingDict = dictOf(encoding);
  if (encodingDict) {
    let code = 0;
    for (const item of arrayItems(arrayOf(lookupKey(encodingDict, 'Differences')))) {
      const asNumber = numberOf(item);
      if (asNumber !== undefined) {
        code = asNumber;
        continue;
      }
      const glyphName = nameOf(item);
      if (glyphName !== undefined) {
        differences.set(code, glyphName);
        code += 1;
      }
    }
  }

  return (code) => differences.get(code) ?? base.codeToName.get(code);
}

function readToUnicode(fontDict: PDFDict): ToUnicodeMap | null {
  const stream = lookupKey(fontDict, 'ToUnicode');
  if (stream === undefined || nameOf(stream) !== undefined) return null;
  return parseToUnicodeCMap(latin1(decodeStreamBytes(stream)));
}

function readVerticalMetrics(descriptor: PDFDict | undefined): { ascent: number; descent: number } {
  const ascent = numberOf(lookupKey(descriptor, 'Ascent'));
  const descent = numberOf(lookupKey(descriptor, 'Descent'));
  if (ascent === undefined || descent === undefined || ascent <= 0 || descent > 0) {
    return { ascent: DEFAULT_ASCENT, descent: DEFAULT_DESCENT };
  }
  return { ascent, descent };
}

/** Parses a CIDFont /W array: `c [w1 w2 ...]` and `cFirst cLast w` entries. */
export function parseCidWidths(items: PDFObject[]): Map<number, number> {
  const widths = new Map<number, number>();
  let i = 0;

  while (i < items.length) {
    const first = numberOf(items[i]);
    const next = items[i + 1];
    if (first === undefined || next === undefined) break;

    const list = arrayOf(next);
    if (list) {
      arrayItems(list).forEach((item, offset) => {
        const width = numberOf(item);
        if (width !== undefined) widths.set(first + offset, width);
      });
      i += 2;
      continue;
    }

    const last = numberOf(next);
    const width = numberOf(items[i + 2]);
    if (last === undefined || width === undefined) break;
    for (let code = first; code <= last; code += 1) widths.set(code, width);
    i += 3;
  }

  return widths;
}

/**
 * Identity CMaps always take two bytes per code. Other CMaps are not read; the ToUnicode
 * codespace stands in for theirs.
 */
function type0CodeLength(fontDict: PDFDict, toUnicode: ToUnicodeMap | null): 1 | 2 {
  const encoding = nameOf(lookupKey(fontDict, 'Encoding'));
  if (encoding === 'Identity-H' || encoding === 'Identity-V') return 2;
  return toUnicode?.codeLength === 1 ? 1 : 2;
}

function buildType0Font(resourceName: string, fontDict: PDFDict, baseFont: string): PageFont {
  const descendant = dictOf(arrayItems(arrayOf(lookupKey(fontDict, 'DescendantFonts')))[0]);
  const defaultWidth = numberOf(lookupKey(descendant, 'DW')) ?? DEFAULT_CID_WIDTH;
  const widths = parseCidWidths(arrayItems(arrayOf(lookupKey(descendant, 'W'))));
  const toUnicode = readToUnicode(fontDict);
  const { ascent, descent } = readVerticalMetrics(dictOf(lookupKey(descendant, 'FontDescriptor')));

  return {
    resourceName,
    baseFont,
    codeLength: type0CodeLength(fontDict, toUnicode),
    ascent,
    descent,
    widthOf: (code) => widths.get(code) ?? defaultWidth,
    toUnicode: (code) => toUnicode?.lookup(code) ?? '',
  };
}

function buildSimpleFont(resourceName: string, fontDict: PDFDict, baseFont: string): PageFont {
  const standardFont = findStandardFont(baseFont);
  const descriptor = dictOf(lookupKey(fontDict, 'FontDescriptor'));
  const firstChar = numberOf(lookupKey(fontDict, 'FirstChar')) ?? 0;
  const widthsArray = arrayOf(lookupKey(fontDict, 'Widths'));
  const widths = arrayItems(widthsArray).map((item) => numberOf(item) ?? 0);
  const missingWidth = numberOf(lookupKey(descriptor, 'MissingWidth')) ?? 0;
  const glyphNameOf = resolveSimpleEncoding(fontDict, standardFont);
  const toUnicode = readToUnicode(fontDict);
  const metrics = standardFont && !widthsArray ? Font.load(standardFont) : undefined;
  const { ascent, descent } = readVerticalMetrics(descriptor);

  const widthOf = (code: number): number => {
    if (widthsArray) {
      return widths[code - firstChar] ?? missingWidth;
    }
    if (metrics) {
      const glyphName = glyphNameOf(code);
      const width = glyphName ? metrics.getWidthOfGlyph(glyphName) : undefined;
      return typeof width === 'number' && width > 0 ? width : STANDARD_GLYPH_FALLBACK_WIDTH;
    }
    return missingWidth;
  };

  const decode = (code: number): string => {
    const mapped = toUnicode?.lookup(code);
    if (mapped !== undefined) return mapped;

    const glyphName = glyphNameOf(code);
    const fromName = glyphName ? glyphNameToUnicode(glyphName) : undefined;
    if (fromName !== undefined) return fromName;

    return code >= 0x20 && code < 0x7f ? String.fromCharCode(code) : '';
  };

  return {
    resourceName,
    baseFont,
    codeLength: 1,
    ascent,
    descent,
    widthOf,
    toUnicode: decode,
  };
}

function unknownFont(resourceName: string): PageFont {
  return {
    resourceName,
    baseFont: 'unknown',
    codeLength: 1,
    ascent: DEFAULT_ASCENT,
    descent: DEFAULT_DESCENT,
    widthOf: () => UNKNOWN_FONT_WIDTH,
    toUnicode: (code) => (code >= 0x20 && code < 0x7f ? String.fromCharCode(code) : ''),
  };
}

export function createFontResolver(resources: PDFDict | undefined): FontResolver {
  const fonts = dictOf(lookupKey(resources, 'Font'));
  const cache = new Map<string, PageFont>();

  return (resourceName) => {
    const cached = cache.get(resourceName);
    if (cached) return cached;

    const fontDict = dictOf(lookupKey(fonts, resourceName));
    let font: PageFont;
    if (!fontDict) {
      font = unknownFont(resourceName);
    } else {
      const baseFont = nameOf(lookupKey(fontDict, 'BaseFont')) ?? 'unknown';
      font =
        nameOf(lookupKey(fontDict, 'Subtype')) === 'Type0'
          ? buildType0Font(resourceName, fontDict, baseFont)
          : buildSimpleFont(resourceName, fontDict, baseFont);
    }

    cache.set(resourceName, font);
    return font;
  };
}

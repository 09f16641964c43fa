import { unionRect, type Rect } from './geometry.js';
import { glyphsOf, type PlacedGlyph, type TextRun } from './pageText.js';

export type Occurrence = Rect;

type LineChar = {
  char: string;
  glyph: PlacedGlyph | null;
};

export type TextLine = {
  chars: LineChar[];
  text: string;
};

// Fractions of the font size.
const BASELINE_TOLERANCE = 0.5;
const WORD_GAP = 0.25;

function startsNewLine(prev: PlacedGlyph, next: PlacedGlyph): boolean {
  const size = Math.max(prev.size, next.size);
  if (Math.abs(next.origin.y - prev.origin.y) > size * BASELINE_TOLERANCE) return true;
  return next.origin.x < prev.origin.x;
}

/**
 * Groups glyphs into lines in content order. A gap wider than a quarter em between two
 * glyphs on the same line reads as a space.
 */
export function buildTextLines(runs: TextRun[]): TextLine[] {
  const lines: LineChar[][] = [];
  let current: LineChar[] = [];
  let prev: PlacedGlyph | null = null;

  for (const glyph of glyphsOf(runs)) {
    if (!glyph.text) continue;

    if (prev && startsNewLine(prev, glyph)) {
      lines.push(current);
      current = [];
    } else if (prev) {
      const gap = glyph.origin.x - prev.advance.x;
      const size = Math.max(prev.size, glyph.size);
      if (gap > size * WORD_GAP && !/\s$/.test(prev.text) && !/^\s/.test(glyph.text)) {
        current.push({ char: ' ', glyph: null });
      }
    }

    for (const char of glyph.text) current.push({ char, glyph });
    prev = glyph;
  }

  if (current.length > 0) lines.push(current);
  return lines.map((chars) => ({ chars, text: chars.map((item) => item.char).join('') }));
}

function foldAsciiCase(text: string): string {
  return text.replace(/[A-Z]/g, (char) => char.toLowerCase());
}

function compareOccurrences(a: Occurrence, b: Occurrence): number {
  if (Math.abs(a.y1 - b.y1) > 1) return b.y1 - a.y1;
  return a.x0 - b.x0;
}

/**
 * Finds non-overlapping matches of `needle` within single lines, ignoring ASCII case.
 * Results run top to bottom, then left to right.
 */
export function searchTextLines(lines: TextLine[], needle: string): Occurrence[] {
  const target = foldAsciiCase(needle);
  if (!target) return [];

  const found: Occurrence[] = [];
  for (const line of lines) {
    const haystack = foldAsciiCase(line.text);
    // Glyph text may span several UTF-16 units; index by code unit.
    const unitOwners: (PlacedGlyph | null)[] = [];
    for (const item of line.chars) {
      for (let i = 0; i < item.char.length; i += 1) unitOwners.push(item.glyph);
    }

    let from = 0;
    for (;;) {
      const index = haystack.indexOf(target, from);
      if (index < 0) break;

      let rect: Rect | null = null;
      for (const glyph of unitOwners.slice(index, index + target.length)) {
        if (!glyph) continue;
        rect = rect ? unionRect(rect, glyph.box) : glyph.box;
      }
      if (rect) found.push(rect);
      from = index + target.length;
    }
  }

  return found.sort(compareOccurrences);
}

export function searchRuns(runs: TextRun[], needle: string): Occurrence[] {
  return searchTextLines(buildTextLines(runs), needle);
}

import {
  formatNumber,
  isName,
  isPdfString,
  type ContentOperation,
  type Operand,
  type PdfStringToken,
} from './contentStream.js';
import {
  IDENTITY,
  applyMatrix,
  boundsOf,
  multiply,
  translation,
  type Matrix,
  type Point,
  type Rect,
} from './geometry.js';
import type { FontResolver, PageFont } from './pageFonts.js';

export type PlacedGlyph = {
  code: number;
  bytes: Uint8Array;
  text: string;
  box: Rect;
  center: Point;
  origin: Point;
  /** Where the next glyph would start. */
  advance: Point;
  /** Font size after the text and graphics matrices, in user-space units. */
  size: number;
};

export type TextRunPiece =
  | {
      kind: 'glyph';
      glyph: PlacedGlyph;
      /**
       * TJ adjustment that moves the pen exactly as far as this glyph does, or null when the
       * glyph cannot be swapped for one (zero font size).
       */
      removal: number | null;
    }
  | { kind: 'adjust'; amount: number };

/** Key of the page's own content in {@link TextRun.source}. */
export const PAGE_SOURCE = 'page';

/** A form XObject ready to be drawn: its parsed content and the scope its names resolve in. */
export type FormDrawing = {
  /** Stable key of the form's stream; runs inside it carry this as their source. */
  source: string;
  operations: ContentOperation[];
  matrix: Matrix;
  scope: TextScope;
};

/** Resource lookups for one content stream. */
export type TextScope = {
  resolveFont: FontResolver;
  resolveForm: (name: string) => FormDrawing | undefined;
};

/** One text-showing operation (`Tj`, `TJ`, `'`, `"`) with its glyphs placed on the page. */
export type TextRun = {
  /** Content stream holding `operation`: {@link PAGE_SOURCE} or a form's source. */
  source: string;
  operation: ContentOperation;
  /** Operators that must precede a rewritten `TJ` to keep the operation's side effects. */
  preamble: string;
  pieces: TextRunPiece[];
};

type TextState = {
  font: PageFont | null;
  fontSize: number;
  charSpacing: number;
  wordSpacing: number;
  horizontalScale: number;
  leading: number;
  rise: number;
};

type GraphicsState = {
  ctm: Matrix;
  text: TextState;
};

const SPACE = 0x20;

function initialState(): GraphicsState {
  return {
    ctm: IDENTITY,
    text: {
      font: null,
      fontSize: 0,
      charSpacing: 0,
      wordSpacing: 0,
      horizontalScale: 1,
      leading: 0,
      rise: 0,
    },
  };
}

function cloneState(state: GraphicsState): GraphicsState {
  return { ctm: state.ctm, text: { ...state.text } };
}

function numbers(operands: Operand[], count: number): number[] | null {
  if (operands.length < count) return null;
  const values = operands.slice(operands.length - count);
  return values.every((value): value is number => typeof value === 'number') ? values : null;
}

function splitCodes(token: PdfStringToken, codeLength: 1 | 2): number[] {
  const { bytes } = token;
  const codes: number[] = [];
  if (codeLength === 1) {
    for (const byte of bytes) codes.push(byte);
    return codes;
  }
  for (let i = 0; i + 1 < bytes.length; i += 2) codes.push(bytes[i] * 256 + bytes[i + 1]);
  return codes;
}

function codeBytes(code: number, codeLength: 1 | 2): Uint8Array {
  return codeLength === 1 ? Uint8Array.of(code) : Uint8Array.of(code >> 8, code & 0xff);
}

class TextInterpreter {
  private state = initialState();
  private readonly stack: GraphicsState[] = [];
  private textMatrix: Matrix = IDENTITY;
  private lineMatrix: Matrix = IDENTITY;
  private readonly activeForms = new Set<string>();
  readonly runs: TextRun[] = [];

  constructor(
    private scope: TextScope,
    private source: string,
  ) {}

  execute(operation: ContentOperation): void {
    const { operator, operands } = operation;
    const text = this.state.text;

    switch (operator) {
      case 'q':
        this.stack.push(cloneState(this.state));
        return;
      case 'Q':
        this.state = this.stack.pop() ?? this.state;
        return;
      case 'cm': {
        const m = numbers(operands, 6);
        if (m) this.state.ctm = multiply(toMatrix(m), this.state.ctm);
        return;
      }
      case 'BT':
        this.textMatrix = IDENTITY;
        this.lineMatrix = IDENTITY;
        return;
      case 'Tc':
      case 'Tw':
      case 'Tz':
      case 'TL':
      case 'Ts': {
        const [value] = numbers(operands, 1) ?? [];
        if (value === undefined) return;
        if (operator === 'Tc') text.charSpacing = value;
        if (operator === 'Tw') text.wordSpacing = value;
        if (operator === 'Tz') text.horizontalScale = value / 100;
        if (operator === 'TL') text.leading = value;
        if (operator === 'Ts') text.rise = value;
        return;
      }
      case 'Tf': {
        const [name, size] = operands.slice(-2);
        if (isName(name) && typeof size === 'number') {
          text.font = this.scope.resolveFont(name.value);
          text.fontSize = size;
        }
        return;
      }
      case 'Td':
      case 'TD': {
        const offset = numbers(operands, 2);
        if (!offset) return;
        if (operator === 'TD') text.leading = -offset[1];
        this.moveLine(offset[0], offset[1]);
        return;
      }
      case 'Tm': {
        const m = numbers(operands, 6);
        if (!m) return;
        this.textMatrix = toMatrix(m);
        this.lineMatrix = this.textMatrix;
        return;
      }
      case 'T*':
        this.moveLine(0, -text.leading);
        return;
      case 'Tj': {
        const str = operands[operands.length - 1];
        if (isPdfString(str)) this.show(operation, '', [str]);
        return;
      }
      case 'TJ': {
        const array = operands[operands.length - 1];
        if (Array.isArray(array)) this.show(operation, '', array);
        return;
      }
      case "'": {
        this.moveLine(0, -text.leading);
        const str = operands[operands.length - 1];
        if (isPdfString(str)) this.show(operation, 'T*', [str]);
        return;
      }
      case '"': {
        const [wordSpacing, charSpacing, str] = operands.slice(-3);
        if (typeof wordSpacing !== 'number' || typeof charSpacing !== 'number' || !isPdfString(str)) {
          return;
        }
        text.wordSpacing = wordSpacing;
        text.charSpacing = charSpacing;
        this.moveLine(0, -text.leading);
        this.show(
          operation,
          `${formatNumber(wordSpacing)} Tw ${formatNumber(charSpacing)} Tc T*`,
          [str],
        );
        return;
      }
      case 'Do': {
        const name = operands[operands.length - 1];
        if (!isName(name)) return;
        const form = this.scope.resolveForm(name.value);
        // A form that draws itself would never terminate.
        if (form && !this.activeForms.has(form.source)) this.drawForm(form);
        return;
      }
      default:
        return;
    }
  }

  /** Runs a form's content as if inlined between `q` and `Q`, under its /Matrix. */
  private drawForm(form: FormDrawing): void {
    const saved = {
      state: this.state,
      depth: this.stack.length,
      textMatrix: this.textMatrix,
      lineMatrix: this.lineMatrix,
      scope: this.scope,
      source: this.source,
    };

    this.state = cloneState(saved.state);
    this.state.ctm = multiply(form.matrix, this.state.ctm);
    this.scope = form.scope;
    this.source = form.source;
    this.activeForms.add(form.source);

    for (const operation of form.operations) this.execute(operation);

    this.activeForms.delete(form.source);
    this.stack.length = saved.depth;
    this.state = saved.state;
    this.textMatrix = saved.textMatrix;
    this.lineMatrix = saved.lineMatrix;
    this.scope = saved.scope;
    this.source = saved.source;
  }

  private moveLine(tx: number, ty: number): void {
    this.lineMatrix = multiply(translation(tx, ty), this.lineMatrix);
    this.textMatrix = this.lineMatrix;
  }

  private show(operation: ContentOperation, preamble: string, elements: Operand[]): void {
    const text = this.state.text;
    const font = text.font;
    if (!font) return;

    const { fontSize, horizontalScale, charSpacing, wordSpacing, rise } = text;
    const pieces: TextRunPiece[] = [];

    for (const element of elements) {
      if (typeof element === 'number') {
        const tx = (-element / 1000) * fontSize * horizontalScale;
        this.textMatrix = multiply(translation(tx, 0), this.textMatrix);
        pieces.push({ kind: 'adjust', amount: element });
        continue;
      }
      if (!isPdfString(element)) continue;

      for (const code of splitCodes(element, font.codeLength)) {
        const width = font.widthOf(code);
        const spacing = charSpacing + (font.codeLength === 1 && code === SPACE ? wordSpacing : 0);
        const renderMatrix = multiply(
          [fontSize * horizontalScale, 0, 0, fontSize, 0, rise],
          multiply(this.textMatrix, this.state.ctm),
        );

        const w = width / 1000;
        const top = font.ascent / 1000;
        const bottom = font.descent / 1000;
        const origin = applyMatrix(renderMatrix, { x: 0, y: 0 });
        const unitUp = applyMatrix(renderMatrix, { x: 0, y: 1 });

        const tx = (w * fontSize + spacing) * horizontalScale;
        this.textMatrix = multiply(translation(tx, 0), this.textMatrix);

        const glyph: PlacedGlyph = {
          code,
          bytes: codeBytes(code, font.codeLength),
          text: font.toUnicode(code),
          box: boundsOf([
            applyMatrix(renderMatrix, { x: 0, y: bottom }),
            applyMatrix(renderMatrix, { x: w, y: bottom }),
            applyMatrix(renderMatrix, { x: 0, y: top }),
            applyMatrix(renderMatrix, { x: w, y: top }),
          ]),
          center: applyMatrix(renderMatrix, { x: w / 2, y: (top + bottom) / 2 }),
          origin,
          advance: applyMatrix(multiply(this.textMatrix, this.state.ctm), { x: 0, y: rise }),
          size: Math.hypot(unitUp.x - origin.x, unitUp.y - origin.y),
        };

        pieces.push({
          kind: 'glyph',
          glyph,
          removal: fontSize === 0 ? null : -(width + (1000 * spacing) / fontSize),
        });
      }
    }

    this.runs.push({ source: this.source, operation, preamble, pieces });
  }
}

function toMatrix(values: number[]): Matrix {
  return [values[0], values[1], values[2], values[3], values[4], values[5]];
}

export function readTextRuns(
  operations: ContentOperation[],
  scope: TextScope,
  source: string = PAGE_SOURCE,
): TextRun[] {
  const interpreter = new TextInterpreter(scope, source);
  for (const operation of operations) interpreter.execute(operation);
  return interpreter.runs;
}

export function glyphsOf(runs: TextRun[]): PlacedGlyph[] {
  return runs.flatMap((run) =>
    run.pieces.flatMap((piece) => (piece.kind === 'glyph' ? [piece.glyph] : [])),
  );
}

export type PdfNameToken = { kind: 'name'; value: string };
export type PdfStringToken = { kind: 'string'; bytes: Uint8Array; hex: boolean };
export type PdfDictToken = { kind: 'dict'; entries: Map<string, Operand> };

export type Operand =
  | number
  | boolean
  | null
  | PdfNameToken
  | PdfStringToken
  | PdfDictToken
  | Operand[];

/**
 * One operator with its operands. `start`/`end` delimit the operation's bytes in the
 * decoded stream (first operand through the operator keyword) so it can be spliced.
 */
export type ContentOperation = {
  operator: string;
  operands: Operand[];
  start: number;
  end: number;
};

const CHAR = {
  nul: 0x00,
  tab: 0x09,
  lf: 0x0a,
  ff: 0x0c,
  cr: 0x0d,
  space: 0x20,
  hash: 0x23,
  percent: 0x25,
  lparen: 0x28,
  rparen: 0x29,
  slash: 0x2f,
  lt: 0x3c,
  gt: 0x3e,
  lbracket: 0x5b,
  backslash: 0x5c,
  rbracket: 0x5d,
  lbrace: 0x7b,
  rbrace: 0x7d,
} as const;

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)$/;

export function isWhitespace(byte: number): boolean {
  return (
    byte === CHAR.space ||
    byte === CHAR.lf ||
    byte === CHAR.cr ||
    byte === CHAR.tab ||
    byte === CHAR.ff ||
    byte === CHAR.nul
  );
}

function isDelimiter(byte: number): boolean {
  return (
    byte === CHAR.lparen ||
    byte === CHAR.rparen ||
    byte === CHAR.lt ||
    byte === CHAR.gt ||
    byte === CHAR.lbracket ||
    byte === CHAR.rbracket ||
    byte === CHAR.lbrace ||
    byte === CHAR.rbrace ||
    byte === CHAR.slash ||
    byte === CHAR.percent
  );
}

function hexValue(byte: number): number {
  if (byte >= 0x30 && byte <= 0x39) return byte - 0x30;
  if (byte >= 0x41 && byte <= 0x46) return byte - 0x41 + 10;
  if (byte >= 0x61 && byte <= 0x66) return byte - 0x61 + 10;
  return -1;
}

type Token = { type: 'operand'; value: Operand } | { type: 'operator'; value: string };

class ContentLexer {
  private pos = 0;

  constructor(private readonly bytes: Uint8Array) {}

  get position(): number {
    return this.pos;
  }

  atEnd(): boolean {
    this.skipWhitespaceAndComments();
    return this.pos >= this.bytes.length;
  }

  next(): Token {
    this.skipWhitespaceAndComments();
    const byte = this.bytes[this.pos];

    if (byte === CHAR.lparen) return { type: 'operand', value: this.readLiteralString() };
    if (byte === CHAR.lt) {
      if (this.bytes[this.pos + 1] === CHAR.lt) return { type: 'operand', value: this.readDict() };
      return { type: 'operand', value: this.readHexString() };
    }
    if (byte === CHAR.lbracket) return { type: 'operand', value: this.readArray() };
    if (byte === CHAR.slash) return { type: 'operand', value: this.readName() };
    if (byte === CHAR.lbrace || byte === CHAR.rbrace) {
      this.pos += 1;
      return { type: 'operator', value: String.fromCharCode(byte) };
    }
    if (byte === CHAR.rparen || byte === CHAR.gt || byte === CHAR.rbracket) {
      throw new Error(`Unexpected '${String.fromCharCode(byte)}' at offset ${this.pos}`);
    }

    const word = this.readRegular();
    if (NUMBER_PATTERN.test(word)) return { type: 'operand', value: Number.parseFloat(word) };
    if (word === 'true') return { type: 'operand', value: true };
    if (word === 'false') return { type: 'operand', value: false };
    if (word === 'null') return { type: 'operand', value: null };
    return { type: 'operator', value: word };
  }

  /** Skips the binary payload of an inline image; the lexer sits right after `ID`. */
  skipInlineImageData(): void {
    this.pos += 1;
    const { bytes } = this;
    for (let i = this.pos; i + 1 < bytes.length; i += 1) {
      if (bytes[i] !== 0x45 || bytes[i + 1] !== 0x49) continue;
      const before = bytes[i - 1];
      const after = bytes[i + 2];
      if ((before === undefined || isWhitespace(before)) && (after === undefined || isWhitespace(after) || isDelimiter(after))) {
        this.pos = i + 2;
        return;
      }
    }
    throw new Error('Inline image is missing its EI marker');
  }

  private skipWhitespaceAndComments(): void {
    const { bytes } = this;
    while (this.pos < bytes.length) {
      const byte = bytes[this.pos];
      if (isWhitespace(byte)) {
        this.pos += 1;
      } else if (byte === CHAR.percent) {
        while (this.pos < bytes.length && bytes[this.pos] !== CHAR.lf && bytes[this.pos] !== CHAR.cr) {
          this.pos += 1;
        }
      } else {
        return;
      }
    }
  }

  private readRegular(): string {
    const start = this.pos;
    while (this.pos < this.bytes.length) {
      const byte = this.bytes[this.pos];
      if (isWhitespace(byte) || isDelimiter(byte)) break;
      this.pos += 1;
    }
    return latin1(this.bytes.subarray(start, this.pos));
  }

  private readName(): PdfNameToken {
    this.pos += 1;
    const raw = this.readRegular();
    const value = raw.replace(/#([0-9a-fA-F]{2})/g, (_, hex: string) =>
      String.fromCharCode(Number.parseInt(hex, 16)),
    );
    return { kind: 'name', value };
  }

  private readLiteralString(): PdfStringToken {
    const { bytes } = this;
    const out: number[] = [];
    let depth = 1;
    this.pos += 1;

    while (this.pos < bytes.length) {
      const byte = bytes[this.pos];
      this.pos += 1;

      if (byte === CHAR.backslash) {
        const escaped = bytes[this.pos];
        this.pos += 1;
        switch (escaped) {
          case 0x6e: out.push(CHAR.lf); break;
          case 0x72: out.push(CHAR.cr); break;
          case 0x74: out.push(CHAR.tab); break;
          case 0x62: out.push(0x08); break;
          case 0x66: out.push(CHAR.ff); break;
          case CHAR.cr:
            if (bytes[this.pos] === CHAR.lf) this.pos += 1;
            break;
          case CHAR.lf:
            break;
          default:
            if (escaped >= 0x30 && escaped <= 0x37) {
              let code = escaped - 0x30;
              for (let digits = 1; digits < 3; digits += 1) {
                const next = bytes[this.pos];
                if (next < 0x30 || next > 0x37) break;
                code = code * 8 + (next - 0x30);
                this.pos += 1;
              }
              out.push(code & 0xff);
            } else if (escaped !== undefined) {
              out.push(escaped);
            }
        }
        continue;
      }

      if (byte === CHAR.lparen) {
        depth += 1;
      } else if (byte === CHAR.rparen) {
        depth -= 1;
        if (depth === 0) break;
      }
      out.push(byte);
    }

    if (depth !== 0) throw new Error('Unterminated literal string');
    return { kind: 'string', bytes: Uint8Array.from(out), hex: false };
  }

  private readHexString(): PdfStringToken {
    const { bytes } = this;
    const digits: number[] = [];
    this.pos += 1;

    while (this.pos < bytes.length && bytes[this.pos] !== CHAR.gt) {
      const value = hexValue(bytes[this.pos]);
      if (value >= 0) digits.push(value);
      this.pos += 1;
    }
    if (this.pos >= bytes.length) throw new Error('Unterminated hex string');
    this.pos += 1;

    if (digits.length % 2 === 1) digits.push(0);
    const out = new Uint8Array(digits.length / 2);
    for (let i = 0; i < out.length; i += 1) {
      out[i] = digits[i * 2] * 16 + digits[i * 2 + 1];
    }
    return { kind: 'string', bytes: out, hex: true };
  }

  private readArray(): Operand[] {
    const items: Operand[] = [];
    this.pos += 1;

    for (;;) {
      this.skipWhitespaceAndComments();
      if (this.pos >= this.bytes.length) throw new Error('Unterminated array');
      if (this.bytes[this.pos] === CHAR.rbracket) {
        this.pos += 1;
        return items;
      }
      const token = this.next();
      if (token.type === 'operator') {
        throw new Error(`Unexpected operator ${token.value} inside array`);
      }
      items.push(token.value);
    }
  }

  private readDict(): PdfDictToken {
    const entries = new Map<string, Operand>();
    this.pos += 2;

    for (;;) {
      this.skipWhitespaceAndComments();
      if (this.pos >= this.bytes.length) throw new Error('Unterminated dictionary');
      if (this.bytes[this.pos] === CHAR.gt && this.bytes[this.pos + 1] === CHAR.gt) {
        this.pos += 2;
        return { kind: 'dict', entries };
      }
      const key = this.next();
      if (key.type !== 'operand' || !isName(key.value)) {
        throw new Error('Dictionary key must be a name');
      }
      const value = this.next();
      if (value.type === 'operator') {
        throw new Error(`Unexpected operator ${value.value} inside dictionary`);
      }
      entries.set(key.value.value, value.value);
    }
  }
}

export function latin1(bytes: Uint8Array): string {
  let out = '';
  for (const byte of bytes) out += String.fromCharCode(byte);
  return out;
}

export function isName(value: Operand | undefined): value is PdfNameToken {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && value.kind === 'name';
}

export function isPdfString(value: Operand | undefined): value is PdfStringToken {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && value.kind === 'string';
}

export function parseContentStream(bytes: Uint8Array): ContentOperation[] {
  const lexer = new ContentLexer(bytes);
  const operations: ContentOperation[] = [];
  let operands: Operand[] = [];
  let start = -1;

  while (!lexer.atEnd()) {
    const tokenStart = lexer.position;
    const token = lexer.next();

    if (token.type === 'operand') {
      if (start < 0) start = tokenStart;
      operands.push(token.value);
      continue;
    }

    if (token.value === 'BI') {
      // Inline image dictionary runs up to ID; its payload is opaque.
      while (!lexer.atEnd()) {
        const inner = lexer.next();
        if (inner.type === 'operator' && inner.value === 'ID') break;
      }
      lexer.skipInlineImageData();
    }

    operations.push({
      operator: token.value,
      operands,
      start: start < 0 ? tokenStart : start,
      end: lexer.position,
    });
    operands = [];
    start = -1;
  }

  return operations;
}

export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) return '0';
  const rounded = Math.round(value * 10000) / 10000;
  if (Object.is(rounded, -0) || rounded === 0) return '0';
  return String(rounded);
}

export function toHexString(bytes: Uint8Array): string {
  let out = '<';
  for (const byte of bytes) out += byte.toString(16).padStart(2, '0').toUpperCase();
  return `${out}>`;
}

export function encodeAscii(text: string): Uint8Array {
  const out = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i += 1) out[i] = text.charCodeAt(i) & 0xff;
  return out;
}

export function concatBytes(parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

export type ToUnicodeMap = {
  /** Byte width of the codes the CMap maps, from its codespace ranges. */
  codeLength: number | null;
  lookup: (code: number) => string | undefined;
};

const HEX_TOKEN = /<([0-9a-fA-F\s]*)>/g;

function hexToCode(hex: string): number {
  const cleaned = hex.replace(/\s+/g, '');
  return cleaned.length === 0 ? 0 : Number.parseInt(cleaned, 16);
}

/** Destination strings in a ToUnicode CMap are UTF-16BE. */
function hexToUnicode(hex: string): string {
  const cleaned = hex.replace(/\s+/g, '');
  const units: number[] = [];
  for (let i = 0; i + 4 <= cleaned.length; i += 4) {
    units.push(Number.parseInt(cleaned.slice(i, i + 4), 16));
  }
  if (cleaned.length % 4 === 2) {
    units.push(Number.parseInt(cleaned.slice(cleaned.length - 2), 16));
  }
  return String.fromCharCode(...units);
}

function sections(source: string, begin: string, end: string): string[] {
  const pattern = new RegExp(`${begin}([\\s\\S]*?)${end}`, 'g');
  return Array.from(source.matchAll(pattern), (match) => match[1]);
}

function hexTokens(body: string): string[] {
  return Array.from(body.matchAll(HEX_TOKEN), (match) => match[1]);
}

export function parseToUnicodeCMap(source: string): ToUnicodeMap {
  const mapping = new Map<number, string>();
  let codeLength: number | null = null;

  for (const body of sections(source, 'begincodespacerange', 'endcodespacerange')) {
    const [low] = hexTokens(body);
    if (low !== undefined) {
      codeLength = Math.max(1, Math.ceil(low.replace(/\s+/g, '').length / 2));
      break;
    }
  }

  for (const body of sections(source, 'beginbfchar', 'endbfchar')) {
    const tokens = hexTokens(body);
    for (let i = 0; i + 1 < tokens.length; i += 2) {
      mapping.set(hexToCode(tokens[i]), hexToUnicode(tokens[i + 1]));
    }
  }

  for (const body of sections(source, 'beginbfrange', 'endbfrange')) {
    // Entries are `<lo> <hi> <dst>` or `<lo> <hi> [<dst> <dst> ...]`.
    const entry = /<([0-9a-fA-F\s]*)>\s*<([0-9a-fA-F\s]*)>\s*(?:<([0-9a-fA-F\s]*)>|\[([^\]]*)\])/g;
    for (const match of body.matchAll(entry)) {
      const low = hexToCode(match[1]);
      const high = hexToCode(match[2]);

      if (match[3] !== undefined) {
        const base = hexToUnicode(match[3]);
        const lastUnit = base.charCodeAt(base.length - 1);
        const prefix = base.slice(0, -1);
        for (let code = low; code <= high; code += 1) {
          mapping.set(code, prefix + String.fromCharCode(lastUnit + (code - low)));
        }
      } else if (match[4] !== undefined) {
        const targets = hexTokens(match[4]);
        for (let offset = 0; offset < targets.length && low + offset <= high; offset += 1) {
          mapping.set(low + offset, hexToUnicode(targets[offset]));
        }
      }
    }
  }

  return {
    codeLength,
    lookup: (code) => mapping.get(code),
  };
}

import { randomInt } from 'node:crypto';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { PDFDocument, StandardFonts } from 'pdf-lib';

import type { ReplacementRule } from '../runtime/botConfig.js';
import {
  PageSelectionFailedError,
  RedlinerError,
  SubstitutionRenderFailureError,
  describeError,
} from '../runtime/errors.js';
import { withScopedTempDir } from '../runtime/scopedTemp.js';
import type { RuntimeLogger } from '../utils/runtimeLogger.js';
import { PageEditor, type InsertTextOptions } from './pageEditor.js';

/** Style of the text drawn back into a redacted region. */
export const INSERTED_TEXT: InsertTextOptions = {
  font: StandardFonts.Helvetica,
  fontSize: 8,
  color: [0, 0, 0],
};

const SUFFIX_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';
const SUFFIX_LENGTH = 8;

export type RuleReport = {
  find: string;
  replacement: string;
  occurrences: number;
  skipped: boolean;
};

export type SubstitutionResult = {
  bytes: Uint8Array;
  pageCount: number;
  rules: RuleReport[];
};

export type SubstitutionEngineOptions = {
  /** Called once per document; rule edits on disk apply to the next document. */
  loadRules: () => Promise<ReplacementRule[]>;
  logger?: RuntimeLogger;
  randomSuffix?: () => string;
};

export type SubstitutionEngine = {
  withSubstitutedDocument: <T>(inputPath: string, use: (outputPath: string) => Promise<T>) => Promise<T>;
};

export function randomSuffix(length: number = SUFFIX_LENGTH): string {
  let out = '';
  for (let i = 0; i < length; i += 1) out += SUFFIX_ALPHABET[randomInt(SUFFIX_ALPHABET.length)];
  return out;
}

export function buildOutputFileName(inputPath: string, suffix: string): string {
  const { name, ext } = path.parse(inputPath);
  return `${name}-${suffix}${ext || '.pdf'}`;
}

function isActive(rule: ReplacementRule): boolean {
  return rule.find.length > 0 && rule.replacement.length > 0;
}

async function loadDocument(bytes: Uint8Array): Promise<PDFDocument> {
  try {
    return await PDFDocument.load(bytes);
  } catch (err) {
    throw new SubstitutionRenderFailureError(`Could not open PDF: ${describeError(err)}`, { cause: err });
  }
}

/** Drops every page but the first from the working copy. */
function selectFirstPage(doc: PDFDocument): void {
  const pageCount = doc.getPageCount();
  if (pageCount === 0) {
    throw new PageSelectionFailedError('Document has no pages; page 0 cannot be selected.');
  }
  for (let index = pageCount - 1; index >= 1; index -= 1) {
    doc.removePage(index);
  }
}

async function applyRule(
  editor: PageEditor,
  rule: ReplacementRule,
  logger: RuntimeLogger | undefined,
): Promise<number> {
  const found = editor.search(rule.find);
  logger?.info(`Found ${found.length} occurrences of ${rule.find}`);

  for (const [index, rect] of found.entries()) {
    editor.redact(rect);
    // The search text goes back in, not the replacement.
    const drawn = await editor.insertText(rule.find, { x: rect.x0, y: rect.y0 }, INSERTED_TEXT);
    if (drawn !== rule.find) {
      logger?.warn(`Drew ${drawn} for ${rule.find}; ${INSERTED_TEXT.font} cannot encode every character.`);
    }
    logger?.info(`Replaced instance ${index + 1} of ${rule.find} with ${rule.replacement}.`);
  }

  return found.length;
}

/**
 * Keeps only the first page of `input` and runs each active rule over it in order:
 * search, then redact and re-insert per occurrence.
 */
export async function substitutePdf(
  input: Uint8Array,
  rules: ReplacementRule[],
  logger?: RuntimeLogger,
): Promise<SubstitutionResult> {
  const doc = await loadDocument(input);
  selectFirstPage(doc);

  try {
    const editor = PageEditor.open(doc, doc.getPage(0));
    const reports: RuleReport[] = [];

    for (const rule of rules) {
      if (!isActive(rule)) {
        reports.push({ ...rule, occurrences: 0, skipped: true });
        continue;
      }
      const occurrences = await applyRule(editor, rule, logger);
      reports.push({ ...rule, occurrences, skipped: false });
    }

    editor.commit();
    const bytes = await doc.save();
    return { bytes, pageCount: doc.getPageCount(), rules: reports };
  } catch (err) {
    if (err instanceof RedlinerError) throw err;
    throw new SubstitutionRenderFailureError(`Text substitution failed: ${describeError(err)}`, {
      cause: err,
    });
  }
}

export function createSubstitutionEngine(options: SubstitutionEngineOptions): SubstitutionEngine {
  const { loadRules, logger, randomSuffix: makeSuffix = () => randomSuffix() } = options;

  return {
    withSubstitutedDocument: async (inputPath, use) => {
      const [input, rules] = await Promise.all([readFile(inputPath), loadRules()]);
      const result = await substitutePdf(input, rules, logger);

      return withScopedTempDir('redliner-out', async (dir) => {
        const outputPath = path.join(dir, buildOutputFileName(inputPath, makeSuffix()));
        await writeFile(outputPath, result.bytes);
        logger?.debug('document written', {
          outputPath,
          pageCount: result.pageCount,
          rules: result.rules.map(({ find, occurrences, skipped }) => ({ find, occurrences, skipped })),
        });
        return use(outputPath);
      });
    },
  };
}

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { RULES_FILE, TOKEN_FILE, USER_ID_FILE } from '../runtime/botConfig.js';
import { formatCheckResult, runConfigChecks } from './configCheck.js';

describe('runConfigChecks', () => {
  let botHome = '';

  beforeEach(async () => {
    botHome = await mkdtemp(path.join(tmpdir(), 'redliner-doctor-test-'));
  });

  afterEach(async () => {
    await rm(botHome, { recursive: true, force: true });
  });

  const write = (name: string, contents: string) => writeFile(path.join(botHome, name), contents, 'utf8');

  it('passes a complete configuration', async () => {
    await write(TOKEN_FILE, 'test-token');
    await write(USER_ID_FILE, '4242');
    await write(RULES_FILE, '- replace: Invoice\n  with: Receipt\n- replace: Total\n');

    const results = await runConfigChecks({ botHome, logDir: path.join(botHome, 'logs') });

    expect(results.map((result) => [result.label, result.status])).toEqual([
      ['bot token', 'OK'],
      ['authorized user', 'OK'],
      ['replacement rules', 'OK'],
      ['log dir writable', 'OK'],
    ]);
    expect(results[2].details).toBe('1 active, 1 skipped (missing replace/with)');
  });

  it('fails missing files and warns about an empty rule list', async () => {
    await write(RULES_FILE, '');

    const results = await runConfigChecks({ botHome, logDir: path.join(botHome, 'logs') });

    expect(results.map((result) => result.status)).toEqual(['FAIL', 'FAIL', 'WARN', 'OK']);
  });
});

describe('formatCheckResult', () => {
  it('prints the status, label and details', () => {
    expect(formatCheckResult({ status: 'WARN', label: 'replacement rules', details: 'none' })).toBe(
      '[WARN] replacement rules — none',
    );
    expect(formatCheckResult({ status: 'OK', label: 'bot token' })).toBe('[OK] bot token');
  });
});

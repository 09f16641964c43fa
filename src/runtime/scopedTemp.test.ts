import { existsSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { withScopedTempDir } from './scopedTemp.js';

describe('withScopedTempDir', () => {
  it('provides a fresh directory and removes it with its files', async () => {
    let seen = '';

    const result = await withScopedTempDir('redliner-test', async (dir) => {
      seen = dir;
      await writeFile(path.join(dir, 'a.pdf'), 'x');
      expect(existsSync(dir)).toBe(true);
      return 'done';
    });

    expect(result).toBe('done');
    expect(path.basename(seen).startsWith('redliner-test-')).toBe(true);
    expect(existsSync(seen)).toBe(false);
  });

  it('removes the directory when the callback throws', async () => {
    let seen = '';

    await expect(
      withScopedTempDir('redliner-test', async (dir) => {
        seen = dir;
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(existsSync(seen)).toBe(false);
  });
});

import { describe, expect, it } from 'vitest';

import { DownloadFailedError } from '../runtime/errors.js';
import { normalizeLevel, serializeError } from './runtimeLogger.js';

describe('normalizeLevel', () => {
  it('accepts known levels in any case', () => {
    expect(normalizeLevel('DEBUG')).toBe('debug');
    expect(normalizeLevel('warn')).toBe('warn');
  });

  it('falls back to info', () => {
    expect(normalizeLevel(undefined)).toBe('info');
    expect(normalizeLevel('verbose')).toBe('info');
  });
});

describe('serializeError', () => {
  it('keeps the error code and cause chain', () => {
    const err = new DownloadFailedError('Failed to download Telegram file (404).', { cause: new Error('not found') });
    const serialized = serializeError(err);

    expect(typeof serialized === 'object' ? serialized.code : null).toBe('download_failed');
    expect(typeof serialized === 'object' ? serialized.name : null).toBe('DownloadFailedError');
    expect(typeof serialized === 'object' && typeof serialized.cause === 'object' ? serialized.cause.message : null).toBe(
      'not found',
    );
  });

  it('stringifies non-errors', () => {
    expect(serializeError(42)).toBe('42');
  });
});

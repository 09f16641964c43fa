import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { describe, expect, it, vi } from 'vitest';

import { DownloadFailedError } from '../../runtime/errors.js';
import { createDocumentFetcher, toLocalFileName } from './documentFetcher.js';

const PDF_BYTES = Uint8Array.from([0x25, 0x50, 0x44, 0x46]);

const makeFetch = (response: () => Response) => vi.fn(async (_input: string | URL | Request) => response());

describe('createDocumentFetcher', () => {
  it('downloads into a temp file named after the document', async () => {
    const fetchImpl = makeFetch(() => new Response(PDF_BYTES));
    const getFile = vi.fn(async (_fileId: string) => ({ file_path: 'documents/file_1.pdf' }));
    const fetcher = createDocumentFetcher({ token: 'test-token', getFile, fetchImpl });
    let seen = '';

    const contents = await fetcher.withDocument({ fileId: 'file-1', fileName: 'invoice.pdf' }, async (filePath) => {
      seen = filePath;
      return Array.from(await readFile(filePath));
    });

    expect(getFile).toHaveBeenCalledWith('file-1');
    expect(fetchImpl).toHaveBeenCalledWith('https://api.telegram.org/file/bottest-token/documents/file_1.pdf');
    expect(path.basename(seen)).toBe('invoice.pdf');
    expect(contents).toEqual(Array.from(PDF_BYTES));
    expect(existsSync(path.dirname(seen))).toBe(false);
  });

  it('honours a custom API root', async () => {
    const fetchImpl = makeFetch(() => new Response(PDF_BYTES));
    const fetcher = createDocumentFetcher({
      token: 'test-token',
      getFile: async () => ({ file_path: 'documents/a.pdf' }),
      fetchImpl,
      apiRoot: 'http://localhost:8081',
    });

    await fetcher.withDocument({ fileId: 'file-1', fileName: 'a.pdf' }, async () => undefined);

    expect(fetchImpl).toHaveBeenCalledWith('http://localhost:8081/file/bottest-token/documents/a.pdf');
  });

  it('fails when getFile rejects', async () => {
    const use = vi.fn(async () => undefined);
    const fetcher = createDocumentFetcher({
      token: 'test-token',
      getFile: async () => {
        throw new Error('file is too big');
      },
      fetchImpl: makeFetch(() => new Response(PDF_BYTES)),
    });

    await expect(fetcher.withDocument({ fileId: 'file-1', fileName: 'a.pdf' }, use)).rejects.toThrow(
      'Telegram getFile failed: file is too big',
    );
    expect(use).not.toHaveBeenCalled();
  });

  it('fails when Telegram returns no file path', async () => {
    const fetcher = createDocumentFetcher({
      token: 'test-token',
      getFile: async () => ({}),
      fetchImpl: makeFetch(() => new Response(PDF_BYTES)),
    });

    await expect(
      fetcher.withDocument({ fileId: 'file-1', fileName: 'a.pdf' }, async () => undefined),
    ).rejects.toBeInstanceOf(DownloadFailedError);
  });

  it('fails on a non-success status', async () => {
    const fetcher = createDocumentFetcher({
      token: 'test-token',
      getFile: async () => ({ file_path: 'documents/a.pdf' }),
      fetchImpl: makeFetch(() => new Response('missing', { status: 404 })),
    });

    await expect(
      fetcher.withDocument({ fileId: 'file-1', fileName: 'a.pdf' }, async () => undefined),
    ).rejects.toThrow('Failed to download Telegram file (404).');
  });

  it('wraps transport errors', async () => {
    const fetcher = createDocumentFetcher({
      token: 'test-token',
      getFile: async () => ({ file_path: 'documents/a.pdf' }),
      fetchImpl: vi.fn(async () => {
        throw new Error('socket hang up');
      }),
    });

    const err = await fetcher
      .withDocument({ fileId: 'file-1', fileName: 'a.pdf' }, async () => undefined)
      .catch((error: unknown) => error);

    expect(err).toBeInstanceOf(DownloadFailedError);
    expect(err instanceof Error ? err.message : '').toBe('Failed to download Telegram file: socket hang up');
  });

  it('passes consumer errors through unchanged and still cleans up', async () => {
    const fetcher = createDocumentFetcher({
      token: 'test-token',
      getFile: async () => ({ file_path: 'documents/a.pdf' }),
      fetchImpl: makeFetch(() => new Response(PDF_BYTES)),
    });
    const failure = new Error('render failed');
    let seen = '';

    await expect(
      fetcher.withDocument({ fileId: 'file-1', fileName: 'a.pdf' }, async (filePath) => {
        seen = filePath;
        throw failure;
      }),
    ).rejects.toBe(failure);
    expect(existsSync(path.dirname(seen))).toBe(false);
  });
});

describe('toLocalFileName', () => {
  it('keeps only the last path segment', () => {
    expect(toLocalFileName('../../etc/passwd')).toBe('passwd');
    expect(toLocalFileName('a\\b\\c.pdf')).toBe('c.pdf');
  });

  it('falls back for empty or dot names', () => {
    expect(toLocalFileName('')).toBe('document.pdf');
    expect(toLocalFileName('..')).toBe('document.pdf');
  });
});

import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { DownloadFailedError, describeError } from '../../runtime/errors.js';
import { withScopedTempDir } from '../../runtime/scopedTemp.js';
import type { RuntimeLogger } from '../../utils/runtimeLogger.js';

export const TELEGRAM_API_ROOT = 'https://api.telegram.org';

export type DocumentReference = {
  fileId: string;
  fileName: string;
};

export type DocumentFetcher = {
  /**
   * Downloads the document into a private temp dir and hands its path to `use`. The dir is
   * removed once `use` settles.
   */
  withDocument: <T>(reference: DocumentReference, use: (filePath: string) => Promise<T>) => Promise<T>;
};

export type DocumentFetcherOptions = {
  token: string;
  getFile: (fileId: string) => Promise<{ file_path?: string }>;
  fetchImpl?: typeof fetch;
  apiRoot?: string;
  logger?: RuntimeLogger;
};

/** Keeps only the last path segment of a sender-supplied name. */
export function toLocalFileName(fileName: string): string {
  const base = path.basename(fileName.replace(/\\/g, '/')).trim();
  return base && base !== '.' && base !== '..' ? base : 'document.pdf';
}

export function createDocumentFetcher(options: DocumentFetcherOptions): DocumentFetcher {
  const { token, getFile, fetchImpl = fetch, apiRoot = TELEGRAM_API_ROOT, logger } = options;

  const resolveRemotePath = async (fileId: string): Promise<string> => {
    let file: { file_path?: string };
    try {
      file = await getFile(fileId);
    } catch (err) {
      throw new DownloadFailedError(`Telegram getFile failed: ${describeError(err)}`, { cause: err });
    }

    if (!file.file_path) {
      throw new DownloadFailedError('Telegram file path is missing from getFile response.');
    }
    return file.file_path;
  };

  const download = async (fileId: string, location: string): Promise<number> => {
    const remotePath = await resolveRemotePath(fileId);

    let response: Response;
    try {
      response = await fetchImpl(`${apiRoot}/file/bot${token}/${remotePath}`);
    } catch (err) {
      throw new DownloadFailedError(`Failed to download Telegram file: ${describeError(err)}`, {
        cause: err,
      });
    }
    if (!response.ok) {
      throw new DownloadFailedError(`Failed to download Telegram file (${response.status}).`);
    }

    try {
      const bytes = new Uint8Array(await response.arrayBuffer());
      await writeFile(location, bytes);
      return bytes.byteLength;
    } catch (err) {
      throw new DownloadFailedError(`Failed to store Telegram file: ${describeError(err)}`, {
        cause: err,
      });
    }
  };

  return {
    withDocument: (reference, use) =>
      withScopedTempDir('redliner-in', async (dir) => {
        const location = path.join(dir, toLocalFileName(reference.fileName));
        const sizeBytes = await download(reference.fileId, location);
        logger?.debug('document downloaded', { fileId: reference.fileId, sizeBytes });
        return use(location);
      }),
  };
}

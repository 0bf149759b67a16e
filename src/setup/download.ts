import { open, rename } from 'node:fs/promises';
import path from 'node:path';

import { DownloadError, errorMessage } from '@/setup/errors';
import { ensureDirectory, removePath } from '@/setup/tree';
import type { Downloader, DownloadProgress, DownloadRequest } from '@/setup/types';

export const DEFAULT_USER_AGENT = 'devkit-setup/0.1';

const parseContentLength = (value: string | null): number | null => {
  if (!value || !/^\d+$/.test(value.trim())) {
    return null;
  }
  return Number(value.trim());
};

/**
 * Streams `url` into `<destination>.part` and renames it into place once the body is
 * complete, so an interrupted transfer never leaves a truncated file at `destination`.
 */
export const createFetchDownloader =
  (options: { userAgent?: string } = {}): Downloader =>
  async (request: DownloadRequest, onProgress: (progress: DownloadProgress) => void) => {
    const { url, destination, label } = request;
    const partial = `${destination}.part`;

    await ensureDirectory(path.dirname(destination));
    await removePath(partial);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { 'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT, Accept: '*/*' },
        redirect: 'follow',
      });
    } catch (error) {
      throw new DownloadError(url, `Network error while downloading:\n${url}\n${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response.ok || !response.body) {
      await response.body?.cancel().catch(() => undefined);
      throw new DownloadError(url, `HTTP ${response.status} while downloading:\n${url}`);
    }

    const totalBytes = parseContentLength(response.headers.get('content-length'));
    const reader = response.body.getReader();
    const file = await open(partial, 'w');
    let bytesReceived = 0;

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          break;
        }
        await file.write(value);
        bytesReceived += value.byteLength;
        onProgress({ label, bytesReceived, totalBytes });
      }
    } catch (error) {
      await reader.cancel().catch(() => undefined);
      await file.close();
      await removePath(partial);
      throw new DownloadError(url, `Transfer interrupted while downloading:\n${url}\n${errorMessage(error)}`, {
        cause: error,
      });
    }

    await file.close();
    await removePath(destination);
    await rename(partial, destination);
  };

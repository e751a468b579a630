import debug from 'debug';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { randomUUID } from 'crypto';
import { DownloadError } from './errors';
import type { TDownload, TFetch } from './types';

type TDownloadPackageOptions = {
  url: string;
  fetch: TFetch;
  bufferSize: number;
  onProgress?: (fraction: number) => void;
  destDir?: string;
};

const getDownloadsDir = () => path.join(os.tmpdir(), 'natives-bootstrap');

// release notes may link packages without a scheme
const withScheme = (url: string) =>
  /^www\./i.test(url) ? `https://${url}` : url;

const getArchiveName = (url: string) => {
  const fileName = path.posix.basename(new URL(url).pathname);
  const extension = fileName.toLowerCase().endsWith('.tar.gz')
    ? '.tar.gz'
    : path.extname(fileName);

  return `package-${randomUUID()}${extension}`;
};

const resolvePackageUrl = async (download: TDownload): Promise<string> => {
  if (!download.transform) {
    return download.url;
  }

  debug('natives:downloader')(`Requesting ${download.url}`);

  const response = await download.fetch(download.url, {
    headers: download.headers
  });

  if (!response.ok) {
    throw new DownloadError(download.url, response.status, response.statusText);
  }

  return download.transform(download.fetch, response);
};

const downloadPackage = async ({
  url,
  fetch,
  bufferSize,
  onProgress,
  destDir = getDownloadsDir()
}: TDownloadPackageOptions): Promise<string> => {
  const target = withScheme(url);

  debug('natives:downloader')(`Downloading package from ${target}`);

  const response = await fetch(target);

  if (!response.ok) {
    throw new DownloadError(target, response.status, response.statusText);
  }

  if (!response.body) {
    throw new Error(`Response body is empty: ${target}`);
  }

  await fs.mkdir(destDir, { recursive: true });

  const archivePath = path.join(destDir, getArchiveName(target));
  const totalSize = parseInt(response.headers.get('content-length') ?? '0', 10);
  const handle = await fs.open(archivePath, 'w');
  const reader = response.body.getReader();

  let received = 0;
  let lastReported = -1;
  let pending: Uint8Array[] = [];
  let pendingSize = 0;

  const flush = async () => {
    if (pendingSize === 0) return;

    await handle.write(Buffer.concat(pending, pendingSize));
    pending = [];
    pendingSize = 0;
  };

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      pending.push(value);
      pendingSize += value.byteLength;
      received += value.byteLength;

      if (pendingSize >= bufferSize) {
        await flush();
      }

      if (onProgress && totalSize > 0) {
        const fraction = Math.min(received / totalSize, 1);

        if (fraction !== lastReported) {
          lastReported = fraction;
          onProgress(fraction);
        }
      }
    }

    await flush();
  } catch (error) {
    await reader.cancel(error).catch((cancelError: unknown) =>
      debug('natives:downloader')(
        `Could not cancel the response body: ${cancelError instanceof Error ? cancelError.message : String(cancelError)}`
      )
    );
    await handle.close();
    await fs.rm(archivePath, { force: true });
    throw error;
  }

  await handle.close();

  if (lastReported !== 1) {
    onProgress?.(1);
  }

  debug('natives:downloader')(
    `Downloaded ${received} bytes to ${archivePath}`
  );

  return archivePath;
};

export { downloadPackage, getDownloadsDir, resolvePackageUrl };
export type { TDownloadPackageOptions };

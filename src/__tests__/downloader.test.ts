import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { customDownload } from '../download';
import { downloadPackage, resolvePackageUrl } from '../downloader';
import { DownloadError } from '../errors';

async function* chunks(...parts: number[][]) {
  for (const part of parts) {
    yield new Uint8Array(part);
  }
}

describe('resolvePackageUrl', () => {
  it('returns the url directly without a transform', async () => {
    const fetch = vi.fn();
    const download = customDownload({
      url: 'https://example.com/cef_linux_x64.tar.gz',
      fetch
    });

    await expect(resolvePackageUrl(download)).resolves.toBe(
      'https://example.com/cef_linux_x64.tar.gz'
    );
    expect(fetch).not.toHaveBeenCalled();
  });

  it('hands the initial response to the transform', async () => {
    const response = new Response('{}');
    const fetch = vi.fn(async () => response);
    const transform = vi.fn(async () => 'https://example.com/pkg.tar.gz');
    const download = customDownload({
      url: 'https://api.example.com/release',
      headers: { Accept: 'application/json' },
      fetch,
      transform
    });

    await expect(resolvePackageUrl(download)).resolves.toBe(
      'https://example.com/pkg.tar.gz'
    );
    expect(fetch).toHaveBeenCalledWith('https://api.example.com/release', {
      headers: { Accept: 'application/json' }
    });
    expect(transform).toHaveBeenCalledWith(fetch, response);
  });

  it('fails on an unsuccessful response', async () => {
    const download = customDownload({
      url: 'https://api.example.com/release',
      fetch: async () =>
        new Response('missing', { status: 404, statusText: 'Not Found' }),
      transform: vi.fn()
    });

    await expect(resolvePackageUrl(download)).rejects.toThrow(
      'Error fetching https://api.example.com/release: 404 Not Found'
    );
  });
});

describe('downloadPackage', () => {
  let destDir: string;

  beforeEach(async () => {
    destDir = await fs.mkdtemp(path.join(os.tmpdir(), 'natives-download-'));
  });

  afterEach(async () => {
    await fs.rm(destDir, { recursive: true, force: true });
  });

  it('writes the body to an archive file and reports progress', async () => {
    const progress: number[] = [];
    const archivePath = await downloadPackage({
      url: 'https://example.com/files/cef_linux_x64.tar.gz',
      fetch: async () =>
        new Response(chunks([1, 2, 3], [4, 5, 6, 7, 8]), {
          headers: { 'content-length': '8' }
        }),
      bufferSize: 4,
      onProgress: (fraction) => progress.push(fraction),
      destDir
    });

    expect(path.dirname(archivePath)).toBe(destDir);
    expect(path.basename(archivePath)).toMatch(/^package-.+\.tar\.gz$/);
    expect([...(await fs.readFile(archivePath))]).toEqual([
      1, 2, 3, 4, 5, 6, 7, 8
    ]);
    expect(progress.at(-1)).toBe(1);
    expect(progress.every((fraction) => fraction > 0 && fraction <= 1)).toBe(
      true
    );
  });

  it('reports completion when the size is unknown', async () => {
    const progress: number[] = [];

    await downloadPackage({
      url: 'https://example.com/cef.zip',
      fetch: async () => new Response(chunks([1, 2], [3])),
      bufferSize: 1024,
      onProgress: (fraction) => progress.push(fraction),
      destDir
    });

    expect(progress).toEqual([1]);
  });

  it('adds a scheme to links found without one', async () => {
    const fetch = vi.fn(async (_url: string) => new Response(chunks([1])));

    await downloadPackage({
      url: 'www.example.com/cef_linux_x64.tar.gz',
      fetch,
      bufferSize: 1024,
      destDir
    });

    expect(fetch).toHaveBeenCalledWith(
      'https://www.example.com/cef_linux_x64.tar.gz'
    );
  });

  it('cancels the body and removes the archive when the transfer fails', async () => {
    const failure = new Error('disk full');
    const cancel = vi.fn();
    const body = new ReadableStream<Uint8Array>({
      pull: (controller) => controller.enqueue(new Uint8Array([1, 2, 3, 4])),
      cancel
    });

    const promise = downloadPackage({
      url: 'https://example.com/cef_linux_x64.tar.gz',
      fetch: async () =>
        new Response(body, { headers: { 'content-length': '64' } }),
      bufferSize: 4,
      onProgress: () => {
        throw failure;
      },
      destDir
    });

    await expect(promise).rejects.toBe(failure);
    expect(cancel).toHaveBeenCalledWith(failure);
    expect(await fs.readdir(destDir)).toEqual([]);
  });

  it('fails on an unsuccessful response', async () => {
    const promise = downloadPackage({
      url: 'https://example.com/cef.tar.gz',
      fetch: async () =>
        new Response('gone', { status: 410, statusText: 'Gone' }),
      bufferSize: 1024,
      destDir
    });

    await expect(promise).rejects.toBeInstanceOf(DownloadError);
    await expect(promise).rejects.toMatchObject({
      url: 'https://example.com/cef.tar.gz',
      status: 410
    });
    expect(await fs.readdir(destDir)).toEqual([]);
  });
});

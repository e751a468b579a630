import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import * as tar from 'tar';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { extractArchive, flattenTopLevelDir } from '../extractor';

const writeFiles = async (root: string, files: Record<string, string>) => {
  for (const [file, content] of Object.entries(files)) {
    const target = path.join(root, file);

    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
};

const list = async (dir: string) => (await fs.readdir(dir)).sort();

describe('flattenTopLevelDir', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'natives-flatten-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('moves the content of a single wrapping directory up', async () => {
    await writeFiles(dir, {
      'jcef_bundle/lib/libcef.so': 'native',
      'jcef_bundle/README': 'readme'
    });

    await expect(flattenTopLevelDir(dir)).resolves.toBe(true);
    expect(await list(dir)).toEqual(['README', 'lib']);
    expect(await fs.readFile(path.join(dir, 'lib', 'libcef.so'), 'utf8')).toBe(
      'native'
    );
  });

  it('ignores the lock file when looking for a wrapper', async () => {
    await writeFiles(dir, {
      'install.lock': '',
      'jcef_bundle/libcef.so': 'native'
    });

    await expect(flattenTopLevelDir(dir)).resolves.toBe(true);
    expect(await list(dir)).toEqual(['install.lock', 'libcef.so']);
  });

  it('leaves several top-level entries alone', async () => {
    await writeFiles(dir, {
      'lib/libcef.so': 'native',
      'bin/helper': 'helper'
    });

    await expect(flattenTopLevelDir(dir)).resolves.toBe(false);
    expect(await list(dir)).toEqual(['bin', 'lib']);
  });

  it('leaves a single file alone', async () => {
    await writeFiles(dir, { 'libcef.so': 'native' });

    await expect(flattenTopLevelDir(dir)).resolves.toBe(false);
    expect(await list(dir)).toEqual(['libcef.so']);
  });

  it('handles a child named like its wrapper', async () => {
    await writeFiles(dir, {
      'bundle/bundle/libcef.so': 'native',
      'bundle/other': 'other'
    });

    await expect(flattenTopLevelDir(dir)).resolves.toBe(true);
    expect(await list(dir)).toEqual(['bundle', 'other']);
    expect(await list(path.join(dir, 'bundle'))).toEqual(['libcef.so']);
  });
});

describe('extractArchive', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'natives-extract-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('unpacks a gzipped tarball', async () => {
    const sourceDir = path.join(workDir, 'source');
    const destDir = path.join(workDir, 'dest');
    const archivePath = path.join(workDir, 'cef_linux_x64.tar.gz');

    await writeFiles(sourceDir, { 'jcef_bundle/lib/libcef.so': 'native' });
    await fs.chmod(path.join(sourceDir, 'jcef_bundle/lib/libcef.so'), 0o755);
    await fs.mkdir(destDir);
    await tar.c({ gzip: true, file: archivePath, cwd: sourceDir }, [
      'jcef_bundle'
    ]);

    await extractArchive(destDir, archivePath, 4096);

    const extracted = path.join(destDir, 'jcef_bundle', 'lib', 'libcef.so');

    expect(await fs.readFile(extracted, 'utf8')).toBe('native');
    expect((await fs.stat(extracted)).mode & 0o111).not.toBe(0);
  });
});

import debug from 'debug';
import fs from 'fs/promises';
import path from 'path';
import * as tar from 'tar';
import { INSTALL_LOCK } from './install-state';

const extractArchive = async (
  destDir: string,
  archivePath: string,
  bufferSize: number
): Promise<void> => {
  debug('natives:extractor')(`Extracting ${archivePath} into ${destDir}`);

  await tar.x({
    file: archivePath,
    cwd: destDir,
    maxReadSize: bufferSize
  });
};

/**
 * Archives usually wrap their content in one top-level directory. When that
 * directory is the only entry next to the lock file, its children move up one
 * level and the wrapper is removed. Any other layout is left as it is.
 */
const flattenTopLevelDir = async (destDir: string): Promise<boolean> => {
  const entries = (await fs.readdir(destDir, { withFileTypes: true })).filter(
    (entry) => entry.name !== INSTALL_LOCK
  );

  if (entries.length !== 1 || !entries[0].isDirectory()) {
    debug('natives:extractor')(`Nothing to flatten in ${destDir}`);

    return false;
  }

  const wrapperName = entries[0].name;
  let wrapperDir = path.join(destDir, wrapperName);
  const children = await fs.readdir(wrapperDir);

  // a child named like its wrapper would collide with it
  if (children.includes(wrapperName)) {
    const tempDir = path.join(destDir, `${wrapperName}.flatten-${Date.now()}`);

    await fs.rename(wrapperDir, tempDir);
    wrapperDir = tempDir;
  }

  for (const child of children) {
    await fs.rename(path.join(wrapperDir, child), path.join(destDir, child));
  }

  await fs.rmdir(wrapperDir);

  debug('natives:extractor')(
    `Flattened ${children.length} entries out of ${wrapperName}`
  );

  return true;
};

export { extractArchive, flattenTopLevelDir };

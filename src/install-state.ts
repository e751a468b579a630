import debug from 'debug';
import fs from 'fs/promises';
import path from 'path';

const INSTALL_LOCK = 'install.lock';

const getLockPath = (installDir: string) => path.join(installDir, INSTALL_LOCK);

const isInstalled = async (installDir: string): Promise<boolean> => {
  try {
    const stat = await fs.stat(getLockPath(installDir));

    return stat.isFile();
  } catch {
    return false;
  }
};

const markInstalled = async (installDir: string): Promise<boolean> => {
  try {
    await fs.writeFile(getLockPath(installDir), '');

    return true;
  } catch (error) {
    debug('natives:install-state')(
      `Failed to write ${INSTALL_LOCK}: ${error instanceof Error ? error.message : String(error)}`
    );

    return false;
  }
};

const resetInstallDir = async (installDir: string): Promise<void> => {
  debug('natives:install-state')(`Removing ${installDir}`);

  await fs.rm(installDir, { recursive: true, force: true });
};

const ensureInstallDir = async (installDir: string): Promise<boolean> => {
  try {
    await fs.mkdir(installDir, { recursive: true });

    return true;
  } catch (error) {
    debug('natives:install-state')(
      `Failed to create ${installDir}: ${error instanceof Error ? error.message : String(error)}`
    );

    return false;
  }
};

export {
  INSTALL_LOCK,
  ensureInstallDir,
  getLockPath,
  isInstalled,
  markInstalled,
  resetInstallDir
};

import debug from 'debug';
import fs from 'fs/promises';
import type { TBootstrapConfig } from './config';
import { downloadPackage, resolvePackageUrl } from './downloader';
import { InstallationDirectoryError, InstallationLockError } from './errors';
import { extractArchive, flattenTopLevelDir } from './extractor';
import {
  ensureInstallDir,
  getLockPath,
  isInstalled,
  markInstalled,
  resetInstallDir
} from './install-state';
import { getCurrentPlatform } from './platform';
import { unquarantine } from './quarantine';
import { EOperatingSystem, type TDownload, type TPlatform } from './types';

type TInstallSteps = {
  resolveUrl: (download: TDownload) => Promise<string>;
  download: (options: {
    url: string;
    fetch: TDownload['fetch'];
    bufferSize: number;
    onProgress: (fraction: number) => void;
  }) => Promise<string>;
  extract: (
    destDir: string,
    archivePath: string,
    bufferSize: number
  ) => Promise<void>;
  flatten: (destDir: string) => Promise<unknown>;
  unquarantine: (dir: string) => Promise<void>;
  getPlatform: () => TPlatform;
};

const defaultSteps: TInstallSteps = {
  resolveUrl: resolvePackageUrl,
  download: downloadPackage,
  extract: extractArchive,
  flatten: flattenTopLevelDir,
  unquarantine: (dir) => unquarantine(dir),
  getPlatform: getCurrentPlatform
};

class NativesInstaller {
  private readonly config: TBootstrapConfig;
  private readonly steps: TInstallSteps;
  private installed: boolean = false;
  private pending: Promise<void> | undefined;

  constructor(config: TBootstrapConfig, steps: Partial<TInstallSteps> = {}) {
    this.config = config;
    this.steps = { ...defaultSteps, ...steps };
  }

  public isInstalled = () => this.installed;

  /**
   * Idempotent. The lock file is written last, so a failed run leaves the
   * directory without it and the next call starts over from a wiped directory.
   * Overlapping calls share the run in flight.
   */
  public ensureInstalled = async (): Promise<void> => {
    if (this.installed) {
      return;
    }

    if (this.pending) {
      debug('natives:installer')('Installation already in progress, waiting...');

      return this.pending;
    }

    const pending = Promise.resolve().then(this.install);

    this.pending = pending;

    try {
      await pending;
    } finally {
      this.pending = undefined;
    }
  };

  private install = async (): Promise<void> => {
    const { installDir, download, extractBufferSize, progress } = this.config;

    progress.locating();

    if (await isInstalled(installDir)) {
      debug('natives:installer')(`Found existing installation in ${installDir}`);

      this.installed = true;
      return;
    }

    debug('natives:installer')(`Installing natives into ${installDir}`);

    await resetInstallDir(installDir);

    if (!(await ensureInstallDir(installDir))) {
      throw new InstallationDirectoryError(installDir);
    }

    progress.downloading(0);

    const url = await this.steps.resolveUrl(download);
    const archivePath = await this.steps.download({
      url,
      fetch: download.fetch,
      bufferSize: download.bufferSize,
      onProgress: progress.downloading
    });

    progress.extracting();

    await this.steps.extract(installDir, archivePath, extractBufferSize);
    await this.steps.flatten(installDir);
    await fs.rm(archivePath, { force: true });

    progress.install();

    if (this.steps.getPlatform().os === EOperatingSystem.MACOSX) {
      await this.steps.unquarantine(installDir);
    }

    if (!(await markInstalled(installDir))) {
      throw new InstallationLockError(getLockPath(installDir));
    }

    debug('natives:installer')('Installation complete');

    this.installed = true;
  };
}

export { NativesInstaller, defaultSteps };
export type { TInstallSteps };

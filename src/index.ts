export { NativesBootstrap } from './bootstrap';
export type { TBootstrapDeps, TGuardState } from './bootstrap';
export {
  DEFAULT_EXTRACT_BUFFER_SIZE,
  DEFAULT_INSTALL_DIR,
  validateConfig
} from './config';
export type { TBootstrapConfig, TBootstrapOptions } from './config';
export {
  DEFAULT_DOWNLOAD_BUFFER_SIZE,
  buildGithubReleaseUrl,
  createGithubTransform,
  customDownload,
  getGithubHeaders,
  githubDownload
} from './download';
export type { TCustomDownloadOptions, TGithubDownloadOptions } from './download';
export { downloadPackage, resolvePackageUrl } from './downloader';
export {
  ConfigError,
  DownloadError,
  ENativesErrorCode,
  InstallationDirectoryError,
  InstallationLockError,
  NativesError,
  UnsupportedPlatformError,
  UnsupportedPlatformPackageError
} from './errors';
export { extractArchive, flattenTopLevelDir } from './extractor';
export {
  INSTALL_LOCK,
  ensureInstallDir,
  isInstalled,
  markInstalled,
  resetInstallDir
} from './install-state';
export { NativesInstaller } from './installer';
export type { TInstallSteps } from './installer';
export { detectPlatform, getCurrentPlatform } from './platform';
export { createProgress } from './progress';
export { unquarantine } from './quarantine';
export { resolveReleaseAsset, toReleaseManifest } from './resolver';
export type { TResolveOptions } from './resolver';
export {
  EArchitecture,
  ELogSeverity,
  EOperatingSystem,
  ERuntimeState
} from './types';
export type {
  TDownload,
  TFetch,
  TNativeBridge,
  TNativeSettings,
  TNativeSettingsInput,
  TPlatform,
  TProgress,
  TReleaseAsset,
  TReleaseManifest,
  TRuntimeHandle,
  TTransform
} from './types';

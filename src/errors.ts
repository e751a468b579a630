import type { EArchitecture, EOperatingSystem } from './types';

enum ENativesErrorCode {
  INSTALLATION_DIRECTORY = 'INSTALLATION_DIRECTORY',
  INSTALLATION_LOCK = 'INSTALLATION_LOCK',
  UNSUPPORTED_PLATFORM_PACKAGE = 'UNSUPPORTED_PLATFORM_PACKAGE',
  UNSUPPORTED_PLATFORM = 'UNSUPPORTED_PLATFORM',
  DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
  CONFIG = 'CONFIG'
}

class NativesError extends Error {
  public readonly code: ENativesErrorCode;

  constructor(code: ENativesErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

class InstallationDirectoryError extends NativesError {
  constructor(public readonly directory: string) {
    super(
      ENativesErrorCode.INSTALLATION_DIRECTORY,
      `Could not create installation directory: ${directory}`
    );
  }
}

class InstallationLockError extends NativesError {
  constructor(public readonly lockPath: string) {
    super(
      ENativesErrorCode.INSTALLATION_LOCK,
      `Could not write installation lock: ${lockPath}`
    );
  }
}

class UnsupportedPlatformPackageError extends NativesError {
  constructor(
    public readonly os: EOperatingSystem,
    public readonly arch: EArchitecture
  ) {
    super(
      ENativesErrorCode.UNSUPPORTED_PLATFORM_PACKAGE,
      `No package available for platform ${os}-${arch}`
    );
  }
}

class UnsupportedPlatformError extends NativesError {
  constructor(
    public readonly platform: string,
    public readonly arch: string
  ) {
    super(
      ENativesErrorCode.UNSUPPORTED_PLATFORM,
      `Unsupported platform or architecture: ${platform}-${arch}`
    );
  }
}

class DownloadError extends NativesError {
  constructor(
    public readonly url: string,
    public readonly status: number,
    statusText: string
  ) {
    super(
      ENativesErrorCode.DOWNLOAD_FAILED,
      `Error fetching ${url}: ${status} ${statusText}`
    );
  }
}

class ConfigError extends NativesError {
  constructor(public readonly issues: string[]) {
    super(ENativesErrorCode.CONFIG, `Invalid options: ${issues.join('; ')}`);
  }
}

export {
  ConfigError,
  DownloadError,
  ENativesErrorCode,
  InstallationDirectoryError,
  InstallationLockError,
  NativesError,
  UnsupportedPlatformError,
  UnsupportedPlatformPackageError
};

import debug from 'debug';
import { UnsupportedPlatformError } from './errors';
import { EArchitecture, EOperatingSystem, type TPlatform } from './types';

const OS_TOKENS: Record<EOperatingSystem, readonly string[]> = {
  [EOperatingSystem.WINDOWS]: ['windows', 'win32', 'win64'],
  [EOperatingSystem.MACOSX]: ['macosx', 'macos', 'mac', 'osx', 'darwin'],
  [EOperatingSystem.LINUX]: ['linux']
};

const ARCH_TOKENS: Record<EArchitecture, readonly string[]> = {
  [EArchitecture.X86]: ['x86', 'i386', 'i686'],
  [EArchitecture.X64]: ['x64', 'amd64', 'x86_64'],
  [EArchitecture.ARM64]: ['arm64', 'aarch64'],
  [EArchitecture.ARM]: ['arm', 'armhf', 'armv7']
};

let currentPlatform: TPlatform | undefined;

const matchesAny = (text: string, tokens: readonly string[]): boolean => {
  const haystack = text.toLowerCase();

  return tokens.some((token) => haystack.includes(token.toLowerCase()));
};

const detectOperatingSystem = (platform: string): EOperatingSystem | undefined => {
  if (platform === 'win32') return EOperatingSystem.WINDOWS;
  if (platform === 'darwin') return EOperatingSystem.MACOSX;
  if (platform === 'linux') return EOperatingSystem.LINUX;

  return undefined;
};

const detectArchitecture = (arch: string): EArchitecture | undefined => {
  if (arch === 'ia32') return EArchitecture.X86;
  if (arch === 'x64') return EArchitecture.X64;
  if (arch === 'arm64') return EArchitecture.ARM64;
  if (arch === 'arm') return EArchitecture.ARM;

  return undefined;
};

const detectPlatform = (
  platform: string = process.platform,
  arch: string = process.arch
): TPlatform => {
  const os = detectOperatingSystem(platform);
  const architecture = detectArchitecture(arch);

  if (!os || !architecture) {
    throw new UnsupportedPlatformError(platform, arch);
  }

  return Object.freeze({ os, arch: architecture });
};

const getCurrentPlatform = (): TPlatform => {
  if (!currentPlatform) {
    currentPlatform = detectPlatform();

    debug('natives:platform')(
      `Current platform: ${currentPlatform.os}-${currentPlatform.arch}`
    );
  }

  return currentPlatform;
};

const getOsTokens = (platform: TPlatform) => OS_TOKENS[platform.os];

const getArchTokens = (platform: TPlatform) => ARCH_TOKENS[platform.arch];

export {
  ARCH_TOKENS,
  OS_TOKENS,
  detectPlatform,
  getArchTokens,
  getCurrentPlatform,
  getOsTokens,
  matchesAny
};

import debug from 'debug';
import { UnsupportedPlatformPackageError } from './errors';
import { getArchTokens, getOsTokens, matchesAny } from './platform';
import {
  zGithubRelease,
  type TPlatform,
  type TReleaseManifest
} from './types';

const URL_REGEX =
  /(https?:\/\/|www.)[-a-zA-Z0-9+&@#/%?=~_|!:.;]*[-a-zA-Z0-9+&@#/%=~_|]/g;

const DEFAULT_PACKAGE_MARKER = 'jcef';
const CHECKSUM_SUFFIX = '.checksum';
const SDK_MARKER = 'sdk';
const ARCHIVE_SUFFIX = '.tar.gz';

type TResolveOptions = {
  /** Token every package link in the release notes must contain. */
  packageMarker?: string;
};

const extractLinks = (text: string): string[] =>
  Array.from(text.matchAll(URL_REGEX), (match) => match[0]);

const findBodyCandidates = (body: string, packageMarker: string): string[] =>
  extractLinks(body)
    .filter(
      (link) =>
        link.trim().length > 0 &&
        !link.toLowerCase().endsWith(CHECKSUM_SUFFIX)
    )
    .filter((link) => matchesAny(link, [packageMarker]));

const findAssetCandidates = (
  manifest: TReleaseManifest,
  platform: TPlatform
): string[] => {
  const osTokens = getOsTokens(platform);
  const archTokens = getArchTokens(platform);

  return manifest.assets
    .filter(
      (asset) =>
        (matchesAny(asset.name, osTokens) ||
          matchesAny(asset.downloadUrl, osTokens)) &&
        (matchesAny(asset.name, archTokens) ||
          matchesAny(asset.downloadUrl, archTokens)) &&
        asset.downloadUrl.trim().length > 0
    )
    .map((asset) => asset.downloadUrl);
};

const rankPackage = (url: string): [number, number] => {
  const lower = url.toLowerCase();

  return [
    lower.includes(SDK_MARKER) ? 1 : 0,
    lower.endsWith(ARCHIVE_SUFFIX) ? 0 : 1
  ];
};

const comparePackages = (a: string, b: string): number => {
  const [sdkA, formatA] = rankPackage(a);
  const [sdkB, formatB] = rankPackage(b);

  return sdkA - sdkB || formatA - formatB;
};

/**
 * Picks the one package link matching the platform. Links in the release
 * notes are preferred, the structured asset list is the fallback when none of
 * them names the operating system. Plain builds rank before SDK builds and
 * `.tar.gz` archives before any other packaging.
 */
const resolveReleaseAsset = (
  manifest: TReleaseManifest,
  platform: TPlatform,
  options: TResolveOptions = {}
): string => {
  const packageMarker = options.packageMarker ?? DEFAULT_PACKAGE_MARKER;
  const osTokens = getOsTokens(platform);
  const archTokens = getArchTokens(platform);

  const osPackages = findBodyCandidates(manifest.body, packageMarker).filter(
    (url) => matchesAny(url, osTokens)
  );

  debug('natives:resolver')(
    `Found ${osPackages.length} package links for ${platform.os} in release notes`
  );

  // the asset fallback already matched the architecture on name or URL
  const platformPackages =
    osPackages.length > 0
      ? osPackages.filter((url) => matchesAny(url, archTokens))
      : findAssetCandidates(manifest, platform);

  if (platformPackages.length === 0) {
    throw new UnsupportedPlatformPackageError(platform.os, platform.arch);
  }

  const [selected] = [...platformPackages].sort(comparePackages);

  debug('natives:resolver')(`Selected package: ${selected}`);

  return selected;
};

const toReleaseManifest = (json: unknown): TReleaseManifest => {
  const release = zGithubRelease.parse(json);

  return {
    body: release.body,
    assets: release.assets.map((asset) => ({
      name: asset.name,
      downloadUrl: asset.browser_download_url
    }))
  };
};

export {
  DEFAULT_PACKAGE_MARKER,
  URL_REGEX,
  comparePackages,
  extractLinks,
  resolveReleaseAsset,
  toReleaseManifest
};
export type { TResolveOptions };

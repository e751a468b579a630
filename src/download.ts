import debug from 'debug';
import { getCurrentPlatform } from './platform';
import { resolveReleaseAsset, toReleaseManifest } from './resolver';
import type { TDownload, TFetch, TPlatform, TTransform } from './types';

const GITHUB_OWNER = 'JetBrains';
const GITHUB_REPO = 'JetBrainsRuntime';
const DEFAULT_DOWNLOAD_BUFFER_SIZE = 16 * 1024;

type TGithubDownloadOptions = {
  owner?: string;
  repo?: string;
  /** Pins a release tag, the latest release is used otherwise. */
  release?: string;
  packageMarker?: string;
  token?: string;
  fetch?: TFetch;
  bufferSize?: number;
  platform?: TPlatform;
};

type TCustomDownloadOptions = {
  url: string;
  transform?: TTransform;
  headers?: Record<string, string>;
  fetch?: TFetch;
  bufferSize?: number;
};

const getGithubHeaders = (token?: string): Record<string, string> => {
  const headers: Record<string, string> = {
    Accept: 'application/vnd.github+json',
    'X-GitHub-Api-Version': '2022-11-28'
  };

  if (token) {
    headers['Authorization'] = `Bearer ${token}`;
  }

  return headers;
};

const buildGithubReleaseUrl = (
  owner: string,
  repo: string,
  release?: string
) =>
  release
    ? `https://api.github.com/repos/${owner}/${repo}/releases/tags/${release}`
    : `https://api.github.com/repos/${owner}/${repo}/releases/latest`;

const createGithubTransform =
  (options: { packageMarker?: string; platform?: TPlatform } = {}): TTransform =>
  async (_fetch, initialResponse) => {
    const manifest = toReleaseManifest(await initialResponse.json());

    debug('natives:download')(
      `Release has ${manifest.assets.length} assets`
    );

    return resolveReleaseAsset(
      manifest,
      options.platform ?? getCurrentPlatform(),
      { packageMarker: options.packageMarker }
    );
  };

const resolveBufferSize = (size?: number) =>
  size !== undefined && size > 0 ? size : DEFAULT_DOWNLOAD_BUFFER_SIZE;

const githubDownload = (options: TGithubDownloadOptions = {}): TDownload => {
  const owner = options.owner ?? GITHUB_OWNER;
  const repo = options.repo ?? GITHUB_REPO;
  const url = buildGithubReleaseUrl(owner, repo, options.release);

  debug('natives:download')(`Using release source: ${url}`);

  return {
    url,
    fetch: options.fetch ?? fetch,
    headers: getGithubHeaders(options.token ?? process.env.GITHUB_TOKEN),
    transform: createGithubTransform({
      packageMarker: options.packageMarker,
      platform: options.platform
    }),
    bufferSize: resolveBufferSize(options.bufferSize)
  };
};

const customDownload = (options: TCustomDownloadOptions): TDownload => ({
  url: options.url,
  fetch: options.fetch ?? fetch,
  headers: options.headers ?? {},
  transform: options.transform,
  bufferSize: resolveBufferSize(options.bufferSize)
});

export {
  DEFAULT_DOWNLOAD_BUFFER_SIZE,
  GITHUB_OWNER,
  GITHUB_REPO,
  buildGithubReleaseUrl,
  createGithubTransform,
  customDownload,
  getGithubHeaders,
  githubDownload
};
export type { TCustomDownloadOptions, TGithubDownloadOptions };

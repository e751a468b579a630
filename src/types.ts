import z from 'zod';

enum EOperatingSystem {
  WINDOWS = 'windows',
  MACOSX = 'macosx',
  LINUX = 'linux'
}

enum EArchitecture {
  X86 = 'x86',
  X64 = 'x64',
  ARM64 = 'arm64',
  ARM = 'arm'
}

enum ERuntimeState {
  NEW = 'new',
  INITIALIZING = 'initializing',
  INITIALIZED = 'initialized',
  SHUTTING_DOWN = 'shutting_down',
  TERMINATED = 'terminated'
}

enum ELogSeverity {
  DEFAULT = 'default',
  VERBOSE = 'verbose',
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  FATAL = 'fatal',
  DISABLE = 'disable'
}

const zGithubAsset = z.object({
  name: z.string(),
  browser_download_url: z.string()
});

// unknown fields are stripped, newer API responses keep parsing
const zGithubRelease = z.object({
  tag_name: z.string().optional(),
  body: z
    .string()
    .nullish()
    .transform((body) => body ?? ''),
  assets: z.array(zGithubAsset).default([])
});

const zColor = z.object({
  alpha: z.number().int().min(0).max(255),
  red: z.number().int().min(0).max(255),
  green: z.number().int().min(0).max(255),
  blue: z.number().int().min(0).max(255)
});

const zNativeSettings = z.object({
  cachePath: z.string().optional(),
  backgroundColor: zColor.optional(),
  browserSubProcessPath: z.string().optional(),
  commandLineArgsDisabled: z.boolean().default(false),
  cookieableSchemesExcludeDefaults: z.boolean().default(false),
  cookieableSchemesList: z.string().optional(),
  javascriptFlags: z.string().optional(),
  locale: z.string().optional(),
  localesDirPath: z.string().optional(),
  logFile: z.string().optional(),
  logSeverity: z.enum(ELogSeverity).default(ELogSeverity.DEFAULT),
  packLoadingDisabled: z.boolean().default(false),
  persistSessionCookies: z.boolean().default(false),
  remoteDebuggingPort: z
    .number()
    .int()
    .refine((port) => port === 0 || (port >= 1024 && port <= 65535), {
      message: 'Remote debugging port must be 0 or between 1024 and 65535'
    })
    .default(0),
  resourcesDirPath: z.string().optional(),
  uncaughtExceptionStackSize: z.number().int().min(0).default(0),
  userAgent: z.string().optional(),
  userAgentProduct: z.string().optional(),
  windowlessRenderingEnabled: z.boolean().default(false),
  noSandbox: z.boolean().default(false)
});

type TPlatform = {
  readonly os: EOperatingSystem;
  readonly arch: EArchitecture;
};

type TReleaseAsset = {
  name: string;
  downloadUrl: string;
};

type TReleaseManifest = {
  body: string;
  assets: TReleaseAsset[];
};

type TGithubRelease = z.infer<typeof zGithubRelease>;
type TNativeSettings = z.infer<typeof zNativeSettings>;
type TNativeSettingsInput = z.input<typeof zNativeSettings>;

type TFetch = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Turns the response of the initial request into the package download link.
 */
type TTransform = (fetch: TFetch, initialResponse: Response) => Promise<string>;

type TDownload = {
  url: string;
  fetch: TFetch;
  headers: Record<string, string>;
  transform?: TTransform;
  bufferSize: number;
};

type TProgress = {
  locating: () => void;
  downloading: (fraction: number) => void;
  extracting: () => void;
  install: () => void;
  initializing: () => void;
  initialized: () => void;
};

type TRuntimeHandle = {
  dispose: () => void;
  onInitialization: (listener: (state: ERuntimeState) => void) => void;
};

/**
 * Entry points of the native layer. The library never loads native code on
 * its own, hosts provide this bridge.
 */
type TNativeBridge<H extends TRuntimeHandle = TRuntimeHandle> = {
  initialize: (
    installDir: string,
    args: readonly string[],
    settings: TNativeSettings
  ) => Promise<H>;
  loadLibrary: (name: string) => boolean;
  startup: (args: readonly string[]) => boolean;
  getInstanceIfAny: () => H | undefined;
  getInstance: (settings?: TNativeSettings) => H;
};

export {
  EArchitecture,
  ELogSeverity,
  EOperatingSystem,
  ERuntimeState,
  zColor,
  zGithubAsset,
  zGithubRelease,
  zNativeSettings
};
export type {
  TDownload,
  TFetch,
  TGithubRelease,
  TNativeBridge,
  TNativeSettings,
  TNativeSettingsInput,
  TPlatform,
  TProgress,
  TReleaseAsset,
  TReleaseManifest,
  TRuntimeHandle,
  TTransform
};

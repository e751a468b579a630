import path from 'path';
import z from 'zod';
import { githubDownload } from './download';
import { ConfigError } from './errors';
import { createProgress } from './progress';
import {
  zNativeSettings,
  type TDownload,
  type TNativeSettings,
  type TNativeSettingsInput,
  type TProgress
} from './types';

const DEFAULT_INSTALL_DIR = 'cef-bundle';
const DEFAULT_EXTRACT_BUFFER_SIZE = 4096;

const zBootstrapOptions = z.object({
  installDir: z.string().trim().min(1).optional(),
  args: z.array(z.string()).optional(),
  extraArgs: z.array(z.string()).default([]),
  settings: zNativeSettings.default(zNativeSettings.parse({})),
  extractBufferSize: z.number().int().optional()
});

type TBootstrapOptions = {
  installDir?: string;
  /** Replaces the default argument list. */
  args?: string[];
  /** Appended after `args`. */
  extraArgs?: string[];
  settings?: TNativeSettingsInput;
  extractBufferSize?: number;
  download?: TDownload;
  progress?: Partial<TProgress>;
};

type TBootstrapConfig = {
  readonly installDir: string;
  readonly args: readonly string[];
  readonly settings: Readonly<TNativeSettings>;
  readonly extractBufferSize: number;
  readonly download: TDownload;
  readonly progress: TProgress;
};

const formatIssues = (error: z.ZodError) =>
  error.issues.map(
    (issue) =>
      `${issue.path.length > 0 ? issue.path.map(String).join('.') : 'options'}: ${issue.message}`
  );

const validateConfig = (options: TBootstrapOptions = {}): TBootstrapConfig => {
  const result = zBootstrapOptions.safeParse(options);

  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }

  const data = result.data;
  const installDir =
    data.installDir ?? (process.env.NATIVES_INSTALL_DIR || DEFAULT_INSTALL_DIR);

  return Object.freeze({
    installDir: path.resolve(installDir),
    args: Object.freeze([...(data.args ?? []), ...data.extraArgs]),
    settings: Object.freeze(data.settings),
    extractBufferSize:
      data.extractBufferSize !== undefined && data.extractBufferSize > 0
        ? data.extractBufferSize
        : DEFAULT_EXTRACT_BUFFER_SIZE,
    download: options.download ?? githubDownload(),
    progress: createProgress(options.progress)
  });
};

export {
  DEFAULT_EXTRACT_BUFFER_SIZE,
  DEFAULT_INSTALL_DIR,
  validateConfig,
  zBootstrapOptions
};
export type { TBootstrapConfig, TBootstrapOptions };

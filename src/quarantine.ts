import { execFile } from 'child_process';
import debug from 'debug';
import { promisify } from 'util';

const QUARANTINE_ATTRIBUTE = 'com.apple.quarantine';

type TExec = (
  file: string,
  args: readonly string[]
) => Promise<{ stdout: string; stderr: string }>;

const execFileAsync: TExec = promisify(execFile);

const hasStderr = (error: unknown): error is { stderr: string } =>
  typeof error === 'object' &&
  error !== null &&
  'stderr' in error &&
  typeof error.stderr === 'string';

// xattr exits non-zero for every file that never carried the attribute
const onlyMissingAttributes = (stderr: string) => {
  const lines = stderr.split('\n').filter((line) => line.trim().length > 0);

  return (
    lines.length > 0 && lines.every((line) => line.includes('No such xattr'))
  );
};

/**
 * Clears the quarantine flag Gatekeeper puts on downloaded files, an unsigned
 * bundle refuses to load otherwise.
 */
const unquarantine = async (
  dir: string,
  exec: TExec = execFileAsync
): Promise<void> => {
  debug('natives:quarantine')(`Clearing ${QUARANTINE_ATTRIBUTE} on ${dir}`);

  try {
    await exec('xattr', ['-r', '-d', QUARANTINE_ATTRIBUTE, dir]);
  } catch (error) {
    if (hasStderr(error) && onlyMissingAttributes(error.stderr)) {
      debug('natives:quarantine')('Some files had no quarantine attribute');
      return;
    }

    throw error;
  }
};

export { QUARANTINE_ATTRIBUTE, unquarantine };
export type { TExec };

import type { TProgress } from './types';

const noop = () => {};

const createProgress = (overrides: Partial<TProgress> = {}): TProgress => ({
  locating: overrides.locating ?? noop,
  downloading: overrides.downloading ?? noop,
  extracting: overrides.extracting ?? noop,
  install: overrides.install ?? noop,
  initializing: overrides.initializing ?? noop,
  initialized: overrides.initialized ?? noop
});

export { createProgress };

/**
 * Build configuration constants
 */

import { LogLevel } from './types';

/** Default configuration values */
export const DEFAULT_CONFIG = {
  /** Output root when the configuration names none */
  DIST_DIR: 'dist',

  /** Entry point when a build names none */
  MAIN: '.',

  /** Tag used in templates when the checkout has none */
  TAG: 'v0.0.0',

  /** Default log level */
  LOG_LEVEL: LogLevel.Info,

  /** Toolchain command */
  COMPILER: 'go'
};

/** Target axes used when a build lists none */
export const DEFAULT_TARGET_AXES = {
  GOOS: ['linux', 'darwin'],
  GOARCH: ['amd64', '386'],
  GOARM: ['6']
} as const;

/** Platform file extensions, keyed by `os` or `os_arch` */
export const PLATFORM_EXTENSIONS: Readonly<Record<string, string>> = {
  windows: '.exe',
  js_wasm: '.wasm'
};

/** Environment variables that select the target of the toolchain */
export const TARGET_ENV = {
  OS: 'GOOS',
  ARCH: 'GOARCH',
  ARM: 'GOARM'
} as const;

/** Environment variables that affect the orchestrator itself */
export const ENV_VARS = {
  /** Overrides the log level */
  LOG_LEVEL: 'CROSSBUILD_LOG_LEVEL'
} as const;

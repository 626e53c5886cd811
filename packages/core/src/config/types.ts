/**
 * @fileoverview Project and build configuration types
 */

import { BuildError, BuildErrorCode } from '../errors';

/** Commands run around a build; carried through for the hook runner */
export interface BuildHooks {
  readonly pre?: string;
  readonly post?: string;
}

/** One buildable unit of a project */
export interface BuildConfig {
  /** Unique within a project */
  readonly id: string;
  /** Output base name; a template */
  readonly binary: string;
  /** Path or glob of the program entry point */
  readonly main: string;
  readonly goos: readonly string[];
  readonly goarch: readonly string[];
  readonly goarm: readonly string[];
  /** Resolved target identifiers; computed from goos/goarch/goarm when empty */
  readonly targets: readonly string[];
  readonly flags: readonly string[];
  readonly asmflags: readonly string[];
  readonly gcflags: readonly string[];
  readonly ldflags: readonly string[];
  /** `KEY=VALUE` entries merged into the toolchain environment */
  readonly env: readonly string[];
  readonly hooks?: BuildHooks;
}

/** A loaded project configuration */
export interface ProjectConfig {
  readonly projectName: string;
  /** Output root for produced binaries */
  readonly dist: string;
  /** `KEY=VALUE` entries added to the run environment */
  readonly env: readonly string[];
  readonly builds: readonly BuildConfig[];
}

/**
 * Create a build configuration, filling every list with an empty one
 */
export function createBuildConfig(
  fields: Partial<BuildConfig> & Pick<BuildConfig, 'id'>
): BuildConfig {
  return {
    binary: fields.id,
    main: '',
    goos: [],
    goarch: [],
    goarm: [],
    targets: [],
    flags: [],
    asmflags: [],
    gcflags: [],
    ldflags: [],
    env: [],
    ...fields,
  };
}

/**
 * Split `KEY=VALUE` entries into a map; later entries win
 */
export function parseEnvEntries(entries: readonly string[]): Record<string, string> {
  const env: Record<string, string> = {};
  for (const entry of entries) {
    const separator = entry.indexOf('=');
    if (separator <= 0) {
      throw new BuildError(
        BuildErrorCode.InvalidConfig,
        `invalid env entry '${entry}': expected KEY=VALUE`
      );
    }
    env[entry.slice(0, separator)] = entry.slice(separator + 1);
  }
  return env;
}

/**
 * @fileoverview Project configuration loading and defaulting
 */

import { existsSync, readFileSync } from 'fs';
import { basename, dirname, join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { BuildError, BuildErrorCode, errorMessage } from '../errors';
import { formatIssues, ProjectConfigSchema, RawBuildConfig, RawProjectConfig } from './schema';
import { BuildConfig, ProjectConfig } from './types';

/** File names looked up, in order, when no path is given */
export const CONFIG_FILE_NAMES = [
  '.crossbuild.yml',
  '.crossbuild.yaml',
  'crossbuild.yml',
  'crossbuild.yaml',
] as const;

/** Default output root */
export const DEFAULT_DIST = 'dist';

/**
 * Find the configuration file in a directory
 */
export function findConfig(dir: string): string {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(resolve(dir), name);
    if (existsSync(candidate)) {
      return candidate;
    }
  }

  throw new BuildError(
    BuildErrorCode.ConfigNotFound,
    `no configuration file found in ${resolve(dir)} (looked for ${CONFIG_FILE_NAMES.join(', ')})`
  );
}

/**
 * Load, validate and default a configuration file
 */
export function loadConfig(configPath: string): ProjectConfig {
  if (!existsSync(configPath)) {
    throw new BuildError(BuildErrorCode.ConfigNotFound, `config file not found: ${configPath}`);
  }

  const source = readFileSync(configPath, 'utf-8');
  return parseConfig(source, {
    projectName: basename(dirname(resolve(configPath))),
    source: configPath,
  });
}

/**
 * Parse configuration text
 */
export function parseConfig(
  source: string,
  options: { projectName: string; source?: string }
): ProjectConfig {
  const origin = options.source ?? 'configuration';

  let document: unknown;
  try {
    document = parseYaml(source);
  } catch (error) {
    throw new BuildError(
      BuildErrorCode.InvalidConfig,
      `failed to parse ${origin}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  const result = ProjectConfigSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new BuildError(
      BuildErrorCode.InvalidConfig,
      `invalid ${origin}: ${formatIssues(result.error)}`,
      { cause: result.error }
    );
  }

  return applyProjectDefaults(result.data, options.projectName);
}

/**
 * Fill project level defaults and check build ids are unique
 */
export function applyProjectDefaults(
  raw: RawProjectConfig,
  fallbackName: string
): ProjectConfig {
  const projectName = raw.project_name ?? fallbackName;
  const rawBuilds: RawBuildConfig[] = raw.builds.length > 0 ? raw.builds : [emptyBuild()];
  const builds = rawBuilds.map(build => applyBuildDefaults(build, projectName));

  checkUniqueIds(builds);

  return {
    projectName,
    dist: raw.dist ?? DEFAULT_DIST,
    env: raw.env,
    builds,
  };
}

function applyBuildDefaults(raw: RawBuildConfig, projectName: string): BuildConfig {
  return {
    id: raw.id ?? projectName,
    binary: raw.binary ?? projectName,
    main: raw.main || '.',
    goos: raw.goos,
    goarch: raw.goarch,
    goarm: raw.goarm,
    targets: raw.targets,
    flags: raw.flags,
    asmflags: raw.asmflags,
    gcflags: raw.gcflags,
    ldflags: raw.ldflags,
    env: raw.env,
    ...(raw.hooks ? { hooks: raw.hooks } : {}),
  };
}

function emptyBuild(): RawBuildConfig {
  return {
    goos: [],
    goarch: [],
    goarm: [],
    targets: [],
    flags: [],
    asmflags: [],
    gcflags: [],
    ldflags: [],
    env: [],
  };
}

function checkUniqueIds(builds: readonly BuildConfig[]): void {
  const counts = new Map<string, number>();
  for (const build of builds) {
    counts.set(build.id, (counts.get(build.id) ?? 0) + 1);
  }

  for (const [id, count] of counts) {
    if (count > 1) {
      throw new BuildError(
        BuildErrorCode.InvalidConfig,
        `found ${count} builds with the ID '${id}', please fix your config`
      );
    }
  }
}

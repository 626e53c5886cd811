/**
 * Drives every build of a project over its target matrix
 */

import { join, resolve } from 'path';
import {
  BuildConfig,
  BuildError,
  BuildErrorCode,
  Context,
  isBuildError,
  ProjectConfig
} from '@crossbuild/core';
import { Builder } from './builder';
import { defaultPlatforms, extensionFor, isValidTarget, parseTarget, PlatformTable } from './targets';
import { TemplateRenderer } from './template';
import { BuildOptions, BuildReport } from './types';
import { createLogger } from './utils/logger';

const logger = createLogger('pipeline');

/** Options of a pipeline run */
export interface RunBuildsOptions {
  builder: Builder;
  /** Only run these build ids */
  ids?: readonly string[];
  /** Output root; defaults to the project's */
  dist?: string;
  /** Platform table used to name outputs; should match the builder's */
  platforms?: PlatformTable;
}

/**
 * Select the builds to run; unknown ids are configuration errors
 */
export function selectBuilds(
  project: ProjectConfig,
  ids: readonly string[] = []
): readonly BuildConfig[] {
  if (ids.length === 0) {
    return project.builds;
  }

  const known = new Set(project.builds.map(build => build.id));
  const unknown = ids.filter(id => !known.has(id));
  if (unknown.length > 0) {
    throw new BuildError(
      BuildErrorCode.InvalidConfig,
      `no builds with the ID ${unknown.map(id => `'${id}'`).join(', ')}`
    );
  }

  return project.builds.filter(build => ids.includes(build.id));
}

/**
 * Output name, path and extension for one target of a build
 */
export function buildOptionsFor(
  ctx: Context,
  build: BuildConfig,
  target: string,
  dist: string,
  platforms: PlatformTable = defaultPlatforms
): BuildOptions {
  let ext = '';
  let name = build.binary;

  if (isValidTarget(target, platforms)) {
    const parsed = parseTarget(target, platforms);
    ext = extensionFor(parsed);
    name = TemplateRenderer.forContext(ctx)
      .withArtifact({ target: parsed, name: build.binary })
      .apply(build.binary);
  }

  const fullName = name + ext;
  return {
    target,
    name: fullName,
    path: join(dist, `${build.id}_${target}`, fullName),
    ext
  };
}

/**
 * Build every target of the selected builds, one at a time. A failing
 * target is reported and the remaining targets still build.
 */
export async function runBuilds(
  ctx: Context,
  project: ProjectConfig,
  options: RunBuildsOptions
): Promise<BuildReport> {
  const { builder } = options;
  const dist = resolve(ctx.workingDir, options.dist ?? project.dist);
  const report: BuildReport = { built: [], failed: [] };

  for (const configured of selectBuilds(project, options.ids)) {
    const build = builder.withDefaults(configured);
    logger.info(`build ${build.id}: ${build.targets.length} targets`);

    for (const target of build.targets) {
      try {
        const buildOptions = buildOptionsFor(ctx, build, target, dist, options.platforms);
        const artifact = await builder.build(ctx, build, buildOptions);
        report.built.push({ buildId: build.id, target, path: artifact.path });
      } catch (error) {
        if (!isBuildError(error)) {
          throw error;
        }
        logger.failure(`${build.id} ${target}: ${error.message}`);
        report.failed.push({
          buildId: build.id,
          target,
          code: error.code,
          category: error.category,
          message: error.message
        });
      }
    }
  }

  return report;
}

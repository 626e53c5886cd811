/**
 * Per-target build invocation
 */

import {
  Artifact,
  BuildConfig,
  BuildError,
  BuildErrorCode,
  Context,
  errorMessage,
  isBuildError,
  parseEnvEntries
} from '@crossbuild/core';
import { DEFAULT_CONFIG } from './config';
import { resolveEntryPoint } from './entry-point';
import { FLAG_PREFIXES, joinLdflags, processFlags } from './flags';
import { recordArtifact } from './recorder';
import { defaultPlatforms, parseTarget, PlatformTable, platformEnv, withDefaults } from './targets';
import { TemplateRenderer } from './template';
import { Compiler, GoCompiler, Invocation } from './toolchain';
import { BuildOptions, Target } from './types';
import { createLogger } from './utils/logger';

const logger = createLogger('builder');

/**
 * Builds one target of a build configuration
 */
export interface Builder {
  /** Fill targets and entry point defaults */
  withDefaults(build: BuildConfig): BuildConfig;
  /** Build one target; resolves with the recorded artifact */
  build(ctx: Context, build: BuildConfig, options: BuildOptions): Promise<Artifact>;
}

/** Rendered flags of one target */
interface RenderedFlags {
  binary: string;
  flags: string[];
  asmflags: string[];
  gcflags: string[];
  ldflags?: string;
}

/**
 * Builds Go programs through an injected compiler
 */
export class GoBuilder implements Builder {
  constructor(
    private readonly compiler: Compiler = new GoCompiler(),
    private readonly platforms: PlatformTable = defaultPlatforms
  ) {}

  withDefaults(build: BuildConfig): BuildConfig {
    return withDefaults(build, this.platforms);
  }

  /**
   * Validate the target, render flags, resolve the entry point, run the
   * toolchain and record the artifact. Every failure is a BuildError
   * attributed to the target; no artifact is recorded on failure.
   */
  async build(ctx: Context, build: BuildConfig, options: BuildOptions): Promise<Artifact> {
    const startTime = Date.now();
    logger.step(`building ${build.id} for ${options.target}`);

    try {
      const target = parseTarget(options.target, this.platforms);
      const rendered = this.renderFlags(ctx, build, target, options);
      const entry = await resolveEntryPoint(build, ctx.workingDir);

      const invocation = this.createInvocation(ctx, build, target, options, rendered, entry.args);
      await this.compile(invocation);

      const artifact = recordArtifact(ctx, { build, target, options, binary: rendered.binary });
      logger.timing(`${build.id} ${options.target}`, startTime);
      logger.success(`built ${options.path}`);
      return artifact;
    } catch (error) {
      if (isBuildError(error)) {
        throw error.target ? error : error.forTarget(options.target);
      }
      throw error;
    }
  }

  /**
   * Render the binary name, then every flag category against the target
   */
  private renderFlags(
    ctx: Context,
    build: BuildConfig,
    target: Target,
    options: BuildOptions
  ): RenderedFlags {
    const renderer = TemplateRenderer.forContext(ctx);
    const binary = renderer.withArtifact({ target, name: options.name }).apply(build.binary);
    const artifactRenderer = renderer.withArtifact({ target, name: options.name, binary });

    return {
      binary,
      flags: processFlags(artifactRenderer, build.flags, ''),
      asmflags: processFlags(artifactRenderer, build.asmflags, FLAG_PREFIXES.ASM),
      gcflags: processFlags(artifactRenderer, build.gcflags, FLAG_PREFIXES.GC),
      ldflags: joinLdflags(processFlags(artifactRenderer, build.ldflags, ''))
    };
  }

  private createInvocation(
    ctx: Context,
    build: BuildConfig,
    target: Target,
    options: BuildOptions,
    rendered: RenderedFlags,
    entryArgs: string[]
  ): Invocation {
    const args = [
      'build',
      ...rendered.flags,
      ...rendered.asmflags,
      ...rendered.gcflags,
      ...(rendered.ldflags !== undefined ? [rendered.ldflags] : []),
      '-o',
      options.path,
      ...entryArgs
    ];

    return {
      command: DEFAULT_CONFIG.COMPILER,
      args,
      env: {
        ...ctx.env,
        ...parseEnvEntries(build.env),
        ...platformEnv(target)
      },
      cwd: ctx.workingDir
    };
  }

  private async compile(invocation: Invocation): Promise<void> {
    try {
      const output = await this.compiler.compile(invocation);
      if (output.stderr) {
        logger.debug(output.stderr.trimEnd());
      }
    } catch (error) {
      throw new BuildError(BuildErrorCode.ToolchainFailed, errorMessage(error), { cause: error });
    }
  }
}

/**
 * Records built binaries in the run's artifact registry
 */

import { Artifact, ArtifactType, BuildConfig, Context, createArtifact } from '@crossbuild/core';
import { BuildOptions, Target } from './types';

/** What a successful build knows about its output */
export interface BuiltBinary {
  build: BuildConfig;
  target: Target;
  options: BuildOptions;
  /** Rendered binary name, without extension */
  binary: string;
}

/**
 * Create the binary artifact for a successful build and append it to the registry
 */
export function recordArtifact(ctx: Context, built: BuiltBinary): Artifact {
  const artifact = createArtifact({
    name: built.options.name,
    path: built.options.path,
    goos: built.target.os,
    goarch: built.target.arch,
    goarm: built.target.arm,
    type: ArtifactType.Binary,
    extra: {
      Binary: built.binary,
      ID: built.build.id,
      Ext: built.options.ext
    }
  });

  ctx.artifacts.add(artifact);
  return artifact;
}

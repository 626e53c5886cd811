/**
 * @fileoverview Artifact records produced by a build run
 */

/** Kinds of artifacts a run can produce */
export enum ArtifactType {
  /** A compiled executable */
  Binary = 'Binary',
}

/**
 * Extra metadata attached to an artifact for downstream packaging.
 * Binaries produced by the builder always carry `Binary`, `ID` and `Ext`.
 */
export interface ArtifactExtra {
  readonly [key: string]: string;
}

/** Immutable description of one produced file */
export interface Artifact {
  /** Output name, extension included */
  readonly name: string;
  /** Filesystem path of the produced file */
  readonly path: string;
  readonly goos: string;
  readonly goarch: string;
  /** ARM variant, only set for arm targets that name one */
  readonly goarm?: string;
  readonly type: ArtifactType;
  readonly extra: ArtifactExtra;
}

/**
 * Create a frozen artifact record
 */
export function createArtifact(fields: Artifact): Artifact {
  const artifact: Artifact = {
    name: fields.name,
    path: fields.path,
    goos: fields.goos,
    goarch: fields.goarch,
    ...(fields.goarm ? { goarm: fields.goarm } : {}),
    type: fields.type,
    extra: Object.freeze({ ...fields.extra }),
  };
  return Object.freeze(artifact);
}

/**
 * Platform identifier of an artifact, in target identifier form
 */
export function artifactPlatform(artifact: Artifact): string {
  const base = `${artifact.goos}_${artifact.goarch}`;
  return artifact.goarm ? `${base}_${artifact.goarm}` : base;
}

/**
 * @fileoverview Run context threaded through every build operation
 */

import { ArtifactRegistry } from './artifacts/registry';

/** Version control metadata for the current checkout */
export interface GitInfo {
  /** Tag the checkout is on, empty when there is none */
  readonly currentTag: string;
  /** Full commit hash, empty outside a repository */
  readonly commit: string;
}

/**
 * Process-wide state for one run. Read by the template renderer and the
 * builder; the artifact registry is the only part that changes.
 */
export interface Context {
  readonly projectName: string;
  /** Release version, usually the tag without its leading `v` */
  readonly version: string;
  readonly git: GitInfo;
  /** Environment visible to templates and merged into toolchain invocations */
  readonly env: Readonly<Record<string, string>>;
  readonly artifacts: ArtifactRegistry;
  /** Project root; entry points resolve against it and the toolchain runs in it */
  readonly workingDir: string;
  /** Current time source */
  readonly clock: () => Date;
}

/** Options accepted by createContext */
export interface ContextOptions {
  projectName?: string;
  version?: string;
  git?: Partial<GitInfo>;
  env?: Readonly<Record<string, string>>;
  artifacts?: ArtifactRegistry;
  workingDir?: string;
  clock?: () => Date;
}

/**
 * Environment of the current process, without unset entries
 */
export function processEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}

/**
 * Version string derived from a tag: `v1.2.3` becomes `1.2.3`
 */
export function versionFromTag(tag: string): string {
  return tag.startsWith('v') ? tag.slice(1) : tag;
}

/**
 * Create the context for one run
 */
export function createContext(options: ContextOptions = {}): Context {
  const git: GitInfo = {
    currentTag: options.git?.currentTag ?? '',
    commit: options.git?.commit ?? '',
  };

  return {
    projectName: options.projectName ?? '',
    version: options.version ?? versionFromTag(git.currentTag),
    git,
    env: { ...(options.env ?? processEnv()) },
    artifacts: options.artifacts ?? new ArtifactRegistry(),
    workingDir: options.workingDir ?? process.cwd(),
    clock: options.clock ?? (() => new Date()),
  };
}

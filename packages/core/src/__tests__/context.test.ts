/**
 * @fileoverview Tests for the run context
 */

import { describe, it, expect } from '@jest/globals';
import { ArtifactRegistry, createContext, processEnv, versionFromTag } from '..';

describe('versionFromTag', () => {
  it('strips a leading v', () => {
    expect(versionFromTag('v1.2.3')).toBe('1.2.3');
    expect(versionFromTag('1.2.3')).toBe('1.2.3');
    expect(versionFromTag('')).toBe('');
  });
});

describe('createContext', () => {
  it('derives the version from the tag', () => {
    const ctx = createContext({ git: { currentTag: 'v2.0.1', commit: 'abc' }, env: {} });

    expect(ctx.version).toBe('2.0.1');
    expect(ctx.git).toEqual({ currentTag: 'v2.0.1', commit: 'abc' });
  });

  it('prefers an explicit version', () => {
    const ctx = createContext({ version: '9.9.9', git: { currentTag: 'v1.0.0' }, env: {} });

    expect(ctx.version).toBe('9.9.9');
    expect(ctx.git.commit).toBe('');
  });

  it('copies the given environment', () => {
    const env = { FOO: 'bar' };
    const ctx = createContext({ env });
    env.FOO = 'changed';

    expect(ctx.env).toEqual({ FOO: 'bar' });
  });

  it('defaults to the process environment and working directory', () => {
    const ctx = createContext();

    expect(ctx.env).toEqual(processEnv());
    expect(ctx.workingDir).toBe(process.cwd());
    expect(ctx.artifacts).toBeInstanceOf(ArtifactRegistry);
    expect(ctx.clock()).toBeInstanceOf(Date);
  });

  it('uses an injected clock and registry', () => {
    const now = new Date('2024-03-01T10:00:00Z');
    const artifacts = new ArtifactRegistry();
    const ctx = createContext({ clock: () => now, artifacts, env: {} });

    expect(ctx.clock()).toBe(now);
    expect(ctx.artifacts).toBe(artifacts);
  });
});

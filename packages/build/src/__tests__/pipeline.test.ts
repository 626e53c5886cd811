/**
 * @fileoverview Tests for running builds over their targets
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  BuildErrorCode,
  Context,
  createBuildConfig,
  createContext,
  ErrorCategory,
  parseConfig
} from '@crossbuild/core';
import { Builder, GoBuilder } from '../builder';
import { buildOptionsFor, runBuilds, selectBuilds } from '../pipeline';
import { CompileOutput, Compiler, Invocation } from '../toolchain';

class RecordingCompiler implements Compiler {
  readonly invocations: Invocation[] = [];

  async compile(invocation: Invocation): Promise<CompileOutput> {
    this.invocations.push(invocation);
    return { stdout: '', stderr: '' };
  }
}

describe('runBuilds', () => {
  let dir: string;
  let ctx: Context;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'crossbuild-pipeline-'));
    writeFileSync(join(dir, 'main.go'), 'package main\nfunc main() {}\n');
    ctx = createContext({
      projectName: 'demo',
      git: { currentTag: 'v1.0.0', commit: 'abc' },
      env: {},
      workingDir: dir
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('keeps building after a failing target', async () => {
    const project = parseConfig('builds:\n  - id: app\n    targets: [linux_amd64, linux, windows_amd64]\n', {
      projectName: 'demo'
    });
    const compiler = new RecordingCompiler();

    const report = await runBuilds(ctx, project, { builder: new GoBuilder(compiler) });

    expect(report.built).toEqual([
      { buildId: 'app', target: 'linux_amd64', path: join(dir, 'dist', 'app_linux_amd64', 'demo') },
      { buildId: 'app', target: 'windows_amd64', path: join(dir, 'dist', 'app_windows_amd64', 'demo.exe') }
    ]);
    expect(report.failed).toEqual([
      {
        buildId: 'app',
        target: 'linux',
        code: BuildErrorCode.InvalidTarget,
        category: ErrorCategory.Target,
        message: 'linux is not a valid build target'
      }
    ]);
    expect(compiler.invocations).toHaveLength(2);
    expect(ctx.artifacts.size).toBe(2);
  });

  it('expands the default matrix', async () => {
    const project = parseConfig('builds:\n  - id: app\n', { projectName: 'demo' });

    const report = await runBuilds(ctx, project, { builder: new GoBuilder(new RecordingCompiler()) });

    expect(report.built.map(built => built.target)).toEqual(['linux_amd64', 'linux_386', 'darwin_amd64', 'darwin_386']);
    expect(report.failed).toEqual([]);
  });

  it('runs only the selected builds under the given dist', async () => {
    const project = parseConfig(
      'builds:\n  - id: a\n    targets: [linux_amd64]\n  - id: b\n    targets: [darwin_arm64]\n',
      { projectName: 'demo' }
    );

    const report = await runBuilds(ctx, project, {
      builder: new GoBuilder(new RecordingCompiler()),
      ids: ['b'],
      dist: 'out'
    });

    expect(report.built).toEqual([
      { buildId: 'b', target: 'darwin_arm64', path: join(dir, 'out', 'b_darwin_arm64', 'demo') }
    ]);
  });

  it('rejects unknown build ids', async () => {
    const project = parseConfig('builds:\n  - id: app\n', { projectName: 'demo' });

    await expect(
      runBuilds(ctx, project, { builder: new GoBuilder(new RecordingCompiler()), ids: ['nope'] })
    ).rejects.toThrow("no builds with the ID 'nope'");
  });

  it('rethrows errors that are not build errors', async () => {
    const project = parseConfig('builds:\n  - id: app\n    targets: [linux_amd64]\n', { projectName: 'demo' });
    const builder: Builder = {
      withDefaults: build => build,
      build: async () => {
        throw new Error('unexpected');
      }
    };

    await expect(runBuilds(ctx, project, { builder })).rejects.toThrow('unexpected');
  });
});

describe('selectBuilds', () => {
  const project = parseConfig('builds:\n  - id: a\n  - id: b\n  - id: c\n', { projectName: 'demo' });

  it('keeps configuration order', () => {
    expect(selectBuilds(project, ['c', 'a']).map(build => build.id)).toEqual(['a', 'c']);
    expect(selectBuilds(project).map(build => build.id)).toEqual(['a', 'b', 'c']);
  });

  it('names every unknown id', () => {
    expect(() => selectBuilds(project, ['a', 'x', 'y'])).toThrow("no builds with the ID 'x', 'y'");
  });
});

describe('buildOptionsFor', () => {
  const ctx = createContext({ projectName: 'demo', env: {} });

  it('renders the binary name and adds the platform extension', () => {
    const build = createBuildConfig({ id: 'web', binary: '{{ .ProjectName }}-{{ .Os }}' });

    expect(buildOptionsFor(ctx, build, 'js_wasm', '/out')).toEqual({
      target: 'js_wasm',
      name: 'demo-js.wasm',
      path: join('/out', 'web_js_wasm', 'demo-js.wasm'),
      ext: '.wasm'
    });
  });

  it('leaves the name of an invalid target unrendered', () => {
    const build = createBuildConfig({ id: 'app', binary: 'app' });

    expect(buildOptionsFor(ctx, build, 'linux', '/out')).toEqual({
      target: 'linux',
      name: 'app',
      path: join('/out', 'app_linux', 'app'),
      ext: ''
    });
  });
});

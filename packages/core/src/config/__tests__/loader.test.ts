/**
 * @fileoverview Tests for configuration loading
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { BuildError, BuildErrorCode } from '../../errors';
import { createBuildConfig, findConfig, loadConfig, parseConfig, parseEnvEntries } from '..';

function expectBuildError(fn: () => unknown, code: BuildErrorCode, message: string): void {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(BuildError);
    if (error instanceof BuildError) {
      expect(error.code).toBe(code);
      expect(error.message).toBe(message);
    }
    return;
  }
  throw new Error('expected a BuildError');
}

describe('parseConfig', () => {
  it('applies defaults to an empty document', () => {
    const config = parseConfig('', { projectName: 'demo' });

    expect(config.projectName).toBe('demo');
    expect(config.dist).toBe('dist');
    expect(config.env).toEqual([]);
    expect(config.builds).toEqual([
      {
        id: 'demo',
        binary: 'demo',
        main: '.',
        goos: [],
        goarch: [],
        goarm: [],
        targets: [],
        flags: [],
        asmflags: [],
        gcflags: [],
        ldflags: [],
        env: []
      }
    ]);
  });

  it('reads snake_case keys and normalizes lists', () => {
    const config = parseConfig(
      [
        'project_name: tool',
        'dist: out',
        'env:',
        '  - CGO_ENABLED=0',
        'builds:',
        '  - id: cli',
        '    binary: "tool-{{ .Os }}"',
        '    main: ./cmd/tool',
        '    goos: linux',
        '    goarch: [amd64, arm]',
        '    goarm: [6, "7"]',
        '    flags: -trimpath',
        '    ldflags:',
        '      - -s -w',
        '      - -X main.version={{.Version}}',
        '    hooks:',
        '      pre: make generate'
      ].join('\n'),
      { projectName: 'ignored' }
    );

    expect(config.projectName).toBe('tool');
    expect(config.dist).toBe('out');
    expect(config.env).toEqual(['CGO_ENABLED=0']);

    const [build] = config.builds;
    expect(build).toMatchObject({
      id: 'cli',
      binary: 'tool-{{ .Os }}',
      main: './cmd/tool',
      goos: ['linux'],
      goarch: ['amd64', 'arm'],
      goarm: ['6', '7'],
      flags: ['-trimpath'],
      ldflags: ['-s -w', '-X main.version={{.Version}}'],
      hooks: { pre: 'make generate' }
    });
  });

  it('rejects invalid env entries', () => {
    expectBuildError(
      () => parseConfig('env: [NOEQUALS]', { projectName: 'demo' }),
      BuildErrorCode.InvalidConfig,
      'invalid configuration: env.0: expected KEY=VALUE'
    );
  });

  it('rejects unknown keys', () => {
    expectBuildError(
      () => parseConfig('builds:\n  - idd: x', { projectName: 'demo' }),
      BuildErrorCode.InvalidConfig,
      "invalid configuration: builds.0: Unrecognized key(s) in object: 'idd'"
    );
  });

  it('rejects duplicate build ids', () => {
    expectBuildError(
      () => parseConfig('builds:\n  - id: a\n  - id: a', { projectName: 'demo' }),
      BuildErrorCode.InvalidConfig,
      "found 2 builds with the ID 'a', please fix your config"
    );
  });

  it('rejects builds that default to the same id', () => {
    expectBuildError(
      () => parseConfig('builds:\n  - main: ./a\n  - main: ./b', { projectName: 'demo' }),
      BuildErrorCode.InvalidConfig,
      "found 2 builds with the ID 'demo', please fix your config"
    );
  });

  it('reports YAML syntax errors', () => {
    try {
      parseConfig('builds: [', { projectName: 'demo', source: 'crossbuild.yml' });
      throw new Error('expected a BuildError');
    } catch (error) {
      expect(error).toBeInstanceOf(BuildError);
      if (error instanceof BuildError) {
        expect(error.code).toBe(BuildErrorCode.InvalidConfig);
        expect(error.message.startsWith('failed to parse crossbuild.yml: ')).toBe(true);
      }
    }
  });
});

describe('config files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'crossbuild-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('finds the first known file name', () => {
    writeFileSync(join(dir, 'crossbuild.yaml'), 'dist: a');
    writeFileSync(join(dir, '.crossbuild.yml'), 'dist: b');

    expect(findConfig(dir)).toBe(join(dir, '.crossbuild.yml'));
  });

  it('fails when no file is present', () => {
    expectBuildError(
      () => findConfig(dir),
      BuildErrorCode.ConfigNotFound,
      `no configuration file found in ${dir} (looked for .crossbuild.yml, .crossbuild.yaml, crossbuild.yml, crossbuild.yaml)`
    );
  });

  it('names the project after the config directory', () => {
    const path = join(dir, '.crossbuild.yml');
    writeFileSync(path, 'builds:\n  - goos: [linux]\n');

    const config = loadConfig(path);
    expect(config.projectName).toBe(basename(dir));
    expect(config.builds[0]?.id).toBe(basename(dir));
    expect(config.builds[0]?.goos).toEqual(['linux']);
  });

  it('fails on a missing file', () => {
    const path = join(dir, 'nope.yml');
    expectBuildError(() => loadConfig(path), BuildErrorCode.ConfigNotFound, `config file not found: ${path}`);
  });
});

describe('build config helpers', () => {
  it('creates builds with empty lists', () => {
    const build = createBuildConfig({ id: 'app', goos: ['linux'] });

    expect(build.binary).toBe('app');
    expect(build.main).toBe('');
    expect(build.goos).toEqual(['linux']);
    expect(build.ldflags).toEqual([]);
  });

  it('parses env entries, later entries winning', () => {
    expect(parseEnvEntries(['A=1', 'B=x=y', 'A=2', 'EMPTY='])).toEqual({ A: '2', B: 'x=y', EMPTY: '' });
  });

  it('rejects env entries without a key', () => {
    expectBuildError(
      () => parseEnvEntries(['=value']),
      BuildErrorCode.InvalidConfig,
      "invalid env entry '=value': expected KEY=VALUE"
    );
  });
});

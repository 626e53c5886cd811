/**
 * @fileoverview Tests for the process-spawning compiler
 */

import { describe, it, expect } from '@jest/globals';
import { tmpdir } from 'os';
import { GoCompiler } from '../go-compiler';
import { Invocation } from '../compiler';

// The current runtime stands in for the toolchain binary
function script(source: string, env: Record<string, string> = {}): Invocation {
  return { command: process.execPath, args: ['-e', source], env, cwd: tmpdir() };
}

describe('GoCompiler', () => {
  const compiler = new GoCompiler();

  it('collects output of a successful run', async () => {
    const output = await compiler.compile(
      script("process.stdout.write('out'); process.stderr.write('warn')")
    );

    expect(output).toEqual({ stdout: 'out', stderr: 'warn' });
  });

  it('passes the given environment', async () => {
    const output = await compiler.compile(
      script('process.stdout.write(`${process.env.GOOS}/${process.env.GOARCH}`)', {
        GOOS: 'linux',
        GOARCH: 'arm64'
      })
    );

    expect(output.stdout).toBe('linux/arm64');
  });

  it('rejects with stderr on a nonzero exit code', async () => {
    const invocation = script("process.stderr.write('undefined: foo'); process.exit(2)");

    await expect(compiler.compile(invocation)).rejects.toThrow(
      `${process.execPath} failed with code 2: undefined: foo`
    );
  });

  it('decodes characters split across output chunks', async () => {
    const invocation = script(
      'process.stderr.write(Buffer.from([0xc3])); setTimeout(() => { process.stderr.write(Buffer.from([0xa9])); process.exitCode = 1; }, 50)'
    );

    await expect(compiler.compile(invocation)).rejects.toThrow(`${process.execPath} failed with code 1: é`);
  });

  it('rejects when the command cannot be started', async () => {
    await expect(
      compiler.compile({ command: 'crossbuild-missing-toolchain', args: [], env: {}, cwd: tmpdir() })
    ).rejects.toThrow('ENOENT');
  });
});

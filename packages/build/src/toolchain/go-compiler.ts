/**
 * Go toolchain runner
 */

import { spawn } from 'child_process';
import { createLogger } from '../utils/logger';
import { CompileOutput, Compiler, Invocation } from './compiler';

const logger = createLogger('go');

/**
 * Spawns the toolchain and collects its output
 */
export class GoCompiler implements Compiler {
  /**
   * Run an invocation; resolves on exit code 0
   */
  compile(invocation: Invocation): Promise<CompileOutput> {
    const { command, args, env, cwd } = invocation;
    logger.debug(`running ${command} ${args.join(' ')}`, { cwd });

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd,
        env,
        stdio: ['ignore', 'pipe', 'pipe']
      });

      let stdout = '';
      let stderr = '';

      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');

      child.stdout?.on('data', (output: string) => {
        stdout += output;
        logger.trace(output.trimEnd());
      });

      child.stderr?.on('data', (output: string) => {
        stderr += output;
      });

      child.on('error', reject);

      child.on('close', code => {
        if (code === 0) {
          resolve({ stdout, stderr });
        } else {
          reject(new Error(`${command} failed with code ${code}: ${stderr}`));
        }
      });
    });
  }
}

/**
 * Git metadata for the run context
 */

import { spawn } from 'child_process';
import { errorMessage, GitInfo } from '@crossbuild/core';
import { createLogger } from './logger';

const logger = createLogger('git');

/** Output of a git command */
export interface GitCommandResult {
  stdout: string;
  stderr: string;
}

/** Runs git with arguments in a directory */
export type GitCommandRunner = (args: string[], cwd: string) => Promise<GitCommandResult>;

/**
 * Run a git command, rejecting on a nonzero exit code
 */
export function runGitCommand(args: string[], cwd: string): Promise<GitCommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn('git', args, {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';

    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');

    child.stdout?.on('data', (data: string) => {
      stdout += data;
    });

    child.stderr?.on('data', (data: string) => {
      stderr += data;
    });

    child.on('error', reject);

    child.on('close', code => {
      if (code === 0) {
        resolve({ stdout, stderr });
      } else {
        reject(new Error(`Git command failed with code ${code}: ${stderr.trim() || 'Unknown error'}`));
      }
    });
  });
}

/**
 * Reads commit and tag information from a checkout
 */
export class GitManager {
  constructor(private readonly run: GitCommandRunner = runGitCommand) {}

  /**
   * Commit and latest tag of the checkout at `repoPath`. Outside a
   * repository both are empty; a repository without tags has an empty tag.
   */
  async getRepoInfo(repoPath: string): Promise<GitInfo> {
    let commit: string;
    try {
      commit = await this.getCommitHash(repoPath);
    } catch (error) {
      logger.warn(`not a git repository, using empty git metadata: ${errorMessage(error)}`);
      return { commit: '', currentTag: '' };
    }

    let currentTag = '';
    try {
      currentTag = await this.getLatestTag(repoPath);
    } catch (error) {
      logger.debug(`no tag found: ${errorMessage(error)}`);
    }

    return { commit, currentTag };
  }

  /**
   * Get current commit hash
   */
  private async getCommitHash(repoPath: string): Promise<string> {
    const result = await this.run(['rev-parse', 'HEAD'], repoPath);
    return result.stdout.trim();
  }

  /**
   * Get the most recent tag reachable from HEAD
   */
  private async getLatestTag(repoPath: string): Promise<string> {
    const result = await this.run(['describe', '--tags', '--abbrev=0'], repoPath);
    return result.stdout.trim();
  }
}

/**
 * Command line program
 */

import { dirname, resolve } from 'path';
import { Command } from 'commander';
import {
  CORE_VERSION,
  createContext,
  errorMessage,
  findConfig,
  loadConfig,
  parseEnvEntries,
  processEnv,
  ProjectConfig
} from '@crossbuild/core';
import { GoBuilder } from '../builder';
import { runBuilds } from '../pipeline';
import { validateTarget, withDefaults } from '../targets';
import { Compiler, GoCompiler } from '../toolchain';
import { LogLevel } from '../types';
import { GitManager } from '../utils/git';
import { configureLogger, createLogger } from '../utils/logger';

const logger = createLogger('cli');

/** Collaborators of the program, replaceable in tests */
export interface ProgramDependencies {
  compiler?: Compiler;
  git?: GitManager;
  /** Directory searched for the configuration file */
  cwd?: string;
  /** Sink for command output */
  print?: (line: string) => void;
  clock?: () => Date;
}

interface ConfigOptions {
  config?: string;
}

interface BuildCommandOptions extends ConfigOptions {
  id?: string[];
  dist?: string;
  verbose?: boolean;
}

interface LoadedProject {
  project: ProjectConfig;
  workingDir: string;
}

/**
 * Create the crossbuild program
 */
export function createProgram(deps: ProgramDependencies = {}): Command {
  const cwd = deps.cwd ?? process.cwd();
  const print = deps.print ?? ((line: string) => console.log(line));
  const git = deps.git ?? new GitManager();

  const load = (options: ConfigOptions): LoadedProject => {
    const path = options.config ? resolve(cwd, options.config) : findConfig(cwd);
    logger.debug(`using configuration ${path}`);
    return { project: loadConfig(path), workingDir: dirname(path) };
  };

  const program = new Command();

  program
    .name('crossbuild')
    .description('Cross-compile Go programs over a target matrix')
    .version(CORE_VERSION);

  program
    .command('build')
    .description('Build every target of the configured builds')
    .option('-f, --config <file>', 'Configuration file')
    .option('--id <id...>', 'Only run builds with these ids')
    .option('--dist <dir>', 'Output directory')
    .option('--verbose', 'Enable debug logging')
    .action(async (options: BuildCommandOptions) => {
      try {
        if (options.verbose) {
          configureLogger({ level: LogLevel.Debug });
        }

        const { project, workingDir } = load(options);
        const ctx = createContext({
          projectName: project.projectName,
          git: await git.getRepoInfo(workingDir),
          env: { ...processEnv(), ...parseEnvEntries(project.env) },
          workingDir,
          clock: deps.clock
        });

        const report = await runBuilds(ctx, project, {
          builder: new GoBuilder(deps.compiler ?? new GoCompiler()),
          ids: options.id,
          dist: options.dist
        });

        for (const built of report.built) {
          print(`built ${built.buildId} ${built.target} ${built.path}`);
        }
        for (const failed of report.failed) {
          print(`failed ${failed.buildId} ${failed.target}: ${failed.message}`);
        }

        if (report.failed.length > 0) {
          logger.failure(`${report.failed.length} of ${report.built.length + report.failed.length} targets failed`);
          process.exitCode = 1;
        } else {
          logger.success(`${report.built.length} targets built`);
        }
      } catch (error) {
        logger.failure(`Build failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  program
    .command('targets')
    .description('List the targets of every build')
    .option('-f, --config <file>', 'Configuration file')
    .action((options: ConfigOptions) => {
      try {
        const { project } = load(options);
        for (const build of project.builds) {
          for (const target of withDefaults(build).targets) {
            print(`${build.id} ${target}`);
          }
        }
      } catch (error) {
        logger.failure(errorMessage(error));
        process.exitCode = 1;
      }
    });

  program
    .command('check')
    .description('Validate the configuration and its targets')
    .option('-f, --config <file>', 'Configuration file')
    .action((options: ConfigOptions) => {
      try {
        const { project } = load(options);
        const problems: string[] = [];

        for (const build of project.builds) {
          for (const target of withDefaults(build).targets) {
            try {
              validateTarget(target);
            } catch (error) {
              problems.push(`${build.id}: ${errorMessage(error)}`);
            }
          }
        }

        if (problems.length > 0) {
          problems.forEach(problem => print(problem));
          process.exitCode = 1;
          return;
        }
        print('configuration is valid');
      } catch (error) {
        logger.failure(errorMessage(error));
        process.exitCode = 1;
      }
    });

  return program;
}

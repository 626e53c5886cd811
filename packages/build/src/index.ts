/**
 * @fileoverview crossbuild orchestrator
 *
 * Expands build target matrices, renders compiler flags from templates,
 * runs the Go toolchain once per target and records the produced binaries.
 */

export * from './types';
export * from './config';
export * from './targets';
export * from './flags';
export * from './entry-point';
export * from './recorder';
export * from './builder';
export * from './pipeline';
export * from './template';
export * from './toolchain';
export { createProgram } from './cli/program';
export type { ProgramDependencies } from './cli/program';
export { GitManager, runGitCommand } from './utils/git';
export type { GitCommandResult, GitCommandRunner } from './utils/git';
export { Logger, logger, configureLogger, createLogger, parseLogLevel } from './utils/logger';
export type { LoggerConfig, LogOutput } from './utils/logger';

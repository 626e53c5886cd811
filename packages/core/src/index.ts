/**
 * @fileoverview Core domain of crossbuild
 *
 * Error taxonomy, artifact registry, run context and project configuration
 * shared by the build orchestrator and its callers.
 */

export * from './errors';
export * from './artifacts';
export * from './context';
export * from './config';

export const CORE_VERSION = '0.1.0';

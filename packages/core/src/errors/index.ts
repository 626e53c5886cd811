/**
 * @fileoverview Error handling for crossbuild
 */

export * from './codes';
export * from './build-error';

/**
 * Core type definitions for the crossbuild orchestrator
 */

/** Log levels for build process */
export enum LogLevel {
  Error = 'error',
  Warn = 'warn',
  Info = 'info',
  Debug = 'debug',
  Trace = 'trace'
}

/** One compilation target */
export interface Target {
  /** Operating system, e.g. `linux` */
  os: string;
  /** Architecture, e.g. `amd64` */
  arch: string;
  /** ARM variant, only for `arm` */
  arm?: string;
}

/** Per-invocation parameters for building one target */
export interface BuildOptions {
  /** Target identifier, e.g. `linux_arm_6` */
  target: string;
  /** Output name */
  name: string;
  /** Output path */
  path: string;
  /** Platform file extension, e.g. `.exe`, `.wasm` or empty */
  ext: string;
}

/** A target that built successfully */
export interface BuiltTarget {
  buildId: string;
  target: string;
  path: string;
}

/** A target that failed to build */
export interface BuildFailure {
  buildId: string;
  target: string;
  code: number;
  category: string;
  message: string;
}

/** Outcome of building a set of targets */
export interface BuildReport {
  built: BuiltTarget[];
  failed: BuildFailure[];
}

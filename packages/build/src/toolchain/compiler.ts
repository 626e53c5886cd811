/**
 * Toolchain abstraction used by the builder
 */

/** One toolchain invocation */
export interface Invocation {
  command: string;
  args: string[];
  /** Complete environment of the process */
  env: Record<string, string>;
  cwd: string;
}

/** Captured output of a successful invocation */
export interface CompileOutput {
  stdout: string;
  stderr: string;
}

/**
 * Runs a toolchain invocation. Rejects with an Error whose message carries
 * the toolchain's stderr when the invocation fails.
 */
export interface Compiler {
  compile(invocation: Invocation): Promise<CompileOutput>;
}

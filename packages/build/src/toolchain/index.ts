/**
 * Toolchain exports
 */

export type { CompileOutput, Compiler, Invocation } from './compiler';
export { GoCompiler } from './go-compiler';
